import { format, isValid, parse } from "date-fns";

/** 彙整資料與驗證時使用的時鐘格式 */
export const CLOCK_FORMAT = "yyyy:MM:dd HH:mm:ss";
/** 檔名使用的日期格式 */
export const FILENAME_DATE_FORMAT = "yyyy_MM_dd";

const DATE_RE =
  /^(\d{4})[:-](\d{2})[:-](\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?)?\s*(Z|UTC|GMT|[+-]\d{1,2}(?::?\d{2})?)?$/i;

const TIMEZONE_RE = /^([+-])(\d{1,2})(?::?(\d{2}))?$/;

/**
 * 時區轉為 "+HHMM"，無法辨識時回傳空字串。
 * "Z"、"UTC"、"GMT" 視為 "+0000"；"-5" 視為 "-0500"。
 */
export function normalizeTimezone(tz: string): string {
  const value = tz.trim().toUpperCase();
  if (!value) return "";
  if (value === "Z" || value === "UTC" || value === "GMT") return "+0000";
  const m = TIMEZONE_RE.exec(value);
  if (!m) return "";
  const hours = Number(m[2]);
  const minutes = Number(m[3] ?? "0");
  if (hours > 14 || minutes >= 60) return "";
  return `${m[1]}${pad(hours)}${pad(minutes)}`;
}

/**
 * 將各種日期字串轉為 "YYYY:MM:DD HH:mm:ss"。
 * 接受 ":" 或 "-" 分隔的日期、空白或 "T" 分隔的時間，去除毫秒與時區（不換算）。
 * 只有日期時補 "00:00:00"。無效時回傳 undefined。
 */
export function normalizeDate(value: string | undefined): string | undefined {
  if (!value) return undefined;
  const m = DATE_RE.exec(value.trim());
  if (!m) return undefined;
  const [, year, month, day, hour = "00", minute = "00", second = "00", tz] = m;
  if (tz !== undefined && normalizeTimezone(tz) === "") return undefined;

  const clock = `${year}:${month}:${day} ${hour}:${minute}:${second}`;
  const parsed = parse(clock, CLOCK_FORMAT, new Date());
  if (!isValid(parsed)) return undefined;
  return format(parsed, CLOCK_FORMAT);
}

/** 時鐘格式（或任何可正規化的日期）轉為檔名格式 "YYYY_MM_DD" */
export function toFilenameDate(value: string | undefined): string | undefined {
  const clock = normalizeDate(value);
  if (!clock) return undefined;
  return format(parse(clock, CLOCK_FORMAT, new Date()), FILENAME_DATE_FORMAT);
}

/** 兩個日期正規化後是否相同；任一無效即不相符 */
export function datesMatch(a: string | undefined, b: string | undefined): boolean {
  const left = normalizeDate(a);
  const right = normalizeDate(b);
  return left !== undefined && left === right;
}

function pad(n: number) {
  return String(n).padStart(2, "0");
}
