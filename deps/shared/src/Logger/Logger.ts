export const logLevels = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "silent",
] as const;

export type LogLevel = (typeof logLevels)[number];
export type LogRecordLevel = Exclude<LogLevel, "silent">;

export type LogContext = {
  /** 事件名稱，會取代輸出中的等級名稱 */
  event?: string;
  /** 覆寫本次輸出的 emoji */
  emoji?: string;
  /** 任意錯誤，Error 會輸出 stack */
  error?: unknown;
  [key: string]: unknown;
};

export type SerializedError = {
  name: string;
  message: string;
  stack?: string;
};

export type LogRecord = {
  time: string;
  level: LogRecordLevel;
  path: string[];
  event?: string;
  msg: string;
  context: Record<string, unknown>;
  err?: SerializedError;
};

export interface LogTransport {
  write(record: LogRecord): void;
  [Symbol.asyncDispose](): Promise<void>;
}

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export interface LogMethod {
  (message: string): void;
  (context: LogContext, message: string): void;
  (context?: LogContext): TemplateLog;
}

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;

  /** 產生子 logger，name 會加入輸出路徑，context 會合併到之後的每筆紀錄 */
  extend(name: string, context?: LogContext): Logger;

  /** 只合併 context，不改變路徑 */
  append(context: LogContext): Logger;

  attachTransport(transport: LogTransport): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return logLevels.some((level) => level === value);
}
