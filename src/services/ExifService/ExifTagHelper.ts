import type { TagMap, TagValue, WriteFields } from "@/types";

const IGNORED_KEYS = new Set(["SourceFile", "errors", "warnings"]);

function stringifyScalar(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (typeof value === "object") {
    if ("rawValue" in value && typeof value.rawValue === "string") {
      return value.rawValue;
    }
    return JSON.stringify(value);
  }
  return String(value);
}

function toTagValue(value: unknown): TagValue | undefined {
  if (!Array.isArray(value)) return stringifyScalar(value);
  return value
    .map(stringifyScalar)
    .filter((v): v is string => v !== undefined);
}

/**
 * exiftool 的 JSON 結果轉為標籤表。
 * 陣列保留為字串陣列，日期物件取原始字串，其他物件轉為 JSON。
 */
export function flattenTags(raw: Record<string, unknown>): TagMap {
  const tags: TagMap = {};
  for (const [key, value] of Object.entries(raw)) {
    if (IGNORED_KEYS.has(key)) continue;
    const tagValue = toTagValue(value);
    if (tagValue !== undefined) tags[key] = tagValue;
  }
  return tags;
}

/** 去除空字串與空陣列，避免 exiftool 將其視為刪除標籤 */
export function compactWriteFields(fields: WriteFields): WriteFields {
  const compacted: WriteFields = {};
  for (const [tag, value] of Object.entries(fields)) {
    if (Array.isArray(value)) {
      const items = value.filter((v) => v !== "");
      if (items.length > 0) compacted[tag] = items;
    } else if (value !== "") {
      compacted[tag] = value;
    }
  }
  return compacted;
}

/** 標籤值的所有項目 */
export function tagItems(value: TagValue | undefined): string[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/** 標籤值轉為單一字串，陣列以 ", " 串接 */
export function tagText(value: TagValue | undefined): string | undefined {
  if (value === undefined) return undefined;
  return Array.isArray(value) ? value.join(", ") : value;
}

/** 取標籤名稱（去掉群組），例如 "XMP-dc:Title" → "Title" */
export function tagNameOf(key: string): string {
  const index = key.lastIndexOf(":");
  return index < 0 ? key : key.slice(index + 1);
}

/**
 * 清單型標籤：XMP 的 Subject 與 IPTC Keywords。
 * 其值以陣列寫入，讀回時單一字串也視為一個項目。
 */
export function isListTag(key: string): boolean {
  const name = tagNameOf(key);
  if (key.startsWith("XMP")) return name === "Subject";
  if (key.startsWith("IPTC")) return name === "Keywords";
  return false;
}
