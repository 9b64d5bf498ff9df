import path from "node:path";

import { COMPLETION_MARKER, FILENAME_COMPONENT_MAX_LENGTH } from "@/constants";
import type { FilenameGenerator } from "@/services/FilenameGenerator";
import type { MediaMetadata } from "@/types";
import { toFilenameDate } from "@/utils/DateNormalizer";

/**
 * 清理檔名元件：看起來像 JSON 的文字視為空；
 * 字母、數字、`_`、空白、`-`、括號以外的字元換成 `_`，空白換成 `_`，
 * 連續 `_` 合併，去頭尾 `_`，最長 50 字。
 */
export function cleanComponent(text: string | undefined): string {
  const trimmed = text?.trim() ?? "";
  if (trimmed.startsWith("{") || trimmed.startsWith("[")) return "";
  return trimmed
    .replace(/[^\p{L}\p{N}_\s\-()[\]]/gu, "_")
    .replace(/\s+/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "")
    .slice(0, FILENAME_COMPONENT_MAX_LENGTH)
    .replace(/_+$/, "");
}

export class FilenameGeneratorDefault implements FilenameGenerator {
  generate(
    metadata: MediaMetadata,
    originalPath: string,
    sequence?: string
  ): string | undefined {
    const date = toFilenameDate(metadata.date);
    if (!date) return undefined;

    const { name: stem, ext } = path.parse(originalPath);
    const components: string[] = [];
    const title = cleanComponent(metadata.title);
    if (title) components.push(title);

    // 已出現在日期、標題或前面元件中的地點不重複
    const { location, city, country } = metadata.location;
    for (const value of [location, city, country]) {
      const cleaned = cleanComponent(value);
      if (!cleaned) continue;
      const assembled = [date, ...components].join("_").toLowerCase();
      if (assembled.includes(cleaned.toLowerCase())) continue;
      components.push(cleaned);
    }

    const seq = cleanComponent(sequence);
    if (components.length === 0 && !seq) {
      return `${stem}${COMPLETION_MARKER}${ext.toLowerCase()}`;
    }
    if (seq) components.push(seq);
    return `${[date, ...components].join("_")}${COMPLETION_MARKER}${ext.toLowerCase()}`;
  }

  fallback(originalPath: string): string {
    const { name, ext } = path.parse(originalPath);
    return `${name}${COMPLETION_MARKER}${ext.toLowerCase()}`;
  }
}
