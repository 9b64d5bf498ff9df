import path from "node:path";

import { COMPLETION_MARKER } from "@/constants";
import type { MediaMetadata } from "@/types";

export interface FilenameGenerator {
  /**
   * 產生 `<日期>[_標題][_地點][_城市][_國家][_序號]__LRE<副檔名>`。
   * 沒有日期時回傳 undefined。
   */
  generate(
    metadata: MediaMetadata,
    originalPath: string,
    sequence?: string
  ): string | undefined;

  /** `<原檔名>__LRE<副檔名>` */
  fallback(originalPath: string): string;
}

/** 檔名是否已帶有完成標記 */
export function hasCompletionMarker(filePath: string): boolean {
  return path.parse(filePath).name.endsWith(COMPLETION_MARKER);
}
