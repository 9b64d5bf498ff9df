import path from "node:path";

import { SIDECAR_EXTENSION } from "@/constants";
import type { MediaMetadata } from "@/types";

/** sidecar 讀出的欄位與彙整結果同形，缺少的欄位保持 undefined */
export type SidecarMetadata = MediaMetadata;

export interface SidecarReader {
  /**
   * 讀取 XMP sidecar。
   * 檔案不存在或內容無法解析時回傳空結果，不會拋出。
   */
  read(sidecarPath: string): Promise<SidecarMetadata>;
}

export function emptySidecarMetadata(): SidecarMetadata {
  return { keywords: [], location: {} };
}

/**
 * 媒體檔對應的 sidecar 候選路徑，依序為：
 * `<dir>/<stem>.xmp`、`<dir>/<檔名>.xmp`
 */
export function sidecarCandidates(mediaPath: string): string[] {
  const { dir, name, base } = path.parse(mediaPath);
  return [
    path.join(dir, `${name}${SIDECAR_EXTENSION}`),
    path.join(dir, `${base}${SIDECAR_EXTENSION}`),
  ];
}
