import type { Result } from "~shared/utils/Result";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

export type ScanOptions = {
  /** 預設 true */
  recursive?: boolean;
  /** 允許的副檔名，不分大小寫；空陣列表示全部 */
  allowExts?: readonly string[];
  /** 回傳 true 的路徑會被排除 */
  exclude?: (filePath: string) => boolean;
};

export interface FileSystemScanner {
  /** 列出檔案，依路徑排序；略過 "." 開頭的檔案 */
  scan(rootPath: string, options?: ScanOptions): Promise<Result<string[], ScanError>>;
}
