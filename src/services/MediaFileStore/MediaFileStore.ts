import type { Result } from "~shared/utils/Result";

export type FileStoreError =
  | { type: "TARGET_EXISTS"; message: string }
  | { type: "IO_FAILED"; message: string };

/** 處理流程需要的檔案操作 */
export interface MediaFileStore {
  exists(filePath: string): Promise<boolean>;
  remove(filePath: string): Promise<Result<void, FileStoreError>>;
  /** 目標已存在時不覆蓋，回傳 TARGET_EXISTS */
  rename(from: string, to: string): Promise<Result<void, FileStoreError>>;
}
