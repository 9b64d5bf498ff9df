import type { Result } from "~shared/utils/Result";

export type TransferError =
  | { type: "NOT_FOUND"; message: string }
  | { type: "NOT_COMPLETED"; message: string }
  | { type: "TOO_NEW"; message: string; ageSeconds: number }
  | { type: "BUSY"; message: string }
  | { type: "TARGET_EXISTS"; message: string }
  | { type: "MOVE_FAILED"; message: string };

export type ImportFailure =
  | { type: "READ_FAILED"; message: string }
  | { type: "IMPORT_FAILED"; message: string }
  | { type: "TIMEOUT"; message: string };

export interface TransferService {
  /**
   * 將已完成處理的檔案搬到目的目錄，回傳新路徑。
   * 需帶完成標記、修改時間夠久且存取檢查通過；不覆蓋既有檔案。
   */
  transfer(filePath: string, destDir: string): Promise<Result<string, TransferError>>;

  /**
   * 依檔案內嵌標籤計算相簿並交給匯入介面，限時等待，逾時視為失敗且不重試。
   */
  importAsset(filePath: string): Promise<Result<string[], ImportFailure>>;
}
