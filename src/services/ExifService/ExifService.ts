import type { Result } from "~shared/utils/Result";

import type { TagMap, WriteFields } from "@/types";

export type ReadError =
  | { type: "FILE_NOT_FOUND"; message: string }
  | { type: "READ_FAILED"; message: string };

export type WriteError = { type: "WRITE_FAILED"; message: string };

export interface ExifService {
  /**
   * 讀取檔案全部標籤，鍵為 "Group:Tag"，值一律轉為字串。
   */
  readTags(filePath: string): Promise<Result<TagMap, ReadError>>;

  /**
   * 覆寫檔案標籤。多值欄位以逗號串接後寫入。
   */
  writeTags(
    filePath: string,
    fields: WriteFields
  ): Promise<Result<void, WriteError>>;
}
