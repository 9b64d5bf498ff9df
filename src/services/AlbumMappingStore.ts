import { type Static, Type as t } from "@sinclair/typebox";

import type { Result } from "~shared/utils/Result";

/** 鍵為資料夾、城市、州或地點名稱；值以 "/" 結尾時表示要以標題作為相簿名稱 */
export const albumMappingSchema = t.Record(
  t.String(),
  t.Union([t.String(), t.Array(t.String())])
);

export type AlbumMapping = Static<typeof albumMappingSchema>;

export type MappingReadError = {
  type: "NO_MAPPING_PATH" | "READ_ERROR";
  message: string;
};

export interface AlbumMappingStore {
  /** 每次呼叫都重新讀取 */
  read(): Promise<Result<AlbumMapping, MappingReadError>>;
}
