import type { Result } from "~shared/utils/Result";

export type ImportError = { type: "IMPORT_FAILED"; message: string };

/** 相片庫匯入介面：匯入檔案並放入（必要時建立）相簿 */
export interface AssetImporter {
  importAsset(
    filePath: string,
    albumPaths: string[]
  ): Promise<Result<void, ImportError>>;
}
