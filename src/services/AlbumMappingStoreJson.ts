import { Assert } from "@sinclair/typebox/value";
import { readFile } from "node:fs/promises";

import { type Result, err, ok } from "~shared/utils/Result";

import {
  type AlbumMapping,
  type AlbumMappingStore,
  type MappingReadError,
  albumMappingSchema,
} from "@/services/AlbumMappingStore";

export class AlbumMappingStoreJson implements AlbumMappingStore {
  constructor(private readonly mappingPath: string | undefined) {}

  async read(): Promise<Result<AlbumMapping, MappingReadError>> {
    if (!this.mappingPath) {
      return err({ type: "NO_MAPPING_PATH", message: "未設定相簿對照檔路徑" });
    }

    try {
      const raw: unknown = JSON.parse(await readFile(this.mappingPath, "utf8"));
      Assert(albumMappingSchema, raw);
      return ok(raw);
    } catch (error) {
      return err({
        type: "READ_ERROR",
        message: `${this.mappingPath}: ${error instanceof Error ? error.message : String(error)}`,
      });
    }
  }
}
