import { type ExifTool, exiftool } from "exiftool-vendored";
import { access } from "node:fs/promises";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import type { TagMap, WriteFields } from "@/types";

import type { ExifService, ReadError, WriteError } from "./ExifService";
import { compactWriteFields, flattenTags } from "./ExifTagHelper";

export class ExifServiceExifTool implements ExifService {
  private readonly exiftool: ExifTool;
  private readonly logger: Logger;

  constructor(deps: { logger: Logger; exiftool?: ExifTool }) {
    this.exiftool = deps.exiftool ?? exiftool;
    this.logger = deps.logger.extend("ExifServiceExifTool");
  }

  async readTags(filePath: string): Promise<Result<TagMap, ReadError>> {
    try {
      await access(filePath);
    } catch {
      return err({ type: "FILE_NOT_FOUND", message: `找不到檔案: ${filePath}` });
    }
    try {
      const raw = await this.exiftool.readRaw(filePath, ["-G", "-m"]);
      return ok(flattenTags(raw));
    } catch (error) {
      this.logger.error({ error, filePath })`讀取標籤失敗`;
      return err({
        type: "READ_FAILED",
        message: `讀取標籤失敗: ${filePath}`,
      });
    }
  }

  async writeTags(
    filePath: string,
    fields: WriteFields
  ): Promise<Result<void, WriteError>> {
    const tags = compactWriteFields(fields);
    if (Object.keys(tags).length === 0) return ok();
    try {
      // 交由 exiftool-vendored 編碼值（換行、清單分隔）
      await this.exiftool.write(filePath, tags, {
        writeArgs: ["-overwrite_original", "-m"],
      });
      return ok();
    } catch (error) {
      return err({
        type: "WRITE_FAILED",
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async [Symbol.asyncDispose]() {
    await this.exiftool.end();
  }
}
