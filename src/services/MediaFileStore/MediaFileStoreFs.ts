import { rename, unlink } from "node:fs/promises";

import { type Result, err, ok } from "~shared/utils/Result";

import { exists } from "@/utils/helper";

import type { FileStoreError, MediaFileStore } from "./MediaFileStore";

function ioFailed(error: unknown): FileStoreError {
  return {
    type: "IO_FAILED",
    message: error instanceof Error ? error.message : String(error),
  };
}

export class MediaFileStoreFs implements MediaFileStore {
  exists(filePath: string): Promise<boolean> {
    return exists(filePath);
  }

  async remove(filePath: string): Promise<Result<void, FileStoreError>> {
    try {
      await unlink(filePath);
      return ok();
    } catch (error) {
      return err(ioFailed(error));
    }
  }

  async rename(from: string, to: string): Promise<Result<void, FileStoreError>> {
    if (await exists(to)) {
      return err({ type: "TARGET_EXISTS", message: `目標已存在: ${to}` });
    }
    try {
      await rename(from, to);
      return ok();
    } catch (error) {
      return err(ioFailed(error));
    }
  }
}
