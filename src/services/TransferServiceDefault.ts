import { constants } from "node:fs";
import { copyFile, mkdir, open, rename, stat, unlink } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { AlbumPathResolver } from "@/services/AlbumPathResolver";
import type { AssetImporter, ImportError } from "@/services/AssetImporter";
import type { ExifService } from "@/services/ExifService";
import { hasCompletionMarker } from "@/services/FilenameGenerator";
import type { MetadataAggregator } from "@/services/MetadataAggregator";
import type {
  ImportFailure,
  TransferError,
  TransferService,
} from "@/services/TransferService";
import { exists, sleep, withTimeout } from "@/utils/helper";

export type TransferServiceDeps = {
  logger: Logger;
  exifService: ExifService;
  aggregator: MetadataAggregator;
  albumResolver: AlbumPathResolver;
  importer: AssetImporter;
  minFileAgeSeconds: number;
  accessTimeoutMs: number;
  importTimeoutMs: number;
  /** 存取檢查的輪詢間隔 */
  pollIntervalMs?: number;
  now?: () => number;
};

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function errorCode(error: unknown): string | undefined {
  if (!(error instanceof Error) || !("code" in error)) return undefined;
  return typeof error.code === "string" ? error.code : undefined;
}

export class TransferServiceDefault implements TransferService {
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly now: () => number;

  constructor(private readonly deps: TransferServiceDeps) {
    this.logger = deps.logger.extend("TransferService");
    this.pollIntervalMs = deps.pollIntervalMs ?? 200;
    this.now = deps.now ?? Date.now;
  }

  async transfer(
    filePath: string,
    destDir: string
  ): Promise<Result<string, TransferError>> {
    const logger = this.logger.extend("transfer", { filePath });

    let mtimeMs: number;
    try {
      mtimeMs = (await stat(filePath)).mtimeMs;
    } catch (error) {
      return err({ type: "NOT_FOUND", message: messageOf(error) });
    }

    if (!hasCompletionMarker(filePath)) {
      return err({ type: "NOT_COMPLETED", message: "檔名沒有完成標記" });
    }

    const ageSeconds = (this.now() - mtimeMs) / 1000;
    if (ageSeconds < this.deps.minFileAgeSeconds) {
      return err({
        type: "TOO_NEW",
        message: `檔案修改後僅 ${Math.floor(ageSeconds)} 秒`,
        ageSeconds,
      });
    }

    if (!(await this.checkAccess(filePath))) {
      logger.warn({ emoji: "🔒" })`檔案仍在使用中`;
      return err({
        type: "BUSY",
        message: `${this.deps.accessTimeoutMs}ms 內無法確認檔案已穩定`,
      });
    }

    const target = path.join(destDir, path.basename(filePath));
    try {
      await mkdir(destDir, { recursive: true });
    } catch (error) {
      return err({ type: "MOVE_FAILED", message: messageOf(error) });
    }
    if (await exists(target)) {
      return err({ type: "TARGET_EXISTS", message: `目標已存在: ${target}` });
    }

    try {
      await this.move(filePath, target);
    } catch (error) {
      logger.error({ error })`搬移失敗`;
      return err({ type: "MOVE_FAILED", message: messageOf(error) });
    }
    logger.info({ emoji: "🚚" })`已搬移至 ${target}`;
    return ok(target);
  }

  async importAsset(filePath: string): Promise<Result<string[], ImportFailure>> {
    const logger = this.logger.extend("importAsset", { filePath });

    const tags = await this.deps.exifService.readTags(filePath);
    if (isErr(tags)) {
      return err({ type: "READ_FAILED", message: tags.error.message });
    }
    const metadata = this.deps.aggregator.aggregate(undefined, tags.value);
    const albumPaths = await this.deps.albumResolver.resolve({
      keywords: metadata.keywords,
      title: metadata.title,
      city: metadata.location.city,
      state: metadata.location.state,
      location: metadata.location.location,
    });
    logger.debug({ albumPaths })`相簿計算完成`;

    // 匯入介面拋出的例外視為匯入失敗
    const task = this.deps.importer
      .importAsset(filePath, albumPaths)
      .catch((error: unknown): Result<void, ImportError> => {
        logger.error({ error })`匯入時發生例外`;
        return err({ type: "IMPORT_FAILED", message: messageOf(error) });
      });
    const result = await withTimeout(task, this.deps.importTimeoutMs);
    if (isErr(result)) {
      logger.error()`匯入逾時 ${result.error.ms}ms`;
      return err({ type: "TIMEOUT", message: `匯入超過 ${result.error.ms}ms` });
    }
    if (isErr(result.value)) {
      logger.error()`匯入失敗 ${result.value.error.message}`;
      return err(result.value.error);
    }
    return ok(albumPaths);
  }

  /**
   * 以讀寫模式開啟並比對連續兩次的大小與修改時間，
   * 僅為建議性檢查，無法阻止其他程序同時寫入。
   */
  private async checkAccess(filePath: string): Promise<boolean> {
    const deadline = Date.now() + this.deps.accessTimeoutMs;
    let previous: { size: number; mtimeMs: number } | undefined;
    while (Date.now() <= deadline) {
      try {
        const handle = await open(filePath, "r+");
        try {
          const { size, mtimeMs } = await handle.stat();
          if (
            previous &&
            previous.size === size &&
            previous.mtimeMs === mtimeMs
          ) {
            return true;
          }
          previous = { size, mtimeMs };
        } finally {
          await handle.close();
        }
      } catch (error) {
        this.logger.debug({ error })`存取檢查失敗 ${filePath}`;
        previous = undefined;
      }
      await sleep(this.pollIntervalMs);
    }
    return false;
  }

  /** 跨裝置時改為複製後刪除 */
  private async move(from: string, to: string) {
    try {
      await rename(from, to);
    } catch (error) {
      if (errorCode(error) !== "EXDEV") throw error;
      await copyFile(from, to, constants.COPYFILE_EXCL);
      await unlink(from);
    }
  }
}
