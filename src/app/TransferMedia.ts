import type { CAC } from "cac";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { isErr } from "~shared/utils/Result";

import { getAppConfig } from "@/config";
import { mediaExtensions } from "@/constants";
import { AlbumMappingStoreJson } from "@/services/AlbumMappingStoreJson";
import { AlbumPathResolverDefault } from "@/services/AlbumPathResolverDefault";
import { AssetImporterDump } from "@/services/AssetImporter";
import { ExifServiceExifTool } from "@/services/ExifService";
import { hasCompletionMarker } from "@/services/FilenameGenerator";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { MetadataAggregatorDefault } from "@/services/MetadataAggregatorDefault";
import { TransferServiceDefault } from "@/services/TransferServiceDefault";
import { confirm, expandHome } from "@/utils/helper";

type TransferOptions = {
  to?: string;
  yes?: boolean;
};

type TransferRecord = {
  filePath: string;
  state: "IMPORTED" | "MOVED" | "SKIPPED" | "FAILED";
  target?: string;
  albumPaths?: string[];
  reason?: string;
};

export function registerTransferMedia(cli: CAC, baseLogger: Logger) {
  cli
    .command("transfer <folder>", "搬移已完成的檔案並交給相片庫匯入")
    .option("--to <dest>", "目的目錄")
    .option("--yes", "略過確認，直接執行", { default: false })
    .action(async (folder: string, options: TransferOptions) => {
      const logger = baseLogger.extend("transfer");
      const config = getAppConfig();
      if (!options.to) {
        logger.error("未指定 --to 目的目錄");
        process.exit(1);
      }
      const destDir = expandHome(options.to);

      // 1) 掃描已完成的檔案
      const root = expandHome(folder);
      const scanRes = await new FileSystemScannerDefault().scan(root, {
        recursive: false,
        allowExts: mediaExtensions,
        exclude: (file) => !hasCompletionMarker(file),
      });
      if (isErr(scanRes)) {
        logger.error({ error: scanRes.error })`掃描來源目錄失敗`;
        process.exit(1);
      }
      const completed = scanRes.value;
      logger.info({ emoji: "🔎" })`找到 ${completed.length} 個已完成的檔案`;
      if (completed.length === 0) return;

      // 2) 確認
      const proceed =
        options.yes ||
        (await confirm(
          logger,
          `將搬移 ${completed.length} 個檔案至：${destDir}，是否繼續？ [y/N] `
        ));
      if (!proceed) {
        logger.warn({ emoji: "⏹️" })`使用者取消`;
        return;
      }

      // 3) 搬移與匯入
      const dumper = new DumpWriterDefault(logger, config.DUMP_DIR);
      const exifService = new ExifServiceExifTool({ logger });
      const importer = new AssetImporterDump({ logger, dumper });
      const service = new TransferServiceDefault({
        logger,
        exifService,
        aggregator: new MetadataAggregatorDefault({
          logger,
          addRatingKeyword: config.ADD_RATING_KEYWORD,
        }),
        albumResolver: new AlbumPathResolverDefault({
          logger,
          mappingStore: new AlbumMappingStoreJson(config.ALBUM_MAPPING_PATH),
          categoryPrefix: config.ALBUM_CATEGORY_PREFIX,
        }),
        importer,
        minFileAgeSeconds: config.MIN_FILE_AGE_SECONDS,
        accessTimeoutMs: config.FILE_ACCESS_TIMEOUT_MS,
        importTimeoutMs: config.IMPORT_TIMEOUT_MS,
      });

      const transferOne = async (filePath: string): Promise<TransferRecord> => {
        const moved = await service.transfer(filePath, destDir);
        if (isErr(moved)) {
          const failed = moved.error.type === "MOVE_FAILED";
          if (failed) logger.error()`搬移失敗 ${filePath}: ${moved.error.message}`;
          else logger.info()`略過 ${filePath}: ${moved.error.message}`;
          return {
            filePath,
            state: failed ? "FAILED" : "SKIPPED",
            reason: moved.error.type,
          };
        }
        const imported = await service.importAsset(moved.value);
        return isErr(imported)
          ? {
              filePath,
              state: "MOVED",
              target: moved.value,
              reason: imported.error.type,
            }
          : {
              filePath,
              state: "IMPORTED",
              target: moved.value,
              albumPaths: imported.value,
            };
      };

      const records: TransferRecord[] = [];
      try {
        for (const filePath of completed) {
          try {
            records.push(await transferOne(filePath));
          } catch (error) {
            logger.error({ error })`處理 ${filePath} 時發生例外`;
            records.push({ filePath, state: "FAILED", reason: "UNEXPECTED" });
          }
        }
      } finally {
        await dispose(exifService);
      }

      // 4) 報告
      await importer.flush();
      await dumper.dump("transfer-media", {
        root,
        destDir,
        total: records.length,
        records,
      });
      const imported = records.filter((r) => r.state === "IMPORTED").length;
      logger.info({ event: "done" })`完成，匯入 ${imported}/${records.length} 個檔案`;
    });
}
