import type { CAC } from "cac";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { isErr } from "~shared/utils/Result";

import { getAppConfig } from "@/config";
import { mediaExtensions } from "@/constants";
import { ExifServiceExifTool } from "@/services/ExifService";
import { hasCompletionMarker } from "@/services/FilenameGenerator";
import { FilenameGeneratorDefault } from "@/services/FilenameGeneratorDefault";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { MediaFileStoreFs } from "@/services/MediaFileStore";
import type { ProcessResult } from "@/services/MediaProcessService";
import { MediaProcessServiceDefault } from "@/services/MediaProcessServiceDefault";
import { MetadataAggregatorDefault } from "@/services/MetadataAggregatorDefault";
import { MetadataVerifier } from "@/services/MetadataVerifier";
import { SidecarReaderXmp } from "@/services/SidecarReader";
import { confirm, expandHome } from "@/utils/helper";

type ProcessMediaOptions = {
  yes?: boolean;
  nonRecursive?: boolean;
  number?: boolean;
};

export function registerProcessMedia(cli: CAC, baseLogger: Logger) {
  cli
    .command("process <folder>", "將 sidecar 中繼資料寫入媒體檔並依內容改名")
    .option("--yes", "略過確認，直接執行", { default: false })
    .option("--non-recursive", "只掃描單層，不遞迴", { default: false })
    .option("--number", "在檔名最後加上三位數流水號", { default: false })
    .action(async (folder: string, options: ProcessMediaOptions) => {
      const logger = baseLogger.extend("process");
      const config = getAppConfig();

      // 1) 掃描媒體檔
      const root = expandHome(folder);
      const scanner = new FileSystemScannerDefault();
      const scanRes = await scanner.scan(root, {
        recursive: !options.nonRecursive,
        allowExts: mediaExtensions,
        exclude: hasCompletionMarker,
      });
      if (isErr(scanRes)) {
        logger.error({ error: scanRes.error })`掃描來源目錄失敗`;
        process.exit(1);
      }
      const pending = scanRes.value;
      logger.info({ emoji: "🔎" })`掃描完成，待處理 ${pending.length} 個檔案`;
      if (pending.length === 0) return;

      // 2) 確認
      const proceed =
        options.yes ||
        (await confirm(
          logger,
          `將寫入並改名 ${pending.length} 個檔案，是否繼續？ [y/N] `
        ));
      if (!proceed) {
        logger.warn({ emoji: "⏹️" })`使用者取消`;
        return;
      }

      // 3) 逐一處理
      const exifService = new ExifServiceExifTool({ logger });
      const service = new MediaProcessServiceDefault({
        logger,
        exifService,
        sidecarReader: new SidecarReaderXmp({ logger }),
        aggregator: new MetadataAggregatorDefault({
          logger,
          addRatingKeyword: config.ADD_RATING_KEYWORD,
          generateTitle: config.GENERATE_TITLE,
          exportKeywordPrefix: config.EXPORT_KEYWORD_PREFIX,
        }),
        filenameGenerator: new FilenameGeneratorDefault(),
        verifier: new MetadataVerifier({ logger }),
        fileStore: new MediaFileStoreFs(),
      });

      const results: ProcessResult[] = [];
      try {
        for (const [index, file] of pending.entries()) {
          const sequence = options.number
            ? String(index + 1).padStart(3, "0")
            : undefined;
          results.push(await service.process(file, { sequence }));
        }
      } finally {
        await dispose(exifService);
      }

      // 4) 報告
      const byState: Record<string, number> = {};
      for (const result of results) {
        byState[result.state] = (byState[result.state] ?? 0) + 1;
      }
      const dumper = new DumpWriterDefault(logger, config.DUMP_DIR);
      await dumper.dump("process-media", {
        root,
        total: results.length,
        byState,
        results: results.map(({ originPath, finalPath, state, issues }) => ({
          originPath,
          finalPath,
          state,
          issues,
        })),
      });
      logger.info({ event: "done", byState })`處理完成 ${results.length} 個檔案`;
    });
}
