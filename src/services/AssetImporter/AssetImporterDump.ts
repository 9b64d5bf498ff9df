import type { DumpWriter } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { type Result, ok } from "~shared/utils/Result";

import type { AssetImporter, ImportError } from "./AssetImporter";

export type ImportPlanEntry = { filePath: string; albumPaths: string[] };

/**
 * 不實際匯入，將匯入計劃累積後以報告輸出，供外部相片庫工具接手。
 */
export class AssetImporterDump implements AssetImporter {
  private readonly logger: Logger;
  private readonly entries: ImportPlanEntry[] = [];

  constructor(private readonly deps: { logger: Logger; dumper: DumpWriter }) {
    this.logger = deps.logger.extend("AssetImporterDump");
  }

  async importAsset(
    filePath: string,
    albumPaths: string[]
  ): Promise<Result<void, ImportError>> {
    this.entries.push({ filePath, albumPaths: [...albumPaths] });
    this.logger.info({ emoji: "📥", albumPaths })`排入匯入計劃 ${filePath}`;
    return ok();
  }

  get plan(): readonly ImportPlanEntry[] {
    return this.entries;
  }

  /** 輸出匯入計劃，沒有項目時不輸出 */
  async flush(): Promise<string | undefined> {
    if (this.entries.length === 0) return undefined;
    return this.deps.dumper.dump("import-plan", {
      total: this.entries.length,
      assets: this.entries,
    });
  }
}
