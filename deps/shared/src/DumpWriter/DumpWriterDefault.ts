import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";

export interface DumpWriter {
  /** 寫出 JSON 報告，回傳檔案路徑 */
  dump(name: string, data: unknown): Promise<string>;
}

export class DumpWriterDefault implements DumpWriter {
  private readonly logger: Logger;

  constructor(
    logger: Logger,
    private readonly dir = "dist/reports",
    private readonly now: () => Date = () => new Date()
  ) {
    this.logger = logger.extend("DumpWriter");
  }

  async dump(name: string, data: unknown): Promise<string> {
    const stamp = format(this.now(), "yyyyMMdd-HHmmss-SSS");
    const filePath = path.join(this.dir, `${stamp}-${name}.json`);
    await mkdir(this.dir, { recursive: true });
    await writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
    this.logger.info({ emoji: "📝" })`已輸出報告 ${filePath}`;
    return filePath;
  }
}
