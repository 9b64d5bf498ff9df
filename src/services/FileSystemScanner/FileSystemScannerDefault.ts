import { readdir } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type { FileSystemScanner, ScanError, ScanOptions } from "./FileSystemScanner";

export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>> {
    const allowExts = options?.allowExts ?? [];
    const isRecursive = options?.recursive ?? true;
    const exclude = options?.exclude ?? (() => false);
    const allowExtsSet = new Set(
      allowExts.map((e) => (e.startsWith(".") ? e : `.${e}`).toLowerCase())
    );
    try {
      const files = await readdir(rootPath, {
        recursive: isRecursive,
        withFileTypes: true,
      });
      const fullPaths = files
        .filter((d) => {
          if (!d.isFile() || d.name.startsWith(".")) return false;
          if (allowExtsSet.size === 0) return true;
          return allowExtsSet.has(path.extname(d.name).toLowerCase());
        })
        .map((d) => path.join(d.parentPath, d.name))
        .filter((p) => !exclude(p))
        .sort();
      return ok(fullPaths);
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }
}
