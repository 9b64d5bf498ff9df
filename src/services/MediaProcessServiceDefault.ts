import path from "node:path";

import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import type { ExifService } from "@/services/ExifService";
import {
  type FilenameGenerator,
  hasCompletionMarker,
} from "@/services/FilenameGenerator";
import type { MediaFileStore } from "@/services/MediaFileStore";
import type {
  ActiveState,
  MediaProcessService,
  ProcessIssue,
  ProcessOptions,
  ProcessResult,
  ProcessState,
  TerminalState,
} from "@/services/MediaProcessService";
import { isTerminal } from "@/services/MediaProcessService";
import type { MetadataAggregator } from "@/services/MetadataAggregator";
import { buildWriteFields, mediaKindOf } from "@/services/MetadataFields";
import type { MetadataVerifier } from "@/services/MetadataVerifier";
import { type SidecarReader, sidecarCandidates } from "@/services/SidecarReader";
import type { MediaKind, MediaMetadata } from "@/types";

type ProcessContext = {
  readonly filePath: string;
  readonly kind: MediaKind;
  readonly sequence?: string;
  readonly logger: Logger;
  sidecarPath?: string;
  metadata?: MediaMetadata;
  finalPath: string;
  issues: ProcessIssue[];
};

type Transition = (ctx: ProcessContext) => Promise<ProcessState>;

/** 轉移函式意外拋出時的終止狀態 */
const failureStateOf: Record<ActiveState, TerminalState> = {
  RECEIVED: "READ_FAILED",
  EMPTY: "RENAME_FAILED",
  WRITE_PENDING: "WRITE_FAILED",
  WRITTEN: "VERIFY_FAILED",
  VERIFIED: "RENAME_FAILED",
  CLEANUP: "RENAME_FAILED",
};

function messageOf(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

export class MediaProcessServiceDefault implements MediaProcessService {
  private readonly logger: Logger;

  private readonly transitions: Record<ActiveState, Transition> = {
    RECEIVED: (ctx) => this.receive(ctx),
    EMPTY: async (ctx) => {
      ctx.logger.info({ emoji: "🈳" })`沒有任何中繼資料，略過寫入`;
      return "CLEANUP";
    },
    WRITE_PENDING: (ctx) => this.write(ctx),
    WRITTEN: (ctx) => this.verify(ctx),
    VERIFIED: async () => "CLEANUP",
    CLEANUP: (ctx) => this.cleanup(ctx),
  };

  constructor(
    private readonly deps: {
      logger: Logger;
      exifService: ExifService;
      sidecarReader: SidecarReader;
      aggregator: MetadataAggregator;
      filenameGenerator: FilenameGenerator;
      verifier: MetadataVerifier;
      fileStore: MediaFileStore;
    }
  ) {
    this.logger = deps.logger.extend("MediaProcessService");
  }

  async process(
    filePath: string,
    options: ProcessOptions = {}
  ): Promise<ProcessResult> {
    const ctx: ProcessContext = {
      filePath,
      kind: mediaKindOf(filePath),
      sequence: options.sequence,
      logger: this.logger.append({ file: path.basename(filePath) }),
      finalPath: filePath,
      issues: [],
    };

    let state: ProcessState = "RECEIVED";
    const history: ProcessState[] = [state];
    while (!isTerminal(state)) {
      const current: ActiveState = state;
      try {
        state = await this.transitions[current](ctx);
      } catch (error) {
        ctx.logger.error({ error, state: current })`處理時發生未預期的錯誤`;
        ctx.issues.push({
          state: current,
          severity: "error",
          message: messageOf(error),
        });
        state = failureStateOf[current];
      }
      history.push(state);
    }

    ctx.logger.debug({ history })`處理結束 ${state}`;
    return {
      originPath: filePath,
      finalPath: ctx.finalPath,
      state,
      history,
      metadata: ctx.metadata,
      issues: ctx.issues,
    };
  }

  private fail(ctx: ProcessContext, state: ProcessState, message: string) {
    ctx.logger.error({ state })`${message}`;
    ctx.issues.push({ state, severity: "error", message });
  }

  private async receive(ctx: ProcessContext): Promise<ProcessState> {
    const { exifService, sidecarReader, aggregator, fileStore } = this.deps;
    if (hasCompletionMarker(ctx.filePath)) {
      ctx.logger.debug("已帶完成標記，略過");
      return "SKIP";
    }

    for (const candidate of sidecarCandidates(ctx.filePath)) {
      if (await fileStore.exists(candidate)) {
        ctx.sidecarPath = candidate;
        break;
      }
    }
    const sidecar = ctx.sidecarPath
      ? await sidecarReader.read(ctx.sidecarPath)
      : undefined;

    const tagsResult = await exifService.readTags(ctx.filePath);
    if (isErr(tagsResult)) {
      if (tagsResult.error.type === "FILE_NOT_FOUND") {
        this.fail(ctx, "RECEIVED", tagsResult.error.message);
        return "READ_FAILED";
      }
      ctx.logger.warn({ reason: tagsResult.error.message })`無法讀取內嵌標籤，只使用 sidecar`;
    }
    const embedded = tagsResult.ok ? tagsResult.value : {};

    ctx.metadata = aggregator.aggregate(sidecar, embedded);
    return aggregator.isEmpty(ctx.metadata) ? "EMPTY" : "WRITE_PENDING";
  }

  private async write(ctx: ProcessContext): Promise<ProcessState> {
    const metadata = ctx.metadata;
    if (!metadata) return "WRITE_FAILED";
    const fields = buildWriteFields(metadata, ctx.kind);
    const result = await this.deps.exifService.writeTags(ctx.filePath, fields);
    if (isErr(result)) {
      this.fail(ctx, "WRITE_PENDING", `寫入失敗: ${result.error.message}`);
      return "WRITE_FAILED";
    }
    ctx.logger.info({ emoji: "✍️" })`已寫入 ${Object.keys(fields).length} 個標籤`;
    return "WRITTEN";
  }

  private async verify(ctx: ProcessContext): Promise<ProcessState> {
    const metadata = ctx.metadata;
    if (!metadata) return "VERIFY_FAILED";
    const tagsResult = await this.deps.exifService.readTags(ctx.filePath);
    if (isErr(tagsResult)) {
      this.fail(ctx, "WRITTEN", `驗證時讀取失敗: ${tagsResult.error.message}`);
      return "VERIFY_FAILED";
    }
    const report = this.deps.verifier.verify(metadata, tagsResult.value, ctx.kind);
    for (const issue of report.issues) {
      ctx.issues.push({
        state: "WRITTEN",
        severity: issue.severity,
        message: `${issue.field} 預期 ${issue.expected}`,
      });
    }
    return report.passed ? "VERIFIED" : "VERIFY_FAILED";
  }

  /** 先刪除 sidecar 再改名；sidecar 路徑由原檔名推得，順序不可對調 */
  private async cleanup(ctx: ProcessContext): Promise<ProcessState> {
    const { fileStore, filenameGenerator } = this.deps;
    if (ctx.sidecarPath) {
      const removed = await fileStore.remove(ctx.sidecarPath);
      if (isErr(removed)) {
        ctx.logger.error({ sidecar: ctx.sidecarPath })`刪除 sidecar 失敗，仍繼續改名: ${removed.error.message}`;
        ctx.issues.push({
          state: "CLEANUP",
          severity: "warning",
          message: `刪除 sidecar 失敗: ${removed.error.message}`,
        });
      }
    }

    const metadata = ctx.metadata ?? { keywords: [], location: {} };
    const name =
      filenameGenerator.generate(metadata, ctx.filePath, ctx.sequence) ??
      filenameGenerator.fallback(ctx.filePath);
    const target = path.join(path.dirname(ctx.filePath), name);
    if (target === ctx.filePath) return "RENAMED";

    const renamed = await fileStore.rename(ctx.filePath, target);
    if (isErr(renamed)) {
      this.fail(ctx, "CLEANUP", `改名失敗: ${renamed.error.message}`);
      return "RENAME_FAILED";
    }
    ctx.finalPath = target;
    ctx.logger.info({ emoji: "🏷️", target })`改名為 ${name}`;
    return "RENAMED";
  }
}
