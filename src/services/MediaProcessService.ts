import type { MediaMetadata } from "@/types";

export type ProcessState =
  | "RECEIVED"
  | "SKIP"
  | "EMPTY"
  | "WRITE_PENDING"
  | "WRITTEN"
  | "WRITE_FAILED"
  | "VERIFIED"
  | "VERIFY_FAILED"
  | "CLEANUP"
  | "RENAMED"
  | "RENAME_FAILED"
  | "READ_FAILED";

export const terminalStates = [
  "SKIP",
  "WRITE_FAILED",
  "VERIFY_FAILED",
  "RENAMED",
  "RENAME_FAILED",
  "READ_FAILED",
] as const satisfies readonly ProcessState[];

export type TerminalState = (typeof terminalStates)[number];
export type ActiveState = Exclude<ProcessState, TerminalState>;

export function isTerminal(state: ProcessState): state is TerminalState {
  return terminalStates.some((s) => s === state);
}

export type ProcessIssue = {
  state: ProcessState;
  severity: "error" | "warning";
  message: string;
};

export type ProcessResult = {
  originPath: string;
  /** 改名成功時為新路徑，其餘情況與 originPath 相同 */
  finalPath: string;
  state: TerminalState;
  history: ProcessState[];
  metadata?: MediaMetadata;
  issues: ProcessIssue[];
};

export type ProcessOptions = {
  /** 附加在檔名最後的序號 */
  sequence?: string;
};

export interface MediaProcessService {
  /**
   * 讀取、寫入、驗證中繼資料，成功後刪除 sidecar 再改名。
   * 不會拋出，所有失敗都反映在結果的 state 與 issues。
   */
  process(filePath: string, options?: ProcessOptions): Promise<ProcessResult>;
}
