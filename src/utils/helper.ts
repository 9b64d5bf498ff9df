import { stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { stdin as input, stdout as output } from "node:process";
import { createInterface } from "node:readline/promises";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

export function expandHome(p: string) {
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export async function confirm(logger: Logger, question: string) {
  const rl = createInterface({ input, output });
  const ans = (await rl.question(question)).trim().toLowerCase();
  rl.close();
  const accepted = ans === "y" || ans === "yes";
  logger.debug({ answer: ans })`確認結果: ${accepted}`;
  return accepted;
}

export async function exists(p: string) {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

export type TimeoutError = { type: "TIMEOUT"; ms: number };

/**
 * 限時等待。逾時回傳 TIMEOUT，原本的工作不會被取消；
 * 工作本身拋出的錯誤照常拋出。
 */
export async function withTimeout<T>(
  task: Promise<T>,
  ms: number
): Promise<Result<T, TimeoutError>> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<"timeout">((resolve) => {
    timer = setTimeout(() => resolve("timeout"), ms);
  });
  try {
    const winner = await Promise.race([
      task.then((value) => ({ value })),
      timeout,
    ]);
    if (winner === "timeout") return err({ type: "TIMEOUT", ms });
    return ok(winner.value);
  } finally {
    clearTimeout(timer);
  }
}

export function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}
