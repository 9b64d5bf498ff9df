import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";

import { type LogLevel, type Logger, isLogLevel } from "./Logger";
import { type EmojiMap, LoggerConsole } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export { type EmojiMap, LoggerConsole } from "./LoggerConsole";
export { RfsTransport } from "./RfsTransport";

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Optional(t.String()),
    LOG_FILE: t.Optional(t.String()),
    LOG_DIR: t.Optional(t.String()),
  })
);

/**
 * 依環境變數建立預設 logger：
 * - LOG_LEVEL：console 輸出等級，預設 info
 * - LOG_FILE / LOG_DIR：設定後另以 JSON lines 寫入輪替檔案
 */
export function createDefaultLoggerFromEnv(): Logger {
  const { LOG_LEVEL, LOG_FILE, LOG_DIR } = getLoggerConfig();
  const level: LogLevel = LOG_LEVEL && isLogLevel(LOG_LEVEL) ? LOG_LEVEL : "info";
  const logger = new LoggerConsole(level, [], {}, defaultEmojiMap);
  if (LOG_FILE) {
    logger.attachTransport(
      new RfsTransport({ filename: LOG_FILE, rfs: { path: LOG_DIR ?? "logs" } })
    );
  }
  return logger;
}
