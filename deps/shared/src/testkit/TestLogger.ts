import { type LogLevel, LoggerConsole, defaultEmojiMap, isLogLevel } from "~shared/Logger";

/** 測試用 logger，預設不輸出；設定 TEST_LOG_LEVEL 可打開 */
export function buildTestLogger(): LoggerConsole {
  const raw = process.env.TEST_LOG_LEVEL;
  const level: LogLevel = raw && isLogLevel(raw) ? raw : "silent";
  return new LoggerConsole(level, ["test"], {}, defaultEmojiMap);
}
