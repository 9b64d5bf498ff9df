import { describe, expect, test } from "vitest";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";

import { appConfigSchema } from "@/config";

describe("appConfigSchema", () => {
  test("標題產生與匯出關鍵字預設關閉", () => {
    const config = buildConfigFactoryEnv(appConfigSchema, {})();
    expect(config.GENERATE_TITLE).toBe(false);
    expect(config.EXPORT_KEYWORD_PREFIX).toBeUndefined();
  });

  test("由環境變數開啟", () => {
    const config = buildConfigFactoryEnv(appConfigSchema, {
      GENERATE_TITLE: "true",
      EXPORT_KEYWORD_PREFIX: "Lightroom_Export",
    })();
    expect(config.GENERATE_TITLE).toBe(true);
    expect(config.EXPORT_KEYWORD_PREFIX).toBe("Lightroom_Export");
  });
});
