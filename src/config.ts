import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv, envBoolean, envNumber } from "~shared/ConfigFactory";

/** LOG_LEVEL / LOG_FILE 由 createDefaultLoggerFromEnv 讀取 */
export const appConfigSchema = t.Object({
  ALBUM_MAPPING_PATH: t.String({ default: "album-mapping.json" }),
  ALBUM_CATEGORY_PREFIX: t.String({ default: "02" }),
  MIN_FILE_AGE_SECONDS: envNumber({ minimum: 0, default: 60 }),
  FILE_ACCESS_TIMEOUT_MS: envNumber({ minimum: 0, default: 5000 }),
  IMPORT_TIMEOUT_MS: envNumber({ minimum: 1, default: 10000 }),
  DUMP_DIR: t.String({ default: "dist/reports" }),
  ADD_RATING_KEYWORD: envBoolean({ default: false }),
  /** 沒有標題時以地點、城市、國家組成標題 */
  GENERATE_TITLE: envBoolean({ default: false }),
  /** 例如 "Lightroom_Export"，另加上 "<前綴>_on_yyyy_MM_dd" */
  EXPORT_KEYWORD_PREFIX: t.Optional(t.String()),
});

export const getAppConfig = buildConfigFactoryEnv(appConfigSchema);
