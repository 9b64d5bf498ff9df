import {
  type Static,
  type TBoolean,
  type TNumber,
  type TObject,
  Type as t,
} from "@sinclair/typebox";
import { Assert, Value } from "@sinclair/typebox/value";

type Env = Record<string, string | undefined>;

/** 環境變數中的布林值："true"/"false"/"1"/"0" */
export function envBoolean(options?: { default?: boolean }): TBoolean {
  return t.Boolean(options);
}

/** 環境變數中的數值 */
export function envNumber(options?: {
  minimum?: number;
  default?: number;
}): TNumber {
  return t.Number(options);
}

/**
 * 建立讀取環境變數的設定工廠。
 * 只取 schema 宣告的欄位，空字串視為未設定；轉型後以 schema 驗證，不合法時拋出。
 */
export function buildConfigFactoryEnv<T extends TObject>(
  schema: T,
  env: Env = process.env
): () => Static<T> {
  return () => {
    const picked: Record<string, string> = {};
    for (const key of Object.keys(schema.properties)) {
      const value = env[key];
      if (value !== undefined && value !== "") picked[key] = value;
    }
    const config = Value.Convert(schema, Value.Default(schema, picked));
    Assert(schema, config);
    return config;
  };
}
