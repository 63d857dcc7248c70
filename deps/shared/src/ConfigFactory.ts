import { type Static, type TObject, Type as t } from "@sinclair/typebox";
import { Assert, Value } from "@sinclair/typebox/value";

export type EnvSource = Record<string, string | undefined>;

/**
 * 以 typebox schema 描述環境變數，回傳讀取函式。
 * 只挑出 schema 宣告的 key，套用預設值並轉型後驗證；不合法時丟出 AssertError。
 */
export function buildConfigFactoryEnv<T extends TObject>(
  schema: T,
  env: EnvSource = process.env
) {
  return (): Static<T> => {
    const picked: Record<string, unknown> = {};
    for (const key of Object.keys(schema.properties)) {
      const value = env[key];
      if (value === undefined || value === "") continue;
      picked[key] = value;
    }
    const value = Value.Convert(schema, Value.Default(schema, picked));
    Assert(schema, value);
    return value;
  };
}

/** 接受 "true" / "false" / "1" / "0" 的布林環境變數 */
export function envBoolean(options?: { default?: boolean }) {
  return t.Boolean(options);
}
