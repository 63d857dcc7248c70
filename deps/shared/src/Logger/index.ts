import { Type as t } from "@sinclair/typebox";
import { mkdirSync } from "node:fs";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";

import type { LogThreshold } from "./Logger";
import { LoggerConsole } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export { LoggerConsole, defaultEmojiMap, serializeError } from "./LoggerConsole";

/** 等級設定的 schema，供各處環境變數共用 */
export function logThresholdSchema(defaultLevel: LogThreshold) {
  return t.Union(
    [
      t.Literal("trace"),
      t.Literal("debug"),
      t.Literal("info"),
      t.Literal("warn"),
      t.Literal("error"),
      t.Literal("silent"),
    ],
    { default: defaultLevel }
  );
}

const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: logThresholdSchema("info"),
    /** 設定後同時以 JSON Lines 寫入此目錄 */
    LOG_FILE_DIR: t.Optional(t.String()),
  })
);

export function createDefaultLoggerFromEnv() {
  const { LOG_LEVEL, LOG_FILE_DIR } = getLoggerConfig();
  const logger = new LoggerConsole(LOG_LEVEL);
  if (LOG_FILE_DIR) {
    mkdirSync(LOG_FILE_DIR, { recursive: true });
    logger.attachTransport(
      new RfsTransport({
        filename: "app.log",
        rfs: { path: LOG_FILE_DIR, size: "10M", maxFiles: 5 },
      })
    );
  }
  return logger;
}
