import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";
import {
  type Logger,
  LoggerConsole,
  logThresholdSchema,
} from "~shared/Logger";

const getTestLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    TEST_LOG_LEVEL: logThresholdSchema("silent"),
  })
);

/** 測試預設不輸出；需要觀察時設 TEST_LOG_LEVEL */
export function buildTestLogger(): Logger {
  return new LoggerConsole(getTestLoggerConfig().TEST_LOG_LEVEL).extend("test");
}
