import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv, envBoolean } from "~shared/ConfigFactory";

export const getAppConfig = buildConfigFactoryEnv(
  t.Object({
    /** organize 未指定 --target 時的目標根目錄 */
    SORTER_TARGET_DIR: t.String({ default: "~/Pictures/sorted" }),
    /** 計畫與結果報告的輸出目錄 */
    SORTER_REPORT_DIR: t.String({ default: "reports" }),
    /** 等同於每次都帶 --yes */
    SORTER_ASSUME_YES: envBoolean({ default: false }),
  })
);
