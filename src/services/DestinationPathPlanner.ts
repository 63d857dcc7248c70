import type { Result } from "~shared/utils/Result";

import type { CalendarDate } from "@/types";

export interface DestinationPathPlanner {
  /**
   * 產生 {destinationRoot}/{YYYY-MM-DD}/{檔名} 的目標路徑。
   * 會建立日期資料夾，但不建立檔案；同名時依序改用 "name (1).ext"、"name (2).ext"。
   */
  plan(
    destinationRoot: string,
    date: CalendarDate,
    originalFileName: string
  ): Promise<Result<string, PlanError>>;
}

export type PlanError = {
  type: "CREATE_FOLDER_FAILED";
  folder: string;
  code?: string;
  message: string;
};
