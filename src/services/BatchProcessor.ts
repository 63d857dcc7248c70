import type { Result } from "~shared/utils/Result";

import type { Disposition } from "@/types";

import type { ImageCatalog } from "./ImageCatalog";

export type Outcome = "SUCCESS" | "FAILURE";

export type ProcessingResult =
  | {
      outcome: "SUCCESS";
      sourcePath: string;
      disposition: Disposition;
      action: "COPIED" | "SKIPPED" | "DELETED";
      /** 僅在複製成功時存在 */
      destinationPath?: string;
      /** DELETE 未經確認而改為略過 */
      skippedReason?: "NOT_CONFIRMED";
    }
  | {
      outcome: "FAILURE";
      sourcePath: string;
      disposition: Disposition;
      errorKind: "IO_FAILURE";
      errorCode?: string;
      message: string;
    };

export type ProgressEvent = {
  /** 從 1 開始，嚴格遞增 */
  index: number;
  total: number;
  sourcePath: string;
  outcome: Outcome;
};

export type BatchSummary = {
  total: number;
  copied: number;
  skipped: number;
  deleted: number;
  failed: number;
};

export type BatchReport = {
  results: ProcessingResult[];
  /** shouldCancel 中途回傳 true；未處理的紀錄維持 PENDING 且沒有結果 */
  cancelled: boolean;
  summary: BatchSummary;
};

export type ProcessOptions = {
  catalog: ImageCatalog;
  destinationRoot: string;
  /** 呼叫端是否已確認刪除；false 時 DELETE 一律視為略過 */
  confirmed: boolean;
  onProgress?: (event: ProgressEvent) => void;
  /** 每筆處理前輪詢一次 */
  shouldCancel?: () => boolean;
};

export type ProcessError = {
  type: "INVALID_DESTINATION";
  destinationRoot: string;
  message: string;
};

export interface BatchProcessor {
  /**
   * 依掃描順序逐筆套用處置方式。
   * 單筆失敗只記錄在結果中，不中斷整批；目標目錄不合法時在處理前就回傳錯誤。
   */
  process(options: ProcessOptions): Promise<Result<BatchReport, ProcessError>>;
}
