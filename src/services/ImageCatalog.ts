import type { Result } from "~shared/utils/Result";

import type { Disposition, RecordStatus, ResolvedDate } from "@/types";

import type { ScanError } from "./FileSystemScanner";
import type { ResolveError } from "./MetadataDateResolver";

/**
 * 目錄中一張相片的分類紀錄，以 sourcePath 識別。
 */
export interface ImageRecord {
  readonly sourcePath: string;
  readonly fileName: string;
  /** 掃描當下是否可讀；不可讀者預設為 SKIP */
  readonly readable: boolean;
  readonly disposition: Disposition;
  readonly status: RecordStatus;
  /** 第一次 resolveDate 後才有值 */
  readonly resolvedDate?: ResolvedDate;
}

export type CatalogError = { type: "NOT_FOUND"; sourcePath: string };

/**
 * 單一來源資料夾的相片清單，也是處置方式的唯一來源。
 * 呼叫端約定：BatchProcessor 執行期間不可修改處置方式。
 */
export interface ImageCatalog {
  readonly sourceDir: string | undefined;

  /** 掃描並整個取代目前清單，處置方式回到預設 */
  scan(sourceDir: string): Promise<Result<readonly ImageRecord[], ScanError>>;

  records(): readonly ImageRecord[];
  get(sourcePath: string): ImageRecord | undefined;

  setDisposition(
    sourcePath: string,
    disposition: Disposition
  ): Result<ImageRecord, CatalogError>;

  /** 僅供 BatchProcessor 回寫處理狀態 */
  setStatus(
    sourcePath: string,
    status: RecordStatus
  ): Result<ImageRecord, CatalogError>;

  /** 快取的日期解析；檔案大小或修改時間變動時重新解析 */
  resolveDate(
    sourcePath: string
  ): Promise<Result<ResolvedDate, CatalogError | ResolveError>>;
}
