import { stat } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { RecordStatus } from "@/types";
import { errnoOf } from "@/utils/helper";

import type {
  BatchProcessor,
  BatchReport,
  BatchSummary,
  ProcessError,
  ProcessOptions,
  ProcessingResult,
} from "./BatchProcessor";
import type { DestinationPathPlanner } from "./DestinationPathPlanner";
import type { FileTransfer } from "./FileTransfer";
import type { ImageCatalog, ImageRecord } from "./ImageCatalog";

type Failure = Extract<ProcessingResult, { outcome: "FAILURE" }>;

export class BatchProcessorDefault implements BatchProcessor {
  private readonly planner: DestinationPathPlanner;
  private readonly transfer: FileTransfer;
  private readonly logger: Logger;

  constructor(deps: {
    planner: DestinationPathPlanner;
    transfer: FileTransfer;
    logger: Logger;
  }) {
    this.planner = deps.planner;
    this.transfer = deps.transfer;
    this.logger = deps.logger.extend("BatchProcessorDefault");
  }

  async process(
    options: ProcessOptions
  ): Promise<Result<BatchReport, ProcessError>> {
    const { catalog, confirmed, onProgress, shouldCancel } = options;
    const rootRes = await checkDestination(options.destinationRoot);
    if (isErr(rootRes)) {
      this.logger.error({
        emoji: "❌",
        error: rootRes.error,
      })`目標目錄不可用: ${rootRes.error.message}`;
      return rootRes;
    }
    const destinationRoot = rootRes.value;

    const records = catalog.records();
    const total = records.length;
    for (const record of records) {
      this.markStatus(catalog, record.sourcePath, { type: "PENDING" });
    }

    this.logger.info({
      event: "start",
      total,
      confirmed,
    })`開始處理 ${total} 張相片 → ${destinationRoot}`;

    const results: ProcessingResult[] = [];
    let cancelled = false;
    for (const [i, record] of records.entries()) {
      if (shouldCancel?.()) {
        cancelled = true;
        this.logger.warn({
          emoji: "⏹️",
          processed: i,
          remaining: total - i,
        })`已取消，剩餘 ${total - i} 張未處理`;
        break;
      }

      const result = await this.processOne(
        catalog,
        record,
        destinationRoot,
        confirmed
      );
      this.markStatus(
        catalog,
        record.sourcePath,
        result.outcome === "SUCCESS"
          ? { type: "PROCESSED" }
          : { type: "FAILED", reason: result.message }
      );
      results.push(result);
      onProgress?.({
        index: i + 1,
        total,
        sourcePath: record.sourcePath,
        outcome: result.outcome,
      });
    }

    const summary = summarize(results);
    this.logger.info({
      event: "done",
      ...summary,
      cancelled,
    })`處理結束：複製 ${summary.copied}、略過 ${summary.skipped}、刪除 ${summary.deleted}、失敗 ${summary.failed}`;
    return ok({ results, cancelled, summary });
  }

  private async processOne(
    catalog: ImageCatalog,
    record: ImageRecord,
    destinationRoot: string,
    confirmed: boolean
  ): Promise<ProcessingResult> {
    const { sourcePath, disposition } = record;
    switch (disposition) {
      case "SKIP":
        return { outcome: "SUCCESS", sourcePath, disposition, action: "SKIPPED" };
      case "DELETE":
        if (!confirmed) {
          this.logger.debug()`未確認刪除，略過 ${record.fileName}`;
          return {
            outcome: "SUCCESS",
            sourcePath,
            disposition,
            action: "SKIPPED",
            skippedReason: "NOT_CONFIRMED",
          };
        }
        return this.deleteOne(record);
      case "COPY":
        return this.copyOne(catalog, record, destinationRoot);
    }
  }

  private async copyOne(
    catalog: ImageCatalog,
    record: ImageRecord,
    destinationRoot: string
  ): Promise<ProcessingResult> {
    const { sourcePath, disposition } = record;

    const dateRes = await catalog.resolveDate(sourcePath);
    if (isErr(dateRes)) {
      const error = dateRes.error;
      return this.failure(record, {
        errorCode: error.type === "SOURCE_MISSING" ? error.code : undefined,
        message:
          error.type === "SOURCE_MISSING"
            ? `來源檔案無法存取: ${error.message}`
            : `清單中找不到 ${error.sourcePath}`,
      });
    }

    const planRes = await this.planner.plan(
      destinationRoot,
      dateRes.value,
      record.fileName
    );
    if (isErr(planRes)) {
      return this.failure(record, {
        errorCode: planRes.error.code,
        message: `無法建立資料夾 ${planRes.error.folder}: ${planRes.error.message}`,
      });
    }
    const destinationPath = planRes.value;

    const copyRes = await this.transfer.copy(sourcePath, destinationPath);
    if (isErr(copyRes)) {
      return this.failure(record, {
        errorCode: copyRes.error.code,
        message: `複製失敗: ${copyRes.error.message}`,
      });
    }

    this.logger.debug({
      emoji: "📦",
      source: dateRes.value.source,
    })`${sourcePath} → ${destinationPath}`;
    return {
      outcome: "SUCCESS",
      sourcePath,
      disposition,
      action: "COPIED",
      destinationPath,
    };
  }

  private async deleteOne(record: ImageRecord): Promise<ProcessingResult> {
    const removeRes = await this.transfer.remove(record.sourcePath);
    if (isErr(removeRes)) {
      return this.failure(record, {
        errorCode: removeRes.error.code,
        message: `刪除失敗: ${removeRes.error.message}`,
      });
    }
    this.logger.debug({ emoji: "🗑️" })`已刪除 ${record.sourcePath}`;
    return {
      outcome: "SUCCESS",
      sourcePath: record.sourcePath,
      disposition: record.disposition,
      action: "DELETED",
    };
  }

  private failure(
    record: ImageRecord,
    detail: { errorCode?: string; message: string }
  ): Failure {
    this.logger.warn({
      emoji: "⚠️",
      sourcePath: record.sourcePath,
      code: detail.errorCode,
    })`${record.fileName} 處理失敗：${detail.message}`;
    return {
      outcome: "FAILURE",
      sourcePath: record.sourcePath,
      disposition: record.disposition,
      errorKind: "IO_FAILURE",
      errorCode: detail.errorCode,
      message: detail.message,
    };
  }

  private markStatus(
    catalog: ImageCatalog,
    sourcePath: string,
    status: RecordStatus
  ) {
    const res = catalog.setStatus(sourcePath, status);
    if (isErr(res)) {
      this.logger.warn({
        sourcePath,
      })`清單中找不到 ${sourcePath}，無法更新狀態`;
    }
  }
}

async function checkDestination(
  destinationRoot: string
): Promise<Result<string, ProcessError>> {
  if (destinationRoot.trim() === "") {
    return err({
      type: "INVALID_DESTINATION",
      destinationRoot,
      message: "未指定目標目錄",
    });
  }
  const resolved = path.resolve(destinationRoot);
  try {
    const stats = await stat(resolved);
    if (!stats.isDirectory()) {
      return err({
        type: "INVALID_DESTINATION",
        destinationRoot,
        message: `${resolved} 不是資料夾`,
      });
    }
  } catch (e) {
    return err({
      type: "INVALID_DESTINATION",
      destinationRoot,
      message: `無法存取 ${resolved}: ${errnoOf(e).message}`,
    });
  }
  return ok(resolved);
}

function summarize(results: ProcessingResult[]): BatchSummary {
  const summary: BatchSummary = {
    total: results.length,
    copied: 0,
    skipped: 0,
    deleted: 0,
    failed: 0,
  };
  for (const result of results) {
    if (result.outcome === "FAILURE") {
      summary.failed++;
      continue;
    }
    if (result.action === "COPIED") summary.copied++;
    else if (result.action === "DELETED") summary.deleted++;
    else summary.skipped++;
  }
  return summary;
}
