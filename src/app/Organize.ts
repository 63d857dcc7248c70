import type { CAC } from "cac";
import { mkdir } from "node:fs/promises";
import path from "node:path";

import type { DumpWriter } from "~shared/DumpWriter/DumpWriter";
import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { isErr } from "~shared/utils/Result";

import { getAppConfig } from "@/config";
import { BatchProcessorDefault } from "@/services/BatchProcessorDefault";
import type { BatchReport } from "@/services/BatchProcessor";
import { DestinationPathPlannerDefault } from "@/services/DestinationPathPlannerDefault";
import { ExifServiceExifTool } from "@/services/ExifService";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { FileTransferNode } from "@/services/FileTransferNode";
import type { ImageCatalog } from "@/services/ImageCatalog";
import { ImageCatalogDefault } from "@/services/ImageCatalogDefault";
import { MetadataDateResolverDefault } from "@/services/MetadataDateResolverDefault";
import type { Disposition } from "@/types";
import { folderNameOf } from "@/utils/calendarDate";
import {
  choose,
  confirm,
  dispositionAliases,
  errnoOf,
  expandHome,
  parseDisposition,
  Prompt,
  toArray,
} from "@/utils/helper";

type OrganizeOptions = {
  target?: string;
  action?: string;
  skip?: string | string[];
  delete?: string | string[];
  interactive?: boolean;
  yes?: boolean;
};

export function registerOrganize(cli: CAC, baseLogger: Logger) {
  cli
    .command("organize <source>", "依拍攝日期將相片複製到日期資料夾")
    .option("--target <path>", "目標根目錄，預設為 SORTER_TARGET_DIR")
    .option("--action <action>", "所有相片的預設處置：copy / skip / delete", {
      default: "copy",
    })
    .option("--skip <name>", "略過指定檔名（可重複）")
    .option("--delete <name>", "刪除指定檔名（可重複）")
    .option("--interactive", "逐張詢問處置方式", { default: false })
    .option("--yes", "略過刪除確認", { default: false })
    .action(async (source: string, options: OrganizeOptions) => {
      const logger = baseLogger.extend("organize", { emoji: "🗂️" });
      const config = getAppConfig();

      const defaultDisposition = parseDisposition(options.action ?? "copy");
      if (!defaultDisposition) {
        logger.error({ emoji: "❌" })`未知的處置方式: ${options.action}`;
        process.exitCode = 1;
        return;
      }

      const exifService = new ExifServiceExifTool();
      // 逐張詢問與刪除確認共用同一個輸入
      const prompt = new Prompt();
      try {
        const catalog = new ImageCatalogDefault({
          scanner: new FileSystemScannerDefault(),
          dateResolver: new MetadataDateResolverDefault({ exifService, logger }),
          logger,
        });

        // 掃描
        const scanRes = await catalog.scan(expandHome(source));
        if (isErr(scanRes)) {
          logger.error({
            emoji: "❌",
            error: scanRes.error,
          })`掃描來源目錄失敗: ${scanRes.error.message}`;
          process.exitCode = 1;
          return;
        }
        if (scanRes.value.length === 0) {
          logger.warn("來源目錄沒有可處理的相片檔案");
          return;
        }

        // 指定處置
        applyDefault(catalog, defaultDisposition);
        applyByName(catalog, logger, toArray(options.skip), "SKIP");
        applyByName(catalog, logger, toArray(options.delete), "DELETE");
        if (options.interactive) await askEach(catalog, prompt);

        const writer = new DumpWriterDefault(logger, config.SORTER_REPORT_DIR);
        await reportPlan(writer, catalog);

        // 確認
        const deletes = catalog
          .records()
          .filter((r) => r.disposition === "DELETE").length;
        const confirmed =
          deletes > 0 &&
          (options.yes ||
            config.SORTER_ASSUME_YES ||
            (await confirm(
              prompt,
              `將刪除 ${deletes} 張相片，是否繼續？ [y/N] `
            )));
        if (deletes > 0 && !confirmed) {
          logger.warn({ emoji: "⏹️" })`未確認刪除，${deletes} 張相片將改為略過`;
        }

        const target = path.resolve(
          expandHome(options.target ?? config.SORTER_TARGET_DIR)
        );
        try {
          await mkdir(target, { recursive: true });
        } catch (e) {
          logger.error({ emoji: "❌" })`無法建立目標目錄 ${target}: ${errnoOf(e).message}`;
          process.exitCode = 1;
          return;
        }

        // 執行，Ctrl+C 於目前這張完成後停止
        let cancelRequested = false;
        const processor = new BatchProcessorDefault({
          planner: new DestinationPathPlannerDefault(),
          transfer: new FileTransferNode(),
          logger,
        });
        const reportRes = await withInterrupt(
          () => {
            cancelRequested = true;
            logger.warn({ emoji: "⏹️" })`收到中斷訊號，完成目前這張後停止`;
          },
          () =>
            processor.process({
              catalog,
              destinationRoot: target,
              confirmed,
              onProgress: (e) =>
                logger.info({
                  event: "progress",
                })`[${e.index}/${e.total}] ${path.basename(e.sourcePath)} ${e.outcome}`,
              shouldCancel: () => cancelRequested,
            })
        );
        if (isErr(reportRes)) {
          logger.error({
            emoji: "❌",
            error: reportRes.error,
          })`無法處理: ${reportRes.error.message}`;
          process.exitCode = 1;
          return;
        }

        const report = reportRes.value;
        await writer.dump("相片整理結果", report);
        logSummary(logger, report);
      } finally {
        prompt.close();
        await dispose(exifService);
      }
    });
}

async function withInterrupt<T>(
  onInterrupt: () => void,
  run: () => Promise<T>
): Promise<T> {
  process.on("SIGINT", onInterrupt);
  try {
    return await run();
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

function applyDefault(catalog: ImageCatalog, disposition: Disposition) {
  for (const record of catalog.records()) {
    // 不可讀的檔案維持 SKIP，需要時以 --delete 指名
    if (!record.readable) continue;
    catalog.setDisposition(record.sourcePath, disposition);
  }
}

function applyByName(
  catalog: ImageCatalog,
  logger: Logger,
  names: string[],
  disposition: Disposition
) {
  const byName = new Map(catalog.records().map((r) => [r.fileName, r]));
  for (const name of names) {
    const record = byName.get(name);
    if (!record) {
      logger.warn()`清單中沒有 ${name}，忽略`;
      continue;
    }
    catalog.setDisposition(record.sourcePath, disposition);
  }
}

export async function askEach(catalog: ImageCatalog, prompt: Prompt) {
  for (const record of catalog.records()) {
    const picked = await choose(
      prompt,
      `${record.fileName} [c]opy/[s]kip/[d]elete（預設 ${record.disposition}）: `,
      dispositionAliases,
      record.disposition
    );
    catalog.setDisposition(record.sourcePath, picked);
  }
}

async function reportPlan(writer: DumpWriter, catalog: ImageCatalog) {
  const copies: Record<string, string[]> = {};
  const skips: string[] = [];
  const deletes: string[] = [];
  for (const record of catalog.records()) {
    if (record.disposition === "SKIP") {
      skips.push(record.fileName);
      continue;
    }
    if (record.disposition === "DELETE") {
      deletes.push(record.fileName);
      continue;
    }
    const dateRes = await catalog.resolveDate(record.sourcePath);
    const folder = isErr(dateRes) ? "(無法判斷)" : folderNameOf(dateRes.value);
    (copies[folder] ??= []).push(record.fileName);
  }
  await writer.dump("相片整理計劃", {
    source: catalog.sourceDir,
    copies,
    skips,
    deletes,
  });
}

function logSummary(logger: Logger, report: BatchReport) {
  const { summary, cancelled } = report;
  if (cancelled) {
    logger.warn({
      emoji: "⏹️",
    })`已中斷，完成 ${summary.total} 張`;
  }
  for (const result of report.results) {
    if (result.outcome === "FAILURE") {
      logger.warn({ code: result.errorCode })`${result.sourcePath}: ${result.message}`;
    }
  }
  logger.info({
    event: "done",
    ...summary,
  })`複製 ${summary.copied}、略過 ${summary.skipped}、刪除 ${summary.deleted}、失敗 ${summary.failed}`;
}
