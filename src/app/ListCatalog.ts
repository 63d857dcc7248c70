import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { isErr } from "~shared/utils/Result";

import { ExifServiceExifTool } from "@/services/ExifService";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { ImageCatalogDefault } from "@/services/ImageCatalogDefault";
import { MetadataDateResolverDefault } from "@/services/MetadataDateResolverDefault";
import { folderNameOf } from "@/utils/calendarDate";
import { expandHome } from "@/utils/helper";

export function registerListCatalog(cli: CAC, baseLogger: Logger) {
  cli
    .command("list <source>", "列出相片、判斷出的日期與將放入的資料夾")
    .action(async (source: string) => {
      const logger = baseLogger.extend("list", { emoji: "📋" });
      const exifService = new ExifServiceExifTool();
      try {
        const catalog = new ImageCatalogDefault({
          scanner: new FileSystemScannerDefault(),
          dateResolver: new MetadataDateResolverDefault({ exifService, logger }),
          logger,
        });
        const scanRes = await catalog.scan(expandHome(source));
        if (isErr(scanRes)) {
          logger.error({
            emoji: "❌",
            error: scanRes.error,
          })`掃描來源目錄失敗: ${scanRes.error.message}`;
          process.exitCode = 1;
          return;
        }

        for (const record of scanRes.value) {
          const dateRes = await catalog.resolveDate(record.sourcePath);
          if (isErr(dateRes)) {
            logger.warn({
              disposition: record.disposition,
            })`${record.fileName} 無法判斷日期`;
            continue;
          }
          const date = dateRes.value;
          logger.info({
            disposition: record.disposition,
            source: date.source,
          })`${record.fileName} → ${folderNameOf(date)}`;
        }
      } finally {
        await dispose(exifService);
      }
    });
}
