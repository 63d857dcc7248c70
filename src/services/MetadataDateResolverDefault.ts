import { stat } from "node:fs/promises";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { ResolvedDate } from "@/types";
import { calendarDateOf } from "@/utils/calendarDate";
import { errnoOf } from "@/utils/helper";

import type { ExifService } from "./ExifService";
import type {
  MetadataDateResolver,
  ResolveError,
} from "./MetadataDateResolver";

export class MetadataDateResolverDefault implements MetadataDateResolver {
  private readonly exifService: ExifService;
  private readonly logger: Logger;

  constructor(deps: { exifService: ExifService; logger: Logger }) {
    this.exifService = deps.exifService;
    this.logger = deps.logger.extend("MetadataDateResolverDefault");
  }

  async resolve(filePath: string): Promise<Result<ResolvedDate, ResolveError>> {
    const exif = await this.exifService.readExif(filePath);
    if (isErr(exif)) {
      this.logger.debug({
        reason: exif.error.type,
      })`無法讀取 ${filePath} 的 metadata，改用檔案修改時間`;
    } else {
      const { captureDate, modifyDate } = exif.value;
      if (captureDate) return ok({ ...captureDate, source: "DATE_TIME_ORIGINAL" });
      if (modifyDate) return ok({ ...modifyDate, source: "MODIFY_DATE" });
    }

    try {
      const stats = await stat(filePath);
      return ok({ ...calendarDateOf(stats.mtime), source: "FILE_MTIME" });
    } catch (e) {
      return err({ type: "SOURCE_MISSING", filePath, ...errnoOf(e) });
    }
  }
}
