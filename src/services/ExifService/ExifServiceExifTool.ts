import { exiftool } from "exiftool-vendored";
import { stat } from "node:fs/promises";

import { type Result, err, ok } from "~shared/utils/Result";

import type { Exif, ReadError } from "./Exif";
import { getCalendarDate } from "./ExifDateTimeHelper";
import type { ExifService } from "./ExifService";

export class ExifServiceExifTool implements ExifService {
  async readExif(filePath: string): Promise<Result<Exif, ReadError>> {
    try {
      await stat(filePath);
    } catch {
      return err({
        type: "FILE_NOT_FOUND",
        message: `找不到檔案: ${filePath}`,
      });
    }

    try {
      const tags = await exiftool.read(filePath);
      const captureDate = getCalendarDate(tags.DateTimeOriginal);
      const modifyDate = getCalendarDate(tags.ModifyDate);

      if (!captureDate && !modifyDate) {
        const errors = [...(tags.errors ?? [])];
        if (tags.Error) errors.push(tags.Error);
        if (errors.length > 0) {
          return err({
            type: "PARSE_FAILED",
            message: `解析 EXIF 失敗: ${filePath}: ${errors.join("; ")}`,
          });
        }
        return err({
          type: "NO_EXIF_DATA",
          message: `沒有可用的日期欄位: ${filePath}`,
        });
      }

      return ok({
        filePath,
        captureDate,
        modifyDate,
        cameraModel: tags.Model,
      });
    } catch (e) {
      return err({
        type: "READ_FAILED",
        message: `讀取 EXIF 失敗: ${filePath}: ${e instanceof Error ? e.message : String(e)}`,
      });
    }
  }

  async [Symbol.asyncDispose]() {
    await exiftool.end();
  }
}
