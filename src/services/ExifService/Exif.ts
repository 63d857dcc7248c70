import type { CalendarDate } from "@/types";

export type Exif = {
  /** 檔案完整路徑 */
  filePath: string;

  /** DateTimeOriginal：原始拍攝日期 */
  captureDate?: CalendarDate;

  /** ModifyDate（EXIF DateTime）：檔案內記錄的最後修改日期 */
  modifyDate?: CalendarDate;

  /** 相機型號 */
  cameraModel?: string;
};

export type ReadError =
  | { type: "FILE_NOT_FOUND"; message: string }
  | { type: "READ_FAILED"; message: string }
  | { type: "PARSE_FAILED"; message: string }
  | { type: "NO_EXIF_DATA"; message: string };
