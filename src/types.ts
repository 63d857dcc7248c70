/** 實際存在的日曆日期，month 為 1-12 */
export type CalendarDate = {
  year: number;
  month: number;
  day: number;
};

export type DateSource = "DATE_TIME_ORIGINAL" | "MODIFY_DATE" | "FILE_MTIME";

export type ResolvedDate = CalendarDate & { source: DateSource };

export type Disposition = "COPY" | "SKIP" | "DELETE";

export type RecordStatus =
  | { type: "PENDING" }
  | { type: "PROCESSED" }
  | { type: "FAILED"; reason: string };
