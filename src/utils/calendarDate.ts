import { isExists } from "date-fns";

import type { CalendarDate } from "@/types";

const RAW_DATE_RE = /^(\d{4})[:-](\d{2})[:-](\d{2})/;

export function toCalendarDate(
  year: number,
  month: number,
  day: number
): CalendarDate | undefined {
  if (![year, month, day].every(Number.isInteger)) return undefined;
  // EXIF 常見的 0000:00:00 佔位值
  if (year < 1) return undefined;
  if (!isExists(year, month - 1, day)) return undefined;
  return { year, month, day };
}

/**
 * 解析 "YYYY:MM:DD ..." 或 "YYYY-MM-DD..." 開頭的字串，只取日期部分。
 */
export function parseRawDate(raw: string): CalendarDate | undefined {
  const m = RAW_DATE_RE.exec(raw.trim());
  if (!m) return undefined;
  return toCalendarDate(Number(m[1]), Number(m[2]), Number(m[3]));
}

/** 取本地時區的日期 */
export function calendarDateOf(time: Date): CalendarDate {
  return {
    year: time.getFullYear(),
    month: time.getMonth() + 1,
    day: time.getDate(),
  };
}

/** 2024-03-18 */
export function folderNameOf(date: CalendarDate) {
  const pad = (n: number, l = 2) => String(n).padStart(l, "0");
  return `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}`;
}
