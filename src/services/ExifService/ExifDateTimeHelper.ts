import type { ExifDate, ExifDateTime } from "exiftool-vendored";

import type { CalendarDate } from "@/types";
import { parseRawDate, toCalendarDate } from "@/utils/calendarDate";

/**
 * 將 EXIF 日期欄位轉為日曆日期。
 * 規則：
 * 1) 以 rawValue（"YYYY:MM:DD HH:mm:ss"）為準，取相機記錄的當地日期，不做時區換算。
 * 2) 沒有 rawValue 時使用 year / month / day 欄位。
 * 3) 0000:00:00 之類不存在的日期回傳 undefined。
 */
export function getCalendarDate(
  time: ExifDateTime | ExifDate | string | undefined
): CalendarDate | undefined {
  if (!time) return undefined;
  if (typeof time === "string") return parseRawDate(time);
  if (time.rawValue) {
    const fromRaw = parseRawDate(time.rawValue);
    if (fromRaw) return fromRaw;
  }
  return toCalendarDate(time.year, time.month, time.day);
}
