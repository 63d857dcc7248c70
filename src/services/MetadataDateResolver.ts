import type { Result } from "~shared/utils/Result";

import type { ResolvedDate } from "@/types";

export interface MetadataDateResolver {
  /**
   * 決定相片的歸檔日期：DateTimeOriginal → ModifyDate → 檔案修改時間。
   * metadata 讀不到或損毀時視同沒有該欄位；只有連檔案本身都無法 stat 時才失敗。
   */
  resolve(filePath: string): Promise<Result<ResolvedDate, ResolveError>>;
}

export type ResolveError = {
  type: "SOURCE_MISSING";
  filePath: string;
  code?: string;
  message: string;
};
