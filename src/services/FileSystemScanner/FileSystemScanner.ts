import type { Result } from "~shared/utils/Result";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

export interface FileSystemScanner {
  /**
   * 列出 rootPath 第一層的檔案（含不指向資料夾的 symlink），回傳絕對路徑。
   */
  scan(
    rootPath: string,
    options?: { allowExts?: readonly string[] }
  ): Promise<Result<string[], ScanError>>;
}
