import type { Result } from "~shared/utils/Result";

export type IoError = {
  type: "IO_FAILURE";
  code?: string;
  message: string;
};

export interface FileTransfer {
  /** 複製檔案內容與時間戳記；目標已存在時失敗，不覆蓋 */
  copy(from: string, to: string): Promise<Result<void, IoError>>;

  remove(filePath: string): Promise<Result<void, IoError>>;
}
