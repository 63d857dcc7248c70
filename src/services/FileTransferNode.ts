import { constants } from "node:fs";
import { copyFile, rm, stat, unlink, utimes } from "node:fs/promises";

import { type Result, err, ok } from "~shared/utils/Result";

import { errnoOf } from "@/utils/helper";

import type { FileTransfer, IoError } from "./FileTransfer";

export class FileTransferNode implements FileTransfer {
  async copy(from: string, to: string): Promise<Result<void, IoError>> {
    try {
      await copyFile(from, to, constants.COPYFILE_EXCL);
      const stats = await stat(from);
      await utimes(to, stats.atime, stats.mtime);
      return ok();
    } catch (e) {
      const error = errnoOf(e);
      // EEXIST 代表目標不是這次建立的，不可清除
      if (error.code === "EEXIST") return err({ type: "IO_FAILURE", ...error });
      const leftover = await discard(to);
      return err({
        type: "IO_FAILURE",
        code: error.code,
        message: leftover
          ? `${error.message}（清除不完整的目標檔失敗: ${leftover}）`
          : error.message,
      });
    }
  }

  async remove(filePath: string): Promise<Result<void, IoError>> {
    try {
      await unlink(filePath);
      return ok();
    } catch (e) {
      return err({ type: "IO_FAILURE", ...errnoOf(e) });
    }
  }
}

/** 移除複製失敗留下的目標檔；回傳清除失敗的原因 */
async function discard(filePath: string): Promise<string | undefined> {
  try {
    await rm(filePath, { force: true });
    return undefined;
  } catch (e) {
    return errnoOf(e).message;
  }
}
