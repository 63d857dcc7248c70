import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { type FileSystemScanner, type ScanError } from "./FileSystemScanner";

export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(
    rootPath: string,
    options?: { allowExts?: readonly string[] }
  ): Promise<Result<string[], ScanError>> {
    const allowExts = options?.allowExts ?? [];
    const lowerExts = allowExts.map((e) => {
      if (e.startsWith(".")) return e.toLowerCase();
      return `.${e.toLowerCase()}`;
    });
    const allowExtsSet = new Set(lowerExts);
    const root = path.resolve(rootPath);
    try {
      const dirents = await readdir(root, { withFileTypes: true });
      const fullPaths: string[] = [];
      for (const d of dirents) {
        if (allowExts.length > 0) {
          const ext = path.extname(d.name).toLowerCase();
          if (!allowExtsSet.has(ext)) continue;
        }
        const fullPath = path.join(root, d.name);
        if (await isFileEntry(d, fullPath)) fullPaths.push(fullPath);
      }
      return ok(fullPaths);
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }
}

async function isFileEntry(d: Dirent, fullPath: string) {
  if (d.isFile()) return true;
  if (!d.isSymbolicLink()) return false;
  try {
    return !(await stat(fullPath)).isDirectory();
  } catch {
    // 失效的 symlink 仍算檔案，交由上層判斷可讀性
    return true;
  }
}
