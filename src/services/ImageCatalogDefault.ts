import { constants } from "node:fs";
import { access, stat } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { imageExtensions } from "@/constants";
import type { Disposition, RecordStatus, ResolvedDate } from "@/types";

import type { FileSystemScanner, ScanError } from "./FileSystemScanner";
import type {
  CatalogError,
  ImageCatalog,
  ImageRecord,
} from "./ImageCatalog";
import type {
  MetadataDateResolver,
  ResolveError,
} from "./MetadataDateResolver";

type CatalogEntry = {
  sourcePath: string;
  fileName: string;
  readable: boolean;
  disposition: Disposition;
  status: RecordStatus;
  resolvedDate?: ResolvedDate;
  /** resolvedDate 對應的 `${size}:${mtimeMs}` */
  fingerprint?: string;
};

export class ImageCatalogDefault implements ImageCatalog {
  private readonly scanner: FileSystemScanner;
  private readonly dateResolver: MetadataDateResolver;
  private readonly logger: Logger;
  private entries = new Map<string, CatalogEntry>();
  private currentSourceDir: string | undefined;

  constructor(deps: {
    scanner: FileSystemScanner;
    dateResolver: MetadataDateResolver;
    logger: Logger;
  }) {
    this.scanner = deps.scanner;
    this.dateResolver = deps.dateResolver;
    this.logger = deps.logger.extend("ImageCatalogDefault");
  }

  get sourceDir() {
    return this.currentSourceDir;
  }

  async scan(
    sourceDir: string
  ): Promise<Result<readonly ImageRecord[], ScanError>> {
    const root = path.resolve(sourceDir);
    const scanRes = await this.scanner.scan(root, {
      allowExts: imageExtensions,
    });
    if (isErr(scanRes)) return scanRes;

    // 以檔名的 code point 排序，重複掃描結果一致
    const sorted = [...scanRes.value].sort((a, b) =>
      compareCodePoint(path.basename(a), path.basename(b))
    );

    const entries = new Map<string, CatalogEntry>();
    for (const sourcePath of sorted) {
      const readable = await isReadable(sourcePath);
      entries.set(sourcePath, {
        sourcePath,
        fileName: path.basename(sourcePath),
        readable,
        disposition: readable ? "COPY" : "SKIP",
        status: { type: "PENDING" },
      });
    }

    this.entries = entries;
    this.currentSourceDir = root;

    const unreadable = sorted.length - this.countReadable();
    this.logger.info({
      emoji: "🔎",
      count: entries.size,
      unreadable,
    })`掃描 ${root} 完成，共 ${entries.size} 張相片`;
    return ok(this.records());
  }

  records(): readonly ImageRecord[] {
    return Array.from(this.entries.values(), toRecord);
  }

  get(sourcePath: string): ImageRecord | undefined {
    const entry = this.entries.get(sourcePath);
    return entry ? toRecord(entry) : undefined;
  }

  setDisposition(
    sourcePath: string,
    disposition: Disposition
  ): Result<ImageRecord, CatalogError> {
    const entry = this.entries.get(sourcePath);
    if (!entry) return err({ type: "NOT_FOUND", sourcePath });
    entry.disposition = disposition;
    return ok(toRecord(entry));
  }

  setStatus(
    sourcePath: string,
    status: RecordStatus
  ): Result<ImageRecord, CatalogError> {
    const entry = this.entries.get(sourcePath);
    if (!entry) return err({ type: "NOT_FOUND", sourcePath });
    entry.status = status;
    return ok(toRecord(entry));
  }

  async resolveDate(
    sourcePath: string
  ): Promise<Result<ResolvedDate, CatalogError | ResolveError>> {
    const entry = this.entries.get(sourcePath);
    if (!entry) return err({ type: "NOT_FOUND", sourcePath });

    const fingerprint = await fingerprintOf(sourcePath);
    if (
      entry.resolvedDate &&
      fingerprint !== undefined &&
      entry.fingerprint === fingerprint
    ) {
      return ok(entry.resolvedDate);
    }

    const resolved = await this.dateResolver.resolve(sourcePath);
    if (isErr(resolved)) return resolved;
    entry.resolvedDate = resolved.value;
    entry.fingerprint = fingerprint;
    return resolved;
  }

  private countReadable() {
    let count = 0;
    for (const entry of this.entries.values()) if (entry.readable) count++;
    return count;
  }
}

function toRecord(entry: CatalogEntry): ImageRecord {
  return {
    sourcePath: entry.sourcePath,
    fileName: entry.fileName,
    readable: entry.readable,
    disposition: entry.disposition,
    status: entry.status,
    resolvedDate: entry.resolvedDate,
  };
}

function compareCodePoint(a: string, b: string) {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

async function isReadable(filePath: string) {
  try {
    await access(filePath, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

async function fingerprintOf(filePath: string) {
  try {
    const stats = await stat(filePath);
    return `${stats.size}:${stats.mtimeMs}`;
  } catch {
    return undefined;
  }
}
