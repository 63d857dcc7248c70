import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";

import type { DumpWriter } from "./DumpWriter";

export class DumpWriterDefault implements DumpWriter {
  private readonly logger: Logger;
  private readonly dir: string;

  constructor(logger: Logger, dir = "reports") {
    this.logger = logger.extend("DumpWriter");
    this.dir = dir;
  }

  async dump(name: string, data: unknown): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    const filePath = path.join(
      this.dir,
      `${format(new Date(), "yyyyMMdd-HHmmss")}-${sanitize(name)}.json`
    );
    await writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
    this.logger.info({ emoji: "📝", event: "dump" })`報告已輸出：${filePath}`;
    return filePath;
  }
}

/** 檔名不可含路徑分隔與保留字元 */
function sanitize(name: string) {
  return name.replace(/[\\/:*?"<>|]/g, "_");
}
