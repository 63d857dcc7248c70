import { once } from "node:events";
import {
  type Options,
  type RotatingFileStream,
  createStream,
} from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./Logger";

/**
 * 以 JSON Lines 寫入檔案，交由 rotating-file-stream 處理輪替。
 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;

  constructor(options: { filename: string; rfs?: Options }) {
    this.stream = createStream(options.filename, options.rfs);
  }

  write(record: LogRecord) {
    this.stream.write(`${JSON.stringify(record)}\n`);
  }

  async [Symbol.asyncDispose]() {
    const finished = once(this.stream, "finish");
    this.stream.end();
    await finished;
  }
}
