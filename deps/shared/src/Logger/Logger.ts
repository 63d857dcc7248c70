export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";
export type LogThreshold = LogLevel | "silent";

export const logLevelOrder: Record<LogThreshold, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: 100,
};

/**
 * 附加在單筆日誌上的結構化資訊。
 * - event：事件名稱，會取代等級顯示在訊息前，也用於查 emoji
 * - emoji：指定顯示的 emoji
 * - error：錯誤物件，會輸出 stack
 */
export type LogContext = {
  event?: string;
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type LogTemplate = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export interface LogMethod {
  (message: string): void;
  (context: LogContext, message: string): void;
  (context?: LogContext): LogTemplate;
}

export type SerializedError = {
  name: string;
  message: string;
  stack?: string;
};

/** 交給 transport 的平坦紀錄，context 欄位直接展開 */
export type LogRecord = {
  level: LogLevel;
  time: string;
  path: string;
  event?: string;
  msg: string;
  err?: SerializedError;
  [key: string]: unknown;
};

export interface LogTransport extends AsyncDisposable {
  write(record: LogRecord): void;
}

export type EmojiMap = Partial<Record<string, string>>;

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;

  /** 建立子 logger，路徑加上 name，並合併 context */
  extend(name: string, context?: LogContext): Logger;

  /** 只合併 context，不改變路徑 */
  append(context: LogContext): Logger;

  attachTransport(transport: LogTransport): void;
}
