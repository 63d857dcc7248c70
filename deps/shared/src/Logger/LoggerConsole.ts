import { format } from "date-fns";
import kleur from "kleur";

import {
  type EmojiMap,
  type LogContext,
  type LogLevel,
  type LogMethod,
  type LogRecord,
  type LogTemplate,
  type LogThreshold,
  type LogTransport,
  type Logger,
  type SerializedError,
  logLevelOrder,
} from "./Logger";

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  trace: "🔬",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

export class LoggerConsole implements Logger {
  readonly trace: LogMethod;
  readonly debug: LogMethod;
  readonly info: LogMethod;
  readonly warn: LogMethod;
  readonly error: LogMethod;

  private readonly threshold: LogThreshold;
  private readonly path: readonly string[];
  private readonly context: LogContext;
  private readonly emojiMap: EmojiMap;
  private readonly transports: LogTransport[];

  constructor(
    threshold: LogThreshold,
    path: readonly string[] = [],
    context: LogContext = {},
    emojiMap: EmojiMap = defaultEmojiMap,
    transports: LogTransport[] = []
  ) {
    this.threshold = threshold;
    this.path = path;
    this.context = context;
    this.emojiMap = emojiMap;
    // 子 logger 共用同一個 transports 陣列
    this.transports = transports;

    this.trace = this.buildMethod("trace");
    this.debug = this.buildMethod("debug");
    this.info = this.buildMethod("info");
    this.warn = this.buildMethod("warn");
    this.error = this.buildMethod("error");
  }

  extend(name: string, context: LogContext = {}): Logger {
    return new LoggerConsole(
      this.threshold,
      [...this.path, name],
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  append(context: LogContext): Logger {
    return new LoggerConsole(
      this.threshold,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  /** 關閉所有 transport（含子 logger 共用者） */
  async [Symbol.asyncDispose]() {
    const transports = this.transports.splice(0);
    for (const transport of transports) {
      await transport[Symbol.asyncDispose]();
    }
  }

  private buildMethod(level: LogLevel): LogMethod {
    const write = (
      context: LogContext | undefined,
      message: string,
      plainMessage: string,
      values: Record<string, unknown> = {}
    ) => this.write(level, context, message, plainMessage, values);

    function log(message: string): void;
    function log(context: LogContext, message: string): void;
    function log(context?: LogContext): LogTemplate;
    function log(
      contextOrMessage?: LogContext | string,
      message?: string
    ): LogTemplate | void {
      if (typeof contextOrMessage === "string") {
        write(undefined, contextOrMessage, contextOrMessage);
        return;
      }
      if (message !== undefined) {
        write(contextOrMessage, message, message);
        return;
      }
      return (strings: TemplateStringsArray, ...values: unknown[]) => {
        let colored = strings[0] ?? "";
        let plain = strings[0] ?? "";
        const vars: Record<string, unknown> = {};
        values.forEach((value, i) => {
          const text = formatValue(value);
          const rest = strings[i + 1] ?? "";
          colored += kleur.green(text) + rest;
          plain += text + rest;
          vars[`__${i}`] = value;
        });
        write(contextOrMessage, colored, plain, vars);
      };
    }

    return log;
  }

  private write(
    level: LogLevel,
    context: LogContext | undefined,
    message: string,
    plainMessage: string,
    values: Record<string, unknown>
  ) {
    if (logLevelOrder[level] < logLevelOrder[this.threshold]) return;

    const merged: LogContext = { ...this.context, ...context, ...values };
    const { event, emoji: _emoji, error, ...rest } = merged;
    const emoji = this.resolveEmoji(level, context?.emoji, event);
    const label = [...this.path, event ?? level].join(":");
    const json = Object.keys(rest).length > 0 ? ` ${safeStringify(rest)}` : "";
    const line = `${emoji} ${kleur.gray(format(new Date(), "HH:mm:ss"))} ${label}: ${message}${json}`;

    const err = serializeError(error);
    const print = consoleOf(level);
    print(line);
    if (err?.stack) print(err.stack);

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      ...rest,
      level,
      time: new Date().toISOString(),
      path: this.path.join(":"),
      event,
      msg: plainMessage,
      err,
    };
    for (const transport of this.transports) transport.write(record);
  }

  private resolveEmoji(
    level: LogLevel,
    callEmoji: string | undefined,
    event: string | undefined
  ) {
    if (callEmoji) return callEmoji;
    const eventEmoji = event ? this.emojiMap[event] : undefined;
    if (eventEmoji) return eventEmoji;
    if (level === "warn" || level === "error") {
      const levelEmoji = this.emojiMap[level];
      if (levelEmoji) return levelEmoji;
    }
    if (typeof this.context.emoji === "string") return this.context.emoji;
    return this.emojiMap[level] ?? "";
  }
}

function consoleOf(level: LogLevel): (text: string) => void {
  switch (level) {
    case "trace":
    case "debug":
      return (text) => console.debug(text);
    case "info":
      return (text) => console.info(text);
    case "warn":
      return (text) => console.warn(text);
    case "error":
      return (text) => console.error(text);
  }
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  if (typeof value === "object" && value !== null) return safeStringify(value);
  return String(value);
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value, (_key, v: unknown) =>
      v instanceof Error ? serializeError(v) : v
    );
  } catch (e) {
    return `[無法序列化: ${e instanceof Error ? e.message : String(e)}]`;
  }
}

export function serializeError(error: unknown): SerializedError | undefined {
  if (error === undefined || error === null) return undefined;
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: "NonError", message: formatValue(error) };
}
