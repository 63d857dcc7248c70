import { lstat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { type Interface, createInterface } from "node:readline";

import type { Disposition } from "@/types";

export function expandHome(p: string) {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

/**
 * 共用一個 readline 讀取所有回答，第一次詢問時才開啟。
 * 以 async iterator 取行，管線輸入一次送來多行時不會遺失後面的回答。
 */
export class Prompt {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private opened?: {
    rl: Interface;
    lines: AsyncIterator<string>;
    closed: boolean;
  };

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
  ) {
    this.input = input;
    this.output = output;
  }

  /** 輸入結束時回傳 undefined */
  async ask(question: string): Promise<string | undefined> {
    const opened = this.open();
    // 輸入已結束時 readline 已關閉，只取出先前緩衝的行
    if (!opened.closed) {
      opened.rl.setPrompt(question);
      opened.rl.prompt();
    }
    const next = await opened.lines.next();
    return next.done ? undefined : next.value;
  }

  close() {
    if (this.opened && !this.opened.closed) this.opened.rl.close();
    this.opened = undefined;
  }

  private open() {
    if (!this.opened) {
      const rl = createInterface({ input: this.input, output: this.output });
      const opened = { rl, lines: rl[Symbol.asyncIterator](), closed: false };
      rl.once("close", () => {
        opened.closed = true;
      });
      this.opened = opened;
    }
    return this.opened;
  }
}

export async function confirm(prompt: Prompt, question: string) {
  const ans = (await prompt.ask(question))?.trim().toLowerCase();
  return ans === "y" || ans === "yes";
}

/**
 * 反覆詢問直到輸入為 choices 的 key；直接 Enter 或輸入結束時採用 fallback。
 */
export async function choose<T extends string>(
  prompt: Prompt,
  question: string,
  choices: Readonly<Record<string, T>>,
  fallback: T
): Promise<T> {
  for (;;) {
    const raw = await prompt.ask(question);
    if (raw === undefined) return fallback;
    const ans = raw.trim().toLowerCase();
    if (ans === "") return fallback;
    const picked = choices[ans];
    if (picked) return picked;
  }
}

/** 路徑上是否已有任何項目（含失效的 symlink） */
export async function exists(p: string) {
  try {
    await lstat(p);
    return true;
  } catch {
    return false;
  }
}

/** 從 fs 錯誤取出 code 與訊息 */
export function errnoOf(e: unknown): { code?: string; message: string } {
  const message = e instanceof Error ? e.message : String(e);
  if (e instanceof Error && "code" in e && typeof e.code === "string") {
    return { code: e.code, message };
  }
  return { message };
}

export const dispositionAliases: Readonly<Record<string, Disposition>> = {
  c: "COPY",
  copy: "COPY",
  s: "SKIP",
  skip: "SKIP",
  d: "DELETE",
  delete: "DELETE",
};

export function parseDisposition(value: string): Disposition | undefined {
  return dispositionAliases[value.trim().toLowerCase()];
}

export function toArray<T>(value: T | T[] | undefined): T[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}
