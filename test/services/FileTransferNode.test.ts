import { mkdtemp, readFile, rm, stat, utimes, writeFile } from "node:fs/promises";
import os from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { FileTransferNode } from "@/services/FileTransferNode";
import { exists } from "@/utils/helper";

describe("FileTransferNode", () => {
  let tmpDir: string;
  const transfer = new FileTransferNode();

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(os.tmpdir(), "transfer-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  test("複製內容並沿用來源的修改時間", async () => {
    const from = join(tmpDir, "a.jpg");
    const to = join(tmpDir, "b.jpg");
    await writeFile(from, "photo");
    const noon = new Date(2022, 0, 1, 12);
    await utimes(from, noon, noon);

    expectOk(await transfer.copy(from, to));
    expect(await readFile(to, "utf8")).toBe("photo");
    expect((await stat(to)).mtime.getTime()).toBe(noon.getTime());
  });

  test("目標已存在時回傳 EEXIST，不覆蓋也不清除", async () => {
    const from = join(tmpDir, "a.jpg");
    const to = join(tmpDir, "b.jpg");
    await writeFile(from, "new");
    await writeFile(to, "old");

    const result = await transfer.copy(from, to);
    expectErr(result);
    expect(result.error).toMatchObject({ type: "IO_FAILURE", code: "EEXIST" });
    expect(await readFile(to, "utf8")).toBe("old");
  });

  test("來源不存在時不留下目標檔", async () => {
    const to = join(tmpDir, "b.jpg");

    const result = await transfer.copy(join(tmpDir, "missing.jpg"), to);
    expectErr(result);
    expect(result.error).toMatchObject({ type: "IO_FAILURE", code: "ENOENT" });
    expect(await exists(to)).toBe(false);
  });

  test("刪除檔案", async () => {
    const target = join(tmpDir, "a.jpg");
    await writeFile(target, "x");

    expectOk(await transfer.remove(target));
    expect(await exists(target)).toBe(false);
  });

  test("刪除不存在的檔案回傳 ENOENT", async () => {
    const result = await transfer.remove(join(tmpDir, "missing.jpg"));
    expectErr(result);
    expect(result.error).toMatchObject({ type: "IO_FAILURE", code: "ENOENT" });
  });
});
