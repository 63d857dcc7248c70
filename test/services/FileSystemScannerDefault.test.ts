import { mkdir, mkdtemp, rm, symlink, writeFile } from "node:fs/promises";
import os from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { FileSystemScannerDefault } from "@/services/FileSystemScanner";

describe("FileSystemScannerDefault", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(os.tmpdir(), "scanner-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  test("只列出第一層的檔案，不遞迴", async () => {
    await mkdir(join(tmpDir, "subdir"));
    await writeFile(join(tmpDir, "a.txt"), "a");
    await writeFile(join(tmpDir, "subdir", "b.txt"), "b");

    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(tmpDir);

    expectOk(result);
    expect(result.value).toEqual([join(tmpDir, "a.txt")]);
  });

  test("副檔名過濾不分大小寫", async () => {
    await writeFile(join(tmpDir, "A.JPG"), "a");
    await writeFile(join(tmpDir, "b.Png"), "b");
    await writeFile(join(tmpDir, "notes.txt"), "c");

    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(tmpDir, { allowExts: [".jpg", "png"] });

    expectOk(result);
    expect([...result.value].sort()).toEqual([
      join(tmpDir, "A.JPG"),
      join(tmpDir, "b.Png"),
    ]);
  });

  test("名稱像相片的資料夾不列入", async () => {
    await mkdir(join(tmpDir, "album.jpg"));

    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(tmpDir, { allowExts: [".jpg"] });

    expectOk(result);
    expect(result.value).toEqual([]);
  });

  test("symlink：指向檔案與失效者保留，指向資料夾者排除", async () => {
    await writeFile(join(tmpDir, "real.jpg"), "x");
    await mkdir(join(tmpDir, "dir"));
    await symlink(join(tmpDir, "real.jpg"), join(tmpDir, "link.jpg"));
    await symlink(join(tmpDir, "dir"), join(tmpDir, "dirlink.jpg"));
    await symlink(join(tmpDir, "missing.jpg"), join(tmpDir, "broken.jpg"));

    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(tmpDir, { allowExts: [".jpg"] });

    expectOk(result);
    expect([...result.value].sort()).toEqual([
      join(tmpDir, "broken.jpg"),
      join(tmpDir, "link.jpg"),
      join(tmpDir, "real.jpg"),
    ]);
  });

  test("遇到不存在的路徑應回傳錯誤", async () => {
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(join(tmpDir, "no_such_path"));
    expectErr(result);
    expect(result.error.type).toBe("SCAN_FAILED");
  });
});
