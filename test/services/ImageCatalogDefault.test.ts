import { mkdir, mkdtemp, rm, symlink, writeFile } from "node:fs/promises";
import os from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";
import { expectHasSubset } from "~shared/testkit/ExpectSubset";
import { buildTestLogger } from "~shared/testkit/TestLogger";

import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { ImageCatalogDefault } from "@/services/ImageCatalogDefault";
import { MetadataDateResolverDefault } from "@/services/MetadataDateResolverDefault";
import { ExifServiceFake } from "~test/fakes/ExifServiceFake";

describe("ImageCatalogDefault", () => {
  let tmpDir: string;
  let exifService: ExifServiceFake;
  let catalog: ImageCatalogDefault;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(os.tmpdir(), "catalog-"));
    exifService = new ExifServiceFake();
    const logger = buildTestLogger();
    catalog = new ImageCatalogDefault({
      scanner: new FileSystemScannerDefault(),
      dateResolver: new MetadataDateResolverDefault({ exifService, logger }),
      logger,
    });
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  test("只收錄支援的影像格式，依檔名 code point 排序", async () => {
    for (const name of ["b.jpg", "A.JPG", "a.png", "_x.heic", "notes.txt"]) {
      await writeFile(join(tmpDir, name), name);
    }
    await mkdir(join(tmpDir, "folder.jpg"));

    const result = await catalog.scan(tmpDir);
    expectOk(result);
    expect(result.value.map((r) => r.fileName)).toEqual([
      "A.JPG",
      "_x.heic",
      "a.png",
      "b.jpg",
    ]);
    expect(catalog.sourceDir).toBe(tmpDir);
  });

  test("新掃描的紀錄預設為 COPY / PENDING", async () => {
    await writeFile(join(tmpDir, "a.jpg"), "a");

    const result = await catalog.scan(tmpDir);
    expectOk(result);
    expect(result.value).toEqual([
      {
        sourcePath: join(tmpDir, "a.jpg"),
        fileName: "a.jpg",
        readable: true,
        disposition: "COPY",
        status: { type: "PENDING" },
        resolvedDate: undefined,
      },
    ]);
  });

  test("無法讀取的檔案（失效 symlink）預設為 SKIP", async () => {
    await symlink(join(tmpDir, "missing.jpg"), join(tmpDir, "broken.jpg"));

    const result = await catalog.scan(tmpDir);
    expectOk(result);
    expectHasSubset(result.value[0], {
      fileName: "broken.jpg",
      readable: false,
      disposition: "SKIP",
    });
  });

  test("重新掃描會取代清單並還原處置方式", async () => {
    const a = join(tmpDir, "a.jpg");
    await writeFile(a, "a");
    await catalog.scan(tmpDir);
    expectOk(catalog.setDisposition(a, "DELETE"));
    expect(catalog.get(a)?.disposition).toBe("DELETE");

    await writeFile(join(tmpDir, "b.jpg"), "b");
    const result = await catalog.scan(tmpDir);
    expectOk(result);
    expect(result.value.map((r) => [r.fileName, r.disposition])).toEqual([
      ["a.jpg", "COPY"],
      ["b.jpg", "COPY"],
    ]);
  });

  test("未知的路徑回傳 NOT_FOUND", async () => {
    await catalog.scan(tmpDir);
    const unknown = join(tmpDir, "nope.jpg");

    const setRes = catalog.setDisposition(unknown, "SKIP");
    expectErr(setRes);
    expect(setRes.error).toEqual({ type: "NOT_FOUND", sourcePath: unknown });

    const statusRes = catalog.setStatus(unknown, { type: "PROCESSED" });
    expectErr(statusRes);
    expect(statusRes.error.type).toBe("NOT_FOUND");

    const dateRes = await catalog.resolveDate(unknown);
    expectErr(dateRes);
    expect(dateRes.error.type).toBe("NOT_FOUND");
    expect(catalog.get(unknown)).toBeUndefined();
  });

  test("回傳的紀錄是快照，不隨後續修改變動", async () => {
    const a = join(tmpDir, "a.jpg");
    await writeFile(a, "a");
    await catalog.scan(tmpDir);
    const before = catalog.records();

    catalog.setDisposition(a, "SKIP");
    expect(before[0]?.disposition).toBe("COPY");
    expect(catalog.records()[0]?.disposition).toBe("SKIP");
  });

  test("日期解析會快取，檔案變動後重新解析", async () => {
    const a = join(tmpDir, "a.jpg");
    await writeFile(a, "a");
    exifService.setDates(a, { captureDate: { year: 2020, month: 5, day: 4 } });
    await catalog.scan(tmpDir);

    const first = await catalog.resolveDate(a);
    expectOk(first);
    const second = await catalog.resolveDate(a);
    expectOk(second);
    expect(second.value).toEqual(first.value);
    expect(exifService.readCount(a)).toBe(1);
    expect(catalog.get(a)?.resolvedDate).toEqual({
      year: 2020,
      month: 5,
      day: 4,
      source: "DATE_TIME_ORIGINAL",
    });

    // 內容長度改變，指紋不同
    await writeFile(a, "replaced");
    exifService.setDates(a, { captureDate: { year: 2019, month: 1, day: 2 } });
    const third = await catalog.resolveDate(a);
    expectOk(third);
    expect(third.value).toEqual({
      year: 2019,
      month: 1,
      day: 2,
      source: "DATE_TIME_ORIGINAL",
    });
    expect(exifService.readCount(a)).toBe(2);
  });
});
