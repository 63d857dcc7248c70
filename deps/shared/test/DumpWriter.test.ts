import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import os from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import { buildTestLogger } from "~shared/testkit/TestLogger";

describe("DumpWriterDefault", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(os.tmpdir(), "dump-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("以時間戳記命名並寫入 JSON", async () => {
    const writer = new DumpWriterDefault(buildTestLogger(), join(dir, "out"));
    const filePath = await writer.dump("plan/a:b", { count: 2 });

    expect(filePath.startsWith(join(dir, "out"))).toBe(true);
    expect(filePath).toMatch(/\d{8}-\d{6}-plan_a_b\.json$/);
    expect(JSON.parse(await readFile(filePath, "utf8"))).toEqual({ count: 2 });
    expect(await readdir(join(dir, "out"))).toHaveLength(1);
  });
});
