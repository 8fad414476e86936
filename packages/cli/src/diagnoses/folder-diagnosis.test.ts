// pattern: Unit Test
import { symlink } from "node:fs/promises";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createTestContext } from "../test-utils/diagnosis-context.js";
import { createTempDir, type TempDir } from "../test-utils/temp-dir.js";

import { folderDiagnosis, folderStats } from "./folder-diagnosis.js";

describe("folder diagnosis", () => {
  let temp: TempDir;

  beforeEach(async () => {
    temp = await createTempDir();
    await temp.writeFile("site-packages/demo_pkg/__init__.py", "x = 1\n");
    await temp.writeFile("site-packages/demo_pkg/core.py", "def f():\n    pass\n");
    await temp.writeFile("site-packages/demo_pkg/data/table.csv", "a,b\n");
    await temp.mkdir("site-packages/demo_pkg/empty");
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it("should count files and bytes recursively", async () => {
    expect(await folderStats(join(temp.path, "site-packages/demo_pkg"))).toEqual({
      total_files: 3,
      total_bytes: 6 + 18 + 4,
    });
  });

  it("should skip broken symlinks like unreadable directories", async () => {
    const folder = join(temp.path, "site-packages/demo_pkg");
    await symlink(join(temp.path, "gone.py"), join(folder, "dangling.py"));

    expect(await folderStats(folder)).toEqual({
      total_files: 3,
      total_bytes: 6 + 18 + 4,
    });
  });

  it("should report zeros for a missing folder", async () => {
    expect(await folderStats(join(temp.path, "nowhere"))).toEqual({
      total_files: 0,
      total_bytes: 0,
    });
  });

  it("should look inside the installed distribution's package folder", async () => {
    const context = createTestContext({
      locateDistribution: () =>
        Promise.resolve({
          name: "demo-pkg",
          version: "0.1.0",
          location: join(temp.path, "site-packages"),
        }),
    });

    expect(await folderDiagnosis("demo-pkg", context)).toEqual({
      total_files: 3,
      total_bytes: 28,
    });
  });

  it("should report null when the distribution is not installed", async () => {
    expect(await folderDiagnosis("demo-pkg", createTestContext())).toBeNull();
  });
});
