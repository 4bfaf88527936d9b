import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { findLogFiles } from "./discovery.js";
import { FileNotFoundError } from "./errors.js";

describe("findLogFiles", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "logparse-discovery-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("lists only .log files at the top level, sorted", async () => {
    await fs.writeFile(path.join(tmpDir, "z.log"), "");
    await fs.writeFile(path.join(tmpDir, "a.log"), "");
    await fs.writeFile(path.join(tmpDir, "notes.txt"), "");
    await fs.mkdir(path.join(tmpDir, "dir.log"));
    await fs.mkdir(path.join(tmpDir, "nested"));
    await fs.writeFile(path.join(tmpDir, "nested", "inner.log"), "");

    await expect(findLogFiles(tmpDir)).resolves.toEqual([
      path.join(tmpDir, "a.log"),
      path.join(tmpDir, "z.log"),
    ]);
  });

  it("returns nothing for an empty directory", async () => {
    await expect(findLogFiles(tmpDir)).resolves.toEqual([]);
  });

  it("fails with FileNotFoundError for a missing directory", async () => {
    await expect(findLogFiles(path.join(tmpDir, "missing"))).rejects.toBeInstanceOf(
      FileNotFoundError,
    );
  });
});
