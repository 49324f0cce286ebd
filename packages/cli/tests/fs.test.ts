import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { WriteLockError } from "../src/errors";
import { withWriteLock, writeFilesAtomically, writeLockPath } from "../src/fs";
import { createTempDir, exists, removeTempDir } from "./helpers";

describe("withWriteLock", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await removeTempDir(dir);
  });

  it("releases the lock after the callback", async () => {
    const result = await withWriteLock(dir, async () => {
      expect(await exists(writeLockPath(dir))).toBe(true);
      return "done";
    });

    expect(result).toBe("done");
    expect(await exists(writeLockPath(dir))).toBe(false);
  });

  it("releases the lock when the callback fails", async () => {
    await expect(
      withWriteLock(dir, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(await exists(writeLockPath(dir))).toBe(false);
  });

  it("gives up when another writer holds the lock", async () => {
    vi.stubEnv("LINGODESK_WRITE_LOCK_TIMEOUT_MS", "60");
    vi.stubEnv("LINGODESK_WRITE_LOCK_RETRY_MS", "10");
    await fs.writeFile(writeLockPath(dir), "", "utf8");

    await expect(withWriteLock(dir, async () => "never")).rejects.toBeInstanceOf(
      WriteLockError,
    );
  });

  it("never runs two writers at once", async () => {
    let active = 0;
    let maxActive = 0;
    const writer = () =>
      withWriteLock(dir, async () => {
        active += 1;
        maxActive = Math.max(maxActive, active);
        await new Promise((resolve) => setTimeout(resolve, 20));
        active -= 1;
      });

    await Promise.all([writer(), writer(), writer()]);

    expect(maxActive).toBe(1);
  });
});

describe("writeFilesAtomically", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("writes every file and leaves no temp files", async () => {
    await writeFilesAtomically([
      { filePath: path.join(dir, "a", "en.json"), content: "{}\n" },
      { filePath: path.join(dir, "a", "fr.json"), content: "{}\n" },
    ]);

    expect((await fs.readdir(path.join(dir, "a"))).sort()).toEqual(["en.json", "fr.json"]);
  });

  it("removes its temp files when a rename fails", async () => {
    await fs.mkdir(path.join(dir, "a", "fr.json", "taken"), { recursive: true });

    await expect(
      writeFilesAtomically([
        { filePath: path.join(dir, "a", "en.json"), content: "{}\n" },
        { filePath: path.join(dir, "a", "fr.json"), content: "{}\n" },
      ]),
    ).rejects.toThrow();

    const leftovers = (await fs.readdir(path.join(dir, "a"))).filter((name) =>
      name.includes(".tmp-"),
    );
    expect(leftovers).toEqual([]);
  });
});
