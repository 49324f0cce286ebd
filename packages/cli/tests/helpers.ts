import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { createProjectStore } from "../src/projectStore";

export const createTempDir = () => fs.mkdtemp(path.join(os.tmpdir(), "lingodesk-test-"));

export const removeTempDir = (dir: string) => fs.rm(dir, { recursive: true, force: true });

/** Store with sequential ids (`p1`, `p2`, ...) and a clock that only moves on `tick()`. */
export const createTestStore = (dataDir: string) => {
  let nextId = 0;
  let time = Date.parse("2026-01-01T00:00:00.000Z");

  const store = createProjectStore(dataDir, {
    now: () => new Date(time),
    createId: () => {
      nextId += 1;
      return `p${nextId}`;
    },
  });

  return {
    store,
    tick: (ms = 1_000) => {
      time += ms;
    },
  };
};

export const exists = async (filePath: string) => {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
};
