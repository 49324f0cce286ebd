import fs from "node:fs/promises";
import path from "node:path";
import { WriteLockError } from "./errors.js";

const DEFAULT_WRITE_LOCK_TIMEOUT_MS = 4_000;
const DEFAULT_WRITE_LOCK_RETRY_MS = 50;
const WRITE_LOCK_FILE_NAME = ".lingodesk-write.lock";

export const projectRoot = () => process.env.INIT_CWD || process.cwd();

export type PendingFile = {
  filePath: string;
  content: string;
};

const sleep = (durationMs: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, durationMs);
  });

const parsePositiveInteger = (value: string | undefined, fallback: number) => {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return parsed;
};

const writeLockTimeoutMs = () =>
  parsePositiveInteger(
    process.env.LINGODESK_WRITE_LOCK_TIMEOUT_MS,
    DEFAULT_WRITE_LOCK_TIMEOUT_MS,
  );

const writeLockRetryMs = () =>
  parsePositiveInteger(
    process.env.LINGODESK_WRITE_LOCK_RETRY_MS,
    DEFAULT_WRITE_LOCK_RETRY_MS,
  );

export const isMissingFileError = (error: unknown) =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

const isAlreadyExistsError = (error: unknown) =>
  error instanceof Error && "code" in error && error.code === "EEXIST";

export const writeLockPath = (dir: string) => path.join(dir, WRITE_LOCK_FILE_NAME);

/**
 * Runs `run` while holding `<dir>/.lingodesk-write.lock`. Not re-entrant:
 * code running under the lock must not ask for it again.
 */
export const withWriteLock = async <T>(dir: string, run: () => Promise<T>) => {
  await fs.mkdir(dir, { recursive: true });

  const lockFilePath = writeLockPath(dir);
  const timeoutMs = writeLockTimeoutMs();
  const retryMs = writeLockRetryMs();
  const startTime = Date.now();

  let lockHandle: Awaited<ReturnType<typeof fs.open>> | null = null;

  while (!lockHandle) {
    try {
      lockHandle = await fs.open(lockFilePath, "wx");
    } catch (error) {
      if (!isAlreadyExistsError(error)) {
        throw error;
      }

      if (Date.now() - startTime >= timeoutMs) {
        throw new WriteLockError(
          "Could not save because another LingoDesk save is in progress. Try again.",
        );
      }

      await sleep(retryMs);
    }
  }

  try {
    return await run();
  } finally {
    await lockHandle.close().catch(() => undefined);
    await fs.unlink(lockFilePath).catch(() => undefined);
  }
};

export const serializeJson = (value: unknown, indent = 2) =>
  `${JSON.stringify(value, null, indent)}\n`;

/** Returns `undefined` when the file does not exist. */
export const readTextFile = async (filePath: string) => {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return undefined;
    }
    throw error;
  }
};

/**
 * Writes every file to a temp sibling first and renames them into place once
 * all writes succeeded.
 */
export const writeFilesAtomically = async (files: PendingFile[]) => {
  const operationId = `${Date.now()}-${process.pid}`;
  const tempFiles: string[] = [];

  try {
    for (const [index, entry] of files.entries()) {
      await fs.mkdir(path.dirname(entry.filePath), { recursive: true });
      const tempPath = `${entry.filePath}.tmp-${operationId}-${index}`;
      await fs.writeFile(tempPath, entry.content, "utf8");
      tempFiles.push(tempPath);
    }

    for (let index = 0; index < files.length; index += 1) {
      await fs.rename(tempFiles[index], files[index].filePath);
    }
  } catch (error) {
    await Promise.allSettled(tempFiles.map((filePath) => fs.unlink(filePath)));
    throw error;
  }
};
