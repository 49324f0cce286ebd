import fs from "node:fs/promises";
import path from "node:path";
import type { AppProject, TranslationTree, TranslationsByLocale } from "@lingodesk/shared";
import { projectLanguages } from "@lingodesk/shared";
import { StorageError } from "./errors.js";
import { readTextFile, serializeJson, writeFilesAtomically } from "./fs.js";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const projectDirectory = (dataDir: string, projectId: string) =>
  path.join(dataDir, "projects", projectId);

export const localeFilePath = (dataDir: string, projectId: string, language: string) =>
  path.join(projectDirectory(dataDir, projectId), `${language}.json`);

const readLocaleFile = async (filePath: string): Promise<TranslationTree> => {
  const raw = await readTextFile(filePath);
  if (raw === undefined) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new StorageError(
      "CORRUPT_LOCALE_FILE",
      filePath,
      `${filePath} is not valid JSON. Fix or remove the file.`,
    );
  }

  if (!isRecord(parsed)) {
    throw new StorageError(
      "CORRUPT_LOCALE_FILE",
      filePath,
      `${filePath} must contain a JSON object.`,
    );
  }

  return parsed;
};

export async function readProjectTranslations(
  dataDir: string,
  project: Pick<AppProject, "id" | "sourceLanguage" | "targetLanguages">,
): Promise<TranslationsByLocale> {
  const out: TranslationsByLocale = {};
  for (const language of projectLanguages(project)) {
    out[language] = await readLocaleFile(localeFilePath(dataDir, project.id, language));
  }
  return out;
}

/** Caller holds the write lock for `dataDir`. */
export async function writeProjectTranslations(
  dataDir: string,
  project: Pick<AppProject, "id" | "sourceLanguage" | "targetLanguages">,
  trees: TranslationsByLocale,
) {
  await writeFilesAtomically(
    projectLanguages(project).map((language) => ({
      filePath: localeFilePath(dataDir, project.id, language),
      content: serializeJson(trees[language] ?? {}),
    })),
  );
}

export async function deleteLocaleFile(dataDir: string, projectId: string, language: string) {
  await fs.rm(localeFilePath(dataDir, projectId, language), { force: true });
}

export async function deleteProjectFiles(dataDir: string, projectId: string) {
  await fs.rm(projectDirectory(dataDir, projectId), { recursive: true, force: true });
}
