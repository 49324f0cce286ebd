import path from "node:path";
import type { AppProject, ProjectFieldError, ProjectInput } from "@lingodesk/shared";
import {
  normalizeLanguageCode,
  normalizeProjectInput,
  projectLanguages,
  validateProjectInput,
} from "@lingodesk/shared";
import { nanoid } from "nanoid";
import { ProjectNotFoundError, StorageError, ValidationError } from "./errors.js";
import { readTextFile, serializeJson, withWriteLock, writeFilesAtomically } from "./fs.js";
import { deleteLocaleFile, deleteProjectFiles } from "./localeFiles.js";

const SCHEMA_VERSION = 1;
const PROJECT_ID_LENGTH = 12;

export type ProjectPatch = Partial<ProjectInput>;

export type ProjectUpdate = {
  project: AppProject;
  removedLanguages: string[];
};

export type ProjectStoreOptions = {
  now?: () => Date;
  createId?: () => string;
};

export type ProjectStore = {
  readonly dataDir: string;
  list(): Promise<AppProject[]>;
  get(id: string): Promise<AppProject>;
  create(input: ProjectInput): Promise<AppProject>;
  update(id: string, patch: ProjectPatch): Promise<ProjectUpdate>;
  touch(id: string): Promise<AppProject>;
  remove(id: string): Promise<void>;
};

export const projectIndexPath = (dataDir: string) => path.join(dataDir, "projects.json");

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((entry) => typeof entry === "string");

const toAppProject = (value: unknown): AppProject | null => {
  if (!isRecord(value)) {
    return null;
  }

  const { id, name, sourceLanguage, targetLanguages, createdAt, updatedAt } = value;
  if (
    typeof id !== "string" ||
    typeof name !== "string" ||
    typeof sourceLanguage !== "string" ||
    !isStringArray(targetLanguages) ||
    typeof createdAt !== "string" ||
    typeof updatedAt !== "string"
  ) {
    return null;
  }

  return { id, name, sourceLanguage, targetLanguages, createdAt, updatedAt };
};

export async function readProjectIndex(dataDir: string): Promise<AppProject[]> {
  const filePath = projectIndexPath(dataDir);
  const raw = await readTextFile(filePath);
  if (raw === undefined) {
    return [];
  }

  const corrupt = (reason: string) =>
    new StorageError(
      "CORRUPT_STORE",
      filePath,
      `${filePath} ${reason}. LingoDesk will not overwrite it; fix or move the file.`,
    );

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw corrupt("is not valid JSON");
  }

  if (!isRecord(parsed) || parsed.schemaVersion !== SCHEMA_VERSION) {
    throw corrupt(`does not have schemaVersion ${SCHEMA_VERSION}`);
  }

  if (!Array.isArray(parsed.projects)) {
    throw corrupt("has no projects list");
  }

  const projects: AppProject[] = [];
  for (const entry of parsed.projects) {
    const project = toAppProject(entry);
    if (!project) {
      throw corrupt("contains a malformed project entry");
    }
    projects.push(project);
  }
  return projects;
}

/** Caller holds the write lock for `dataDir`. */
export async function writeProjectIndex(dataDir: string, projects: AppProject[]) {
  await writeFilesAtomically([
    {
      filePath: projectIndexPath(dataDir),
      content: serializeJson({ schemaVersion: SCHEMA_VERSION, projects }),
    },
  ]);
}

const compareProjects = (left: AppProject, right: AppProject) => {
  if (left.updatedAt !== right.updatedAt) {
    return left.updatedAt < right.updatedAt ? 1 : -1;
  }
  return left.name.localeCompare(right.name);
};

const sameName = (left: string, right: string) =>
  left.trim().toLowerCase() === right.trim().toLowerCase();

const assertValidInput = (
  input: ProjectInput,
  projects: AppProject[],
  ignoredId: string | null,
) => {
  const errors: ProjectFieldError[] = validateProjectInput(input);
  const name = input.name.trim();
  if (
    name &&
    projects.some((project) => project.id !== ignoredId && sameName(project.name, name))
  ) {
    errors.push({
      field: "name",
      code: "name_taken",
      message: `A project named "${name}" already exists.`,
      value: name,
    });
  }

  if (errors.length > 0) {
    throw new ValidationError("INVALID_PROJECT", errors[0].message, errors);
  }
};

/**
 * Applies a patch on top of the stored project. When only the source changes,
 * the old source stays in the project as a target: a current target chosen as
 * the new source swaps places with it, any other language pushes it to the
 * front of the targets.
 */
export const mergeProjectPatch = (project: AppProject, patch: ProjectPatch): ProjectInput => {
  const sourceLanguage = patch.sourceLanguage ?? project.sourceLanguage;
  let targetLanguages = patch.targetLanguages ?? project.targetLanguages;

  if (patch.targetLanguages === undefined && patch.sourceLanguage !== undefined) {
    const nextSource = normalizeLanguageCode(patch.sourceLanguage);
    if (nextSource !== project.sourceLanguage) {
      targetLanguages = targetLanguages.includes(nextSource)
        ? targetLanguages.map((language) =>
            language === nextSource ? project.sourceLanguage : language,
          )
        : [project.sourceLanguage, ...targetLanguages];
    }
  }

  return {
    name: patch.name ?? project.name,
    sourceLanguage,
    targetLanguages,
  };
};

export function createProjectStore(
  dataDir: string,
  options: ProjectStoreOptions = {},
): ProjectStore {
  const now = () => (options.now ? options.now() : new Date()).toISOString();
  const createId = options.createId ?? (() => nanoid(PROJECT_ID_LENGTH));

  const findIndex = (projects: AppProject[], id: string) => {
    const index = projects.findIndex((project) => project.id === id);
    if (index < 0) {
      throw new ProjectNotFoundError(id);
    }
    return index;
  };

  return {
    dataDir,

    async list() {
      const projects = await readProjectIndex(dataDir);
      return [...projects].sort(compareProjects);
    },

    async get(id) {
      const projects = await readProjectIndex(dataDir);
      return projects[findIndex(projects, id)];
    },

    create(input) {
      return withWriteLock(dataDir, async () => {
        const projects = await readProjectIndex(dataDir);
        assertValidInput(input, projects, null);

        const timestamp = now();
        const project: AppProject = {
          id: createId(),
          ...normalizeProjectInput(input),
          createdAt: timestamp,
          updatedAt: timestamp,
        };

        await writeProjectIndex(dataDir, [...projects, project]);
        return project;
      });
    },

    update(id, patch) {
      return withWriteLock(dataDir, async () => {
        const projects = await readProjectIndex(dataDir);
        const index = findIndex(projects, id);
        const current = projects[index];
        const input = mergeProjectPatch(current, patch);
        assertValidInput(input, projects, id);

        const project: AppProject = {
          ...current,
          ...normalizeProjectInput(input),
          updatedAt: now(),
        };
        const nextLanguages = projectLanguages(project);
        const removedLanguages = projectLanguages(current).filter(
          (language) => !nextLanguages.includes(language),
        );

        const nextProjects = [...projects];
        nextProjects[index] = project;
        await writeProjectIndex(dataDir, nextProjects);
        for (const language of removedLanguages) {
          await deleteLocaleFile(dataDir, id, language);
        }

        return { project, removedLanguages };
      });
    },

    touch(id) {
      return withWriteLock(dataDir, async () => {
        const projects = await readProjectIndex(dataDir);
        const index = findIndex(projects, id);
        const project = { ...projects[index], updatedAt: now() };
        const nextProjects = [...projects];
        nextProjects[index] = project;
        await writeProjectIndex(dataDir, nextProjects);
        return project;
      });
    },

    remove(id) {
      return withWriteLock(dataDir, async () => {
        const projects = await readProjectIndex(dataDir);
        findIndex(projects, id);
        await writeProjectIndex(
          dataDir,
          projects.filter((project) => project.id !== id),
        );
        await deleteProjectFiles(dataDir, id);
      });
    },
  };
}
