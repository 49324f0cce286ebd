import type {
  AppProject,
  ExportConfig,
  ProjectInput,
  ProjectSummary,
  RowFilter,
  TableResponse,
  TranslationChange,
  TranslationRow,
  UploadIssue,
  UploadMode,
} from "@lingodesk/shared";
import {
  TranslationTable,
  isForceableUploadFailure,
  normalizeLanguageCode,
  projectLanguages,
  validateLocaleUpload,
} from "@lingodesk/shared";
import { ProjectNotFoundError, UploadRejectedError } from "./errors.js";
import { serializeJson, withWriteLock } from "./fs.js";
import { readProjectTranslations, writeProjectTranslations } from "./localeFiles.js";
import type { ProjectPatch, ProjectStore } from "./projectStore.js";

export type UploadRequest = {
  language: string;
  fileName: string;
  content: string;
  mode?: UploadMode;
  force?: boolean;
};

export type UploadResult = {
  language: string;
  mode: UploadMode;
  keyCount: number;
  warnings: UploadIssue[];
};

export type ExportedFile = {
  language: string;
  fileName: string;
  content: string;
};

export type ProjectService = ReturnType<typeof createProjectService>;

const toSummary = (project: AppProject, table: TranslationTable): ProjectSummary => ({
  ...project,
  keyCount: table.size,
  completion: table.completionByLanguage(),
});

export function createProjectService(store: ProjectStore, exportConfig: ExportConfig) {
  const { dataDir } = store;

  const loadTable = async (project: AppProject) =>
    TranslationTable.fromTrees(
      projectLanguages(project),
      await readProjectTranslations(dataDir, project),
    );

  const summarize = async (project: AppProject) => toSummary(project, await loadTable(project));

  /**
   * Loads the table, applies `edit` and saves every language. Nothing is
   * written when `edit` throws.
   */
  const mutateTable = async <T>(
    id: string,
    edit: (table: TranslationTable, project: AppProject) => T,
  ) => {
    const { result, table } = await withWriteLock(dataDir, async () => {
      const project = await store.get(id);
      const table = await loadTable(project);
      const result = edit(table, project);
      await writeProjectTranslations(dataDir, project, table.toTrees());
      return { result, table };
    });
    const project = await store.touch(id);
    return { result, table, project };
  };

  return {
    async listProjects() {
      const projects = await store.list();
      const summaries: ProjectSummary[] = [];
      for (const project of projects) {
        summaries.push(await summarize(project));
      }
      return summaries;
    },

    async getProject(id: string) {
      return summarize(await store.get(id));
    },

    /** Finds a project by id, or by name ignoring case. */
    async resolveProject(ref: string) {
      const projects = await store.list();
      const needle = ref.trim().toLowerCase();
      const project =
        projects.find((entry) => entry.id === ref.trim()) ??
        projects.find((entry) => entry.name.toLowerCase() === needle);
      if (!project) {
        throw new ProjectNotFoundError(ref);
      }
      return project;
    },

    async createProject(input: ProjectInput) {
      return summarize(await store.create(input));
    },

    async updateProject(id: string, patch: ProjectPatch) {
      const { project, removedLanguages } = await store.update(id, patch);
      if (removedLanguages.length > 0) {
        console.log(
          `Removed ${removedLanguages.join(", ")} from project "${project.name}".`,
        );
      }
      return summarize(project);
    },

    async deleteProject(id: string) {
      await store.remove(id);
    },

    async getTable(id: string, filter: RowFilter = {}): Promise<TableResponse> {
      const table = await loadTable(await store.get(id));
      const rows = table.filterRows(filter);
      return {
        languages: [...table.languages],
        rows,
        completion: table.completionByLanguage(),
        total: table.size,
        missing: table.missingCount(filter.language || undefined),
      };
    },

    /** Applies every change or, when one of them is invalid, none. */
    async applyChanges(id: string, changes: TranslationChange[]) {
      const { table } = await mutateTable(id, (current) => {
        for (const change of changes) {
          current.setValue(change.key, change.language, change.value);
        }
      });
      return table.completionByLanguage();
    },

    async addKey(id: string, key: string, values: Record<string, string> = {}) {
      const { result, table } = await mutateTable(id, (current) =>
        current.addKey(key, values),
      );
      const row: TranslationRow = {
        key: result,
        values: Object.fromEntries(
          table.languages.map((language) => [language, table.value(result, language)]),
        ),
      };
      return row;
    },

    async renameKey(id: string, oldKey: string, newKey: string) {
      const { result } = await mutateTable(id, (current) =>
        current.renameKey(oldKey, newKey),
      );
      return result;
    },

    async removeKey(id: string, key: string) {
      const { table } = await mutateTable(id, (current) => current.removeKey(key));
      return table.completionByLanguage();
    },

    async importUpload(id: string, upload: UploadRequest): Promise<UploadResult> {
      const mode = upload.mode ?? "replace";
      const language = normalizeLanguageCode(upload.language);
      const validation = validateLocaleUpload({
        fileName: upload.fileName,
        content: upload.content,
        expectedLanguage: language,
        allowLanguageMismatch: upload.force === true,
      });

      if (!validation.ok) {
        throw new UploadRejectedError(
          validation.errors,
          isForceableUploadFailure(validation),
        );
      }

      const { tree } = validation;
      const { result } = await mutateTable(id, (table) =>
        mode === "merge"
          ? table.mergeLanguage(language, tree)
          : table.replaceLanguage(language, tree),
      );

      const fileCollisions = new Set(
        validation.warnings.find((issue) => issue.code === "KEY_COLLISION")?.keys ?? [],
      );
      const conflicts = result.collisions.filter((key) => !fileCollisions.has(key));
      const warnings = [...validation.warnings];
      if (conflicts.length > 0) {
        warnings.push({
          code: "KEY_COLLISION",
          message: `${conflicts.length} key(s) conflict with existing project keys and were skipped.`,
          keys: conflicts,
        });
      }

      return {
        language,
        mode,
        keyCount: Object.keys(validation.entries).length - conflicts.length,
        warnings,
      };
    },

    async exportProject(
      id: string,
      options: Partial<ExportConfig> & { languages?: string[] } = {},
    ): Promise<ExportedFile[]> {
      const project = await store.get(id);
      const table = await loadTable(project);
      const sortKeys = options.sortKeys ?? exportConfig.sortKeys;
      const omitEmpty = options.omitEmpty ?? exportConfig.omitEmpty;
      const indent = options.indent ?? exportConfig.indent;
      const languages = options.languages ?? projectLanguages(project);

      return languages.map((language) => ({
        language,
        fileName: `${language}.json`,
        content: serializeJson(table.toTree(language, { sortKeys, omitEmpty }), indent),
      }));
    },
  };
}
