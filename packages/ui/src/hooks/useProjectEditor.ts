import { useCallback, useEffect, useMemo, useState } from "react";
import type {
  ProjectSummary,
  TranslationChange,
  TranslationRow,
} from "@lingodesk/shared";
import {
  TranslationTable,
  TranslationTableError,
  describeInvalidKeyReason,
  getInvalidTranslationKeyReason,
  projectLanguages,
} from "@lingodesk/shared";
import { api, errorText } from "../api";
import type { DialogApi } from "./useConfirmDialog";
import type { CellEdits, TranslateFn } from "../types/translations";

type UseProjectEditorOptions = {
  projectId: string;
  t: TranslateFn;
  dialog: DialogApi;
  onNotify: (message: string) => void;
};

const countEdits = (edits: CellEdits) =>
  Object.values(edits).reduce((sum, values) => sum + Object.keys(values).length, 0);

const applyEdits = (rows: TranslationRow[], edits: CellEdits): TranslationRow[] =>
  rows.map((row) => {
    const rowEdits = edits[row.key];
    return rowEdits ? { key: row.key, values: { ...row.values, ...rowEdits } } : row;
  });

const toChanges = (edits: CellEdits): TranslationChange[] =>
  Object.entries(edits).flatMap(([key, values]) =>
    Object.entries(values).map(([language, value]) => ({ key, language, value })),
  );

const withoutKey = (edits: CellEdits, key: string) => {
  const next = { ...edits };
  delete next[key];
  return next;
};

/**
 * Local editing state for one project. Cell edits stay client-side until
 * `save` sends them as one batch; completion is recomputed from the edited rows.
 */
export function useProjectEditor({ projectId, t, dialog, onNotify }: UseProjectEditorOptions) {
  const [project, setProject] = useState<ProjectSummary | null>(null);
  const [rows, setRows] = useState<TranslationRow[]>([]);
  const [edits, setEdits] = useState<CellEdits>({});
  const [loading, setLoading] = useState(true);
  const [loadingError, setLoadingError] = useState<string | null>(null);
  const [saveError, setSaveError] = useState<string | null>(null);
  const [saving, setSaving] = useState(false);
  const [lastSavedAt, setLastSavedAt] = useState<Date | null>(null);
  const [search, setSearch] = useState("");
  const [onlyMissing, setOnlyMissing] = useState(false);
  const [missingLanguage, setMissingLanguage] = useState("");
  const [newKey, setNewKey] = useState("");
  const [newKeyError, setNewKeyError] = useState<string | null>(null);
  const [renamingKey, setRenamingKey] = useState<string | null>(null);
  const [renameValue, setRenameValue] = useState("");
  const [renameError, setRenameError] = useState<string | null>(null);

  const languages = useMemo(() => (project ? projectLanguages(project) : []), [project]);

  const load = useCallback(async () => {
    setLoading(true);
    try {
      const [nextProject, table] = await Promise.all([
        api.getProject(projectId),
        api.getTable(projectId),
      ]);
      setProject(nextProject);
      setRows(table.rows);
      setEdits({});
      setLoadingError(null);
      setSaveError(null);
    } catch (error) {
      setLoadingError(t("loadFailed", { message: errorText(error) }));
    } finally {
      setLoading(false);
    }
  }, [projectId, t]);

  useEffect(() => {
    void load();
  }, [load]);

  const editedRows = useMemo(() => applyEdits(rows, edits), [rows, edits]);
  const dirtyCellCount = useMemo(() => countEdits(edits), [edits]);

  const completion = useMemo(
    () => TranslationTable.fromRows(languages, editedRows).completionByLanguage(),
    [languages, editedRows],
  );

  // The missing filter looks at saved values so rows stay put while typing.
  const visibleRows = useMemo(() => {
    const savedTable = TranslationTable.fromRows(languages, rows);
    const visibleKeys = new Set(
      savedTable
        .filterRows({
          search,
          onlyIncomplete: onlyMissing,
          language: languages.includes(missingLanguage) ? missingLanguage : undefined,
        })
        .map((row) => row.key),
    );
    return editedRows.filter((row) => visibleKeys.has(row.key));
  }, [languages, rows, editedRows, search, onlyMissing, missingLanguage]);

  const isCellDirty = useCallback(
    (key: string, language: string) => edits[key]?.[language] !== undefined,
    [edits],
  );

  const setCell = useCallback(
    (key: string, language: string, value: string) => {
      const saved = rows.find((row) => row.key === key)?.values[language] ?? "";
      setEdits((current) => {
        const rowEdits = { ...current[key] };
        if (value === saved) {
          delete rowEdits[language];
        } else {
          rowEdits[language] = value;
        }

        if (Object.keys(rowEdits).length === 0) {
          return withoutKey(current, key);
        }
        return { ...current, [key]: rowEdits };
      });
      setSaveError(null);
    },
    [rows],
  );

  const save = useCallback(async () => {
    const changes = toChanges(edits);
    if (changes.length === 0) {
      return true;
    }

    setSaving(true);
    try {
      await api.saveChanges(projectId, changes);
      setRows(applyEdits(rows, edits));
      setEdits({});
      setSaveError(null);
      setLastSavedAt(new Date());
      onNotify(t("savedChanges", { count: changes.length }));
      return true;
    } catch (error) {
      setSaveError(t("saveFailed", { message: errorText(error) }));
      return false;
    } finally {
      setSaving(false);
    }
  }, [edits, onNotify, projectId, rows, t]);

  const discardChanges = useCallback(() => {
    setEdits({});
    setSaveError(null);
  }, []);

  const addKey = useCallback(async () => {
    const key = newKey.trim();
    const reason = getInvalidTranslationKeyReason(key);
    if (reason) {
      setNewKeyError(describeInvalidKeyReason(reason));
      return;
    }

    try {
      TranslationTable.fromRows(languages, rows).addKey(key);
    } catch (error) {
      if (error instanceof TranslationTableError) {
        setNewKeyError(error.message);
        return;
      }
      throw error;
    }

    try {
      const { row } = await api.addKey(projectId, key);
      setRows((current) => [...current, row]);
      setNewKey("");
      setNewKeyError(null);
      onNotify(t("keyAdded", { key: row.key }));
    } catch (error) {
      setNewKeyError(errorText(error));
    }
  }, [languages, newKey, onNotify, projectId, rows, t]);

  const startRename = useCallback((key: string) => {
    setRenamingKey(key);
    setRenameValue(key);
    setRenameError(null);
  }, []);

  const cancelRename = useCallback(() => {
    setRenamingKey(null);
    setRenameError(null);
  }, []);

  const applyRename = useCallback(async () => {
    if (!renamingKey) {
      return;
    }

    const oldKey = renamingKey;
    const target = renameValue.trim();
    if (target === oldKey) {
      cancelRename();
      return;
    }

    const reason = getInvalidTranslationKeyReason(target);
    if (reason) {
      setRenameError(describeInvalidKeyReason(reason));
      return;
    }

    try {
      const { newKey: renamed } = await api.renameKey(projectId, oldKey, target);
      setRows((current) =>
        current.map((row) => (row.key === oldKey ? { key: renamed, values: row.values } : row)),
      );
      setEdits((current) => {
        const moved = current[oldKey];
        return moved ? { ...withoutKey(current, oldKey), [renamed]: moved } : current;
      });
      setRenamingKey(null);
      setRenameError(null);
      onNotify(t("keyRenamed", { oldKey, newKey: renamed }));
    } catch (error) {
      setRenameError(errorText(error));
    }
  }, [cancelRename, onNotify, projectId, renameValue, renamingKey, t]);

  const deleteKey = useCallback(
    async (key: string) => {
      const confirmed = await dialog.confirm(t("deleteKeyConfirm", { key }), {
        confirmLabel: t("delete"),
        tone: "danger",
      });
      if (!confirmed) {
        return;
      }

      try {
        await api.removeKey(projectId, key);
        setRows((current) => current.filter((row) => row.key !== key));
        setEdits((current) => withoutKey(current, key));
        onNotify(t("keyDeleted", { key }));
      } catch (error) {
        setSaveError(t("deleteKeyFailed", { message: errorText(error) }));
      }
    },
    [dialog, onNotify, projectId, t],
  );

  return {
    project,
    languages,
    loading,
    loadingError,
    saveError,
    saving,
    lastSavedAt,
    completion,
    totalKeys: rows.length,
    visibleRows,
    dirtyCellCount,
    search,
    setSearch,
    onlyMissing,
    setOnlyMissing,
    missingLanguage,
    setMissingLanguage,
    newKey,
    setNewKey: (value: string) => {
      setNewKey(value);
      setNewKeyError(null);
    },
    newKeyError,
    renamingKey,
    renameValue,
    setRenameValue,
    renameError,
    isCellDirty,
    setCell,
    save,
    discardChanges,
    reload: load,
    addKey,
    startRename,
    cancelRename,
    applyRename,
    deleteKey,
  };
}

export type ProjectEditor = ReturnType<typeof useProjectEditor>;
