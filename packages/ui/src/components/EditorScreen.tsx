import { useEffect } from "react";
import { api } from "../api";
import { useProjectEditor } from "../hooks";
import type { DialogApi } from "../hooks";
import type { Navigate, TranslateFn } from "../types/translations";
import AddKeyForm from "./AddKeyForm";
import CompletionBar from "./CompletionBar";
import StatusBar from "./StatusBar";
import TranslationTable from "./TranslationTable";

type EditorScreenProps = {
  t: TranslateFn;
  projectId: string;
  dialog: DialogApi;
  onNavigate: Navigate;
  onNotify: (message: string) => void;
  onDirtyChange: (dirty: boolean) => void;
};

export default function EditorScreen({
  t,
  projectId,
  dialog,
  onNavigate,
  onNotify,
  onDirtyChange,
}: EditorScreenProps) {
  const editor = useProjectEditor({ projectId, t, dialog, onNotify });
  const hasUnsavedChanges = editor.dirtyCellCount > 0;

  useEffect(() => {
    onDirtyChange(hasUnsavedChanges);
  }, [hasUnsavedChanges, onDirtyChange]);

  useEffect(() => () => onDirtyChange(false), [onDirtyChange]);

  useEffect(() => {
    if (!hasUnsavedChanges) {
      return;
    }

    const handleBeforeUnload = (event: BeforeUnloadEvent) => {
      event.preventDefault();
      event.returnValue = "";
    };
    window.addEventListener("beforeunload", handleBeforeUnload);
    return () => window.removeEventListener("beforeunload", handleBeforeUnload);
  }, [hasUnsavedChanges]);

  const { project } = editor;

  return (
    <section className="screen editor-screen">
      <header className="screen__header">
        <button
          type="button"
          className="btn btn--ghost"
          onClick={() => onNavigate({ name: "dashboard" })}
        >
          {t("backToDashboard")}
        </button>
        <h2>{project ? project.name : t("loading")}</h2>
        {project && (
          <div className="screen__header-actions">
            <button
              type="button"
              className="btn btn--ghost"
              onClick={() => onNavigate({ name: "settings", projectId })}
            >
              {t("settings")}
            </button>
            <button
              type="button"
              className="btn btn--ghost"
              onClick={() => onNavigate({ name: "upload", projectId })}
            >
              {t("upload")}
            </button>
          </div>
        )}
      </header>

      <StatusBar
        t={t}
        loadingError={editor.loadingError}
        saveError={editor.saveError}
        saving={editor.saving}
        dirtyCellCount={editor.dirtyCellCount}
        lastSavedAt={editor.lastSavedAt}
        onRetry={editor.reload}
      />

      {project && (
        <>
          <div className="completion-list">
            {editor.completion.map((entry) => (
              <CompletionBar
                key={entry.language}
                t={t}
                completion={entry}
                isSource={entry.language === project.sourceLanguage}
              />
            ))}
          </div>

          <div className="toolbar">
            <input
              type="search"
              aria-label={t("searchLabel")}
              placeholder={t("searchPlaceholder")}
              value={editor.search}
              onChange={(event) => editor.setSearch(event.target.value)}
            />
            <label className="toolbar__toggle">
              <input
                type="checkbox"
                checked={editor.onlyMissing}
                onChange={(event) => editor.setOnlyMissing(event.target.checked)}
              />
              {t("missingOnly")}
            </label>
            <select
              aria-label={t("missingLanguageLabel")}
              value={editor.missingLanguage}
              disabled={!editor.onlyMissing}
              onChange={(event) => editor.setMissingLanguage(event.target.value)}
            >
              <option value="">{t("anyLanguage")}</option>
              {editor.languages.map((language) => (
                <option key={language} value={language}>
                  {language}
                </option>
              ))}
            </select>
            <span className="toolbar__count">
              {t("rowCount", { visible: editor.visibleRows.length, total: editor.totalKeys })}
            </span>
          </div>

          <AddKeyForm
            t={t}
            value={editor.newKey}
            error={editor.newKeyError}
            onChange={editor.setNewKey}
            onSubmit={editor.addKey}
          />

          <TranslationTable
            t={t}
            model={{
              languages: editor.languages,
              sourceLanguage: project.sourceLanguage,
              rows: editor.visibleRows,
              renamingKey: editor.renamingKey,
              renameValue: editor.renameValue,
              renameError: editor.renameError,
            }}
            actions={{
              isCellDirty: editor.isCellDirty,
              onCellChange: editor.setCell,
              onStartRename: editor.startRename,
              onRenameValueChange: editor.setRenameValue,
              onApplyRename: () => void editor.applyRename(),
              onCancelRename: editor.cancelRename,
              onDeleteKey: (key) => void editor.deleteKey(key),
            }}
          />

          <footer className="footer-actions">
            <button
              type="button"
              className="btn btn--primary"
              disabled={!hasUnsavedChanges || editor.saving}
              onClick={() => void editor.save()}
            >
              {t("save")}
            </button>
            <button
              type="button"
              className="btn btn--ghost"
              disabled={!hasUnsavedChanges || editor.saving}
              onClick={editor.discardChanges}
            >
              {t("discard")}
            </button>
            <div className="footer-actions__exports">
              {editor.languages.map((language) => (
                <a
                  key={language}
                  className="btn btn--ghost btn--small"
                  href={api.exportUrl(projectId, language)}
                  download={`${language}.json`}
                >
                  {t("exportLanguage", { language })}
                </a>
              ))}
            </div>
          </footer>
        </>
      )}
    </section>
  );
}
