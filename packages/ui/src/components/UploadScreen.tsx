import { useEffect, useState } from "react";
import type { ChangeEvent } from "react";
import type { ProjectSummary, UploadMode } from "@lingodesk/shared";
import {
  compareLanguages,
  inferLanguageFromFileName,
  projectLanguages,
} from "@lingodesk/shared";
import { ApiError, api, errorText, uploadErrorsOf } from "../api";
import type { UploadResponse } from "../api";
import type { DialogApi } from "../hooks";
import type { Navigate, TranslateFn } from "../types/translations";
import { readFileText } from "../utils/files";

type UploadScreenProps = {
  t: TranslateFn;
  projectId: string;
  dialog: DialogApi;
  onNavigate: Navigate;
};

type UploadRowState =
  | { status: "uploading"; fileName: string }
  | { status: "done"; fileName: string; result: UploadResponse }
  | { status: "failed"; fileName: string; messages: string[] };

export default function UploadScreen({ t, projectId, dialog, onNavigate }: UploadScreenProps) {
  const [project, setProject] = useState<ProjectSummary | null>(null);
  const [loadingError, setLoadingError] = useState<string | null>(null);
  const [mode, setMode] = useState<UploadMode>("replace");
  const [rowStates, setRowStates] = useState<Record<string, UploadRowState>>({});

  useEffect(() => {
    let active = true;
    api
      .getProject(projectId)
      .then((next) => {
        if (active) {
          setProject(next);
        }
      })
      .catch((error: unknown) => {
        if (active) {
          setLoadingError(t("loadFailed", { message: errorText(error) }));
        }
      });

    return () => {
      active = false;
    };
  }, [projectId, t]);

  const setRowState = (language: string, state: UploadRowState) =>
    setRowStates((current) => ({ ...current, [language]: state }));

  const uploadFile = async (language: string, file: File) => {
    const detected = inferLanguageFromFileName(file.name);
    let force = false;
    if (detected && compareLanguages(language, detected) === "mismatch") {
      const confirmed = await dialog.confirm(
        t("uploadMismatchConfirm", { fileName: file.name, detected, language }),
        { confirmLabel: t("uploadAnyway") },
      );
      if (!confirmed) {
        return;
      }
      force = true;
    }

    setRowState(language, { status: "uploading", fileName: file.name });
    try {
      const content = await readFileText(file);
      const result = await api.upload(projectId, {
        language,
        fileName: file.name,
        content,
        mode,
        force,
      });
      setRowState(language, { status: "done", fileName: file.name, result });
    } catch (error) {
      const issues = error instanceof ApiError ? uploadErrorsOf(error) : [];
      setRowState(language, {
        status: "failed",
        fileName: file.name,
        messages: issues.length > 0 ? issues.map((issue) => issue.message) : [errorText(error)],
      });
    }
  };

  const handleFileChange = (language: string, event: ChangeEvent<HTMLInputElement>) => {
    const file = event.target.files?.[0];
    event.target.value = "";
    if (file) {
      void uploadFile(language, file);
    }
  };

  const renderRowState = (state: UploadRowState | undefined) => {
    if (!state) {
      return <span className="upload-row__hint">{t("noFileYet")}</span>;
    }

    if (state.status === "uploading") {
      return <span className="upload-row__hint">{t("uploading", { fileName: state.fileName })}</span>;
    }

    if (state.status === "failed") {
      return (
        <div className="upload-row__errors" role="alert">
          <strong>{t("uploadRejected", { fileName: state.fileName })}</strong>
          <ul>
            {state.messages.map((message) => (
              <li key={message}>{message}</li>
            ))}
          </ul>
        </div>
      );
    }

    return (
      <div className="upload-row__result">
        <span>
          {t("uploadDone", {
            fileName: state.fileName,
            count: state.result.keyCount,
          })}
        </span>
        {state.result.warnings.length > 0 && (
          <ul className="upload-row__warnings">
            {state.result.warnings.map((warning) => (
              <li key={warning.code}>{warning.message}</li>
            ))}
          </ul>
        )}
      </div>
    );
  };

  return (
    <section className="screen upload-screen">
      <header className="screen__header">
        <button
          type="button"
          className="btn btn--ghost"
          onClick={() => onNavigate({ name: "dashboard" })}
        >
          {t("backToDashboard")}
        </button>
        <h2>{project ? t("uploadTitle", { name: project.name }) : t("loading")}</h2>
      </header>

      {loadingError && (
        <p className="status-bar__main status-bar__main--error" role="alert">
          {loadingError}
        </p>
      )}

      {project && (
        <>
          <fieldset className="upload-mode">
            <legend>{t("uploadModeLegend")}</legend>
            <label>
              <input
                type="radio"
                name="upload-mode"
                checked={mode === "replace"}
                onChange={() => setMode("replace")}
              />
              {t("uploadModeReplace")}
            </label>
            <label>
              <input
                type="radio"
                name="upload-mode"
                checked={mode === "merge"}
                onChange={() => setMode("merge")}
              />
              {t("uploadModeMerge")}
            </label>
          </fieldset>

          <ul className="upload-list">
            {projectLanguages(project).map((language) => (
              <li key={language} className="upload-row">
                <label className="upload-row__picker">
                  <span>
                    {language}
                    {language === project.sourceLanguage ? ` (${t("sourceTag")})` : ""}
                  </span>
                  <input
                    type="file"
                    accept=".json,application/json"
                    aria-label={t("uploadFileFor", { language })}
                    onChange={(event) => handleFileChange(language, event)}
                  />
                </label>
                {renderRowState(rowStates[language])}
              </li>
            ))}
          </ul>

          <div className="footer-actions">
            <button
              type="button"
              className="btn btn--primary"
              onClick={() => onNavigate({ name: "editor", projectId })}
            >
              {t("openEditor")}
            </button>
          </div>
        </>
      )}
    </section>
  );
}
