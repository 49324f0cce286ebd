import { useEffect, useState } from "react";
import type { FormEvent } from "react";
import type {
  ProjectField,
  ProjectFieldError,
  ProjectInput,
  ProjectSummary,
} from "@lingodesk/shared";
import {
  normalizeProjectInput,
  parseLanguageList,
  projectLanguages,
  validateProjectInput,
} from "@lingodesk/shared";
import { ApiError, api, errorText, fieldErrorsOf } from "../api";
import type { DialogApi } from "../hooks";
import type { Navigate, TranslateFn } from "../types/translations";

type ProjectSettingsScreenProps = {
  t: TranslateFn;
  projectId: string | null;
  dialog: DialogApi;
  onNavigate: Navigate;
  onNotify: (message: string) => void;
};

type FieldMessages = Partial<Record<ProjectField, string>>;

const toFieldMessages = (errors: ProjectFieldError[]): FieldMessages => {
  const messages: FieldMessages = {};
  for (const error of errors) {
    messages[error.field] = messages[error.field]
      ? `${messages[error.field]} ${error.message}`
      : error.message;
  }
  return messages;
};

/** Languages the update drops, the old source included, that still hold a value. */
const removedLanguagesWithData = (project: ProjectSummary, input: ProjectInput) => {
  const nextLanguages = projectLanguages(normalizeProjectInput(input));
  return projectLanguages(project).filter(
    (language) =>
      !nextLanguages.includes(language) &&
      project.completion.some((entry) => entry.language === language && entry.filled > 0),
  );
};

export default function ProjectSettingsScreen({
  t,
  projectId,
  dialog,
  onNavigate,
  onNotify,
}: ProjectSettingsScreenProps) {
  const [existing, setExisting] = useState<ProjectSummary | null>(null);
  const [name, setName] = useState("");
  const [sourceLanguage, setSourceLanguage] = useState("");
  const [targets, setTargets] = useState("");
  const [fieldMessages, setFieldMessages] = useState<FieldMessages>({});
  const [formError, setFormError] = useState<string | null>(null);
  const [submitting, setSubmitting] = useState(false);

  useEffect(() => {
    let active = true;

    const load = async () => {
      try {
        if (projectId) {
          const project = await api.getProject(projectId);
          if (active) {
            setExisting(project);
            setName(project.name);
            setSourceLanguage(project.sourceLanguage);
            setTargets(project.targetLanguages.join(", "));
          }
          return;
        }

        const config = await api.getConfig();
        if (active) {
          setSourceLanguage((current) => current || config.defaultSourceLanguage);
        }
      } catch (error) {
        if (active) {
          setFormError(t("loadFailed", { message: errorText(error) }));
        }
      }
    };

    void load();
    return () => {
      active = false;
    };
  }, [projectId, t]);

  const handleSubmit = async (event: FormEvent) => {
    event.preventDefault();

    const input = {
      name: name.trim(),
      sourceLanguage: sourceLanguage.trim(),
      targetLanguages: parseLanguageList(targets),
    };
    const errors = validateProjectInput(input);
    setFieldMessages(toFieldMessages(errors));
    setFormError(null);
    if (errors.length > 0) {
      return;
    }

    if (existing) {
      const removed = removedLanguagesWithData(existing, input);
      if (removed.length > 0) {
        const confirmed = await dialog.confirm(
          t("removeLanguagesConfirm", { languages: removed.join(", ") }),
          { confirmLabel: t("removeLanguages"), tone: "danger" },
        );
        if (!confirmed) {
          return;
        }
      }
    }

    setSubmitting(true);
    try {
      if (existing) {
        const project = await api.updateProject(existing.id, input);
        onNotify(t("projectSaved", { name: project.name }));
        onNavigate({ name: "dashboard" });
      } else {
        const project = await api.createProject(input);
        onNotify(t("projectCreated", { name: project.name }));
        onNavigate({ name: "upload", projectId: project.id });
      }
    } catch (error) {
      const serverFieldErrors = error instanceof ApiError ? fieldErrorsOf(error) : [];
      if (serverFieldErrors.length > 0) {
        setFieldMessages(toFieldMessages(serverFieldErrors));
      } else {
        setFormError(t("saveFailed", { message: errorText(error) }));
      }
    } finally {
      setSubmitting(false);
    }
  };

  const fieldProps = (field: ProjectField) => ({
    "aria-invalid": fieldMessages[field] ? true : undefined,
    "aria-describedby": fieldMessages[field] ? `${field}-error` : undefined,
  });

  const fieldError = (field: ProjectField) =>
    fieldMessages[field] ? (
      <span id={`${field}-error`} className="inline-error">
        {fieldMessages[field]}
      </span>
    ) : null;

  return (
    <section className="screen settings-screen">
      <header className="screen__header">
        <button
          type="button"
          className="btn btn--ghost"
          onClick={() => onNavigate({ name: "dashboard" })}
        >
          {t("backToDashboard")}
        </button>
        <h2>{projectId ? t("editProjectTitle") : t("createProjectTitle")}</h2>
      </header>

      <form className="settings-form" onSubmit={(event) => void handleSubmit(event)} noValidate>
        <div className="settings-form__field">
          <label>
            <span>{t("projectName")}</span>
            <input
              value={name}
              onChange={(event) => setName(event.target.value)}
              {...fieldProps("name")}
            />
          </label>
          {fieldError("name")}
        </div>
        <div className="settings-form__field">
          <label>
            <span>{t("sourceLanguage")}</span>
            <input
              value={sourceLanguage}
              placeholder="en"
              onChange={(event) => setSourceLanguage(event.target.value)}
              {...fieldProps("sourceLanguage")}
            />
          </label>
          {fieldError("sourceLanguage")}
        </div>
        <div className="settings-form__field">
          <label>
            <span>{t("targetLanguages")}</span>
            <input
              value={targets}
              placeholder="fr, de, pt-BR"
              onChange={(event) => setTargets(event.target.value)}
              {...fieldProps("targetLanguages")}
            />
          </label>
          <small>{t("targetLanguagesHint")}</small>
          {fieldError("targetLanguages")}
        </div>

        {formError && (
          <p className="status-bar__main status-bar__main--error" role="alert">
            {formError}
          </p>
        )}

        <div className="settings-form__actions">
          <button type="submit" className="btn btn--primary" disabled={submitting}>
            {projectId ? t("saveProject") : t("createProject")}
          </button>
        </div>
      </form>
    </section>
  );
}
