import { useState } from "react";
import type { ProjectSummary } from "@lingodesk/shared";
import { errorText } from "../api";
import { useProjects } from "../hooks";
import type { DialogApi } from "../hooks";
import type { Navigate, TranslateFn } from "../types/translations";
import CompletionBar from "./CompletionBar";

type DashboardScreenProps = {
  t: TranslateFn;
  dialog: DialogApi;
  onNavigate: Navigate;
  onNotify: (message: string) => void;
};

export default function DashboardScreen({ t, dialog, onNavigate, onNotify }: DashboardScreenProps) {
  const { projects, loading, error, reload, removeProject } = useProjects();
  const [deleteError, setDeleteError] = useState<string | null>(null);

  const handleDelete = async (project: ProjectSummary) => {
    const confirmed = await dialog.confirm(t("deleteProjectConfirm", { name: project.name }), {
      confirmLabel: t("delete"),
      tone: "danger",
    });
    if (!confirmed) {
      return;
    }

    try {
      await removeProject(project.id);
      setDeleteError(null);
      onNotify(t("projectDeleted", { name: project.name }));
    } catch (removeError) {
      setDeleteError(t("deleteProjectFailed", { message: errorText(removeError) }));
    }
  };

  return (
    <section className="screen dashboard-screen">
      <header className="screen__header">
        <h2>{t("projectsTitle")}</h2>
        <button
          type="button"
          className="btn btn--primary"
          onClick={() => onNavigate({ name: "settings", projectId: null })}
        >
          {t("createProject")}
        </button>
      </header>

      {error && (
        <div className="status-bar__main status-bar__main--error" role="alert">
          <span>{t("loadFailed", { message: error })}</span>
          <button type="button" className="btn btn--ghost btn--small" onClick={() => void reload()}>
            {t("retry")}
          </button>
        </div>
      )}
      {deleteError && (
        <p className="status-bar__main status-bar__main--error" role="alert">
          {deleteError}
        </p>
      )}

      {loading && projects.length === 0 ? (
        <p className="empty-state">{t("loading")}</p>
      ) : projects.length === 0 && !error ? (
        <p className="empty-state">{t("noProjects")}</p>
      ) : (
        <ul className="project-list">
          {projects.map((project) => (
            <li key={project.id} className="project-card">
              <div className="project-card__header">
                <h3>{project.name}</h3>
                <span className="project-card__meta">
                  {t("keyCount", { count: project.keyCount })}
                </span>
              </div>
              <div className="completion-list">
                {project.completion.map((entry) => (
                  <CompletionBar
                    key={entry.language}
                    t={t}
                    completion={entry}
                    isSource={entry.language === project.sourceLanguage}
                  />
                ))}
              </div>
              <div className="project-card__actions">
                <button
                  type="button"
                  className="btn btn--primary btn--small"
                  aria-label={t("openProjectLabel", { name: project.name })}
                  onClick={() => onNavigate({ name: "editor", projectId: project.id })}
                >
                  {t("open")}
                </button>
                <button
                  type="button"
                  className="btn btn--ghost btn--small"
                  aria-label={t("uploadProjectLabel", { name: project.name })}
                  onClick={() => onNavigate({ name: "upload", projectId: project.id })}
                >
                  {t("upload")}
                </button>
                <button
                  type="button"
                  className="btn btn--ghost btn--small"
                  aria-label={t("editProjectLabel", { name: project.name })}
                  onClick={() => onNavigate({ name: "settings", projectId: project.id })}
                >
                  {t("settings")}
                </button>
                <button
                  type="button"
                  className="btn btn--danger btn--small"
                  aria-label={t("deleteProjectLabel", { name: project.name })}
                  onClick={() => void handleDelete(project)}
                >
                  {t("delete")}
                </button>
              </div>
            </li>
          ))}
        </ul>
      )}
    </section>
  );
}
