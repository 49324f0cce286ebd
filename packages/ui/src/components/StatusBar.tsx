import type { TranslateFn } from "../types/translations";

type StatusBarProps = {
  t: TranslateFn;
  loadingError: string | null;
  saveError: string | null;
  saving: boolean;
  dirtyCellCount: number;
  lastSavedAt: Date | null;
  onRetry: () => void | Promise<void>;
};

const formatTime = (date: Date) =>
  date.toLocaleTimeString([], {
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12: false,
  });

export default function StatusBar({
  t,
  loadingError,
  saveError,
  saving,
  dirtyCellCount,
  lastSavedAt,
  onRetry,
}: StatusBarProps) {
  const hasUnsavedChanges = dirtyCellCount > 0;
  const savedAtLabel = lastSavedAt ? t("savedAt", { time: formatTime(lastSavedAt) }) : null;

  if (!loadingError && !saveError && !saving && !hasUnsavedChanges && !savedAtLabel) {
    return null;
  }

  return (
    <div className="status-bar" role="status" aria-live="polite">
      {loadingError ? (
        <div className="status-bar__main status-bar__main--error">
          <span>{loadingError}</span>
          <button type="button" className="btn btn--ghost btn--small" onClick={onRetry}>
            {t("retry")}
          </button>
        </div>
      ) : saveError ? (
        <p className="status-bar__main status-bar__main--error">{saveError}</p>
      ) : saving ? (
        <p className="status-bar__main status-bar__main--info">{t("saving")}</p>
      ) : hasUnsavedChanges ? (
        <p className="status-bar__main status-bar__main--info">{t("unsavedChanges")}</p>
      ) : savedAtLabel ? (
        <p className="status-bar__main status-bar__main--success">{savedAtLabel}</p>
      ) : null}

      {hasUnsavedChanges && (
        <div className="status-bar__meta">
          <span className="status-chip">{t("dirtyCells", { count: dirtyCellCount })}</span>
        </div>
      )}
    </div>
  );
}
