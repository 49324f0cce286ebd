import { useCallback, useEffect, useRef, useState } from "react";
import type { UiLanguage, UiMessageKey } from "./i18n";
import {
  UI_LANGUAGE_STORAGE_KEY,
  initialUiLanguage,
  isUiLanguage,
  translate,
} from "./i18n";
import {
  ConfirmDialog,
  DashboardScreen,
  EditorScreen,
  ProjectSettingsScreen,
  UploadScreen,
} from "./components";
import { useConfirmDialog } from "./hooks";
import type { Navigate, Screen } from "./types/translations";
import "./App.css";

const screenKey = (screen: Screen) =>
  screen.name === "dashboard" ? screen.name : `${screen.name}:${screen.projectId ?? "new"}`;

export default function App() {
  const [uiLanguage, setUiLanguage] = useState<UiLanguage>(initialUiLanguage);
  const [screen, setScreen] = useState<Screen>({ name: "dashboard" });
  const [toast, setToast] = useState<{ id: number; message: string } | null>(null);
  const editorDirtyRef = useRef(false);

  const t = useCallback(
    (key: UiMessageKey, variables?: Record<string, string | number>) =>
      translate(uiLanguage, key, variables),
    [uiLanguage],
  );

  useEffect(() => {
    window.localStorage.setItem(UI_LANGUAGE_STORAGE_KEY, uiLanguage);
  }, [uiLanguage]);

  useEffect(() => {
    if (!toast) {
      return;
    }

    const timeoutId = window.setTimeout(() => {
      setToast((current) => (current?.id === toast.id ? null : current));
    }, 2800);

    return () => window.clearTimeout(timeoutId);
  }, [toast]);

  const handleNotify = useCallback((message: string) => {
    setToast({ id: Date.now(), message });
  }, []);

  const confirmDialog = useConfirmDialog(t);
  const { confirm } = confirmDialog.api;

  const handleDirtyChange = useCallback((dirty: boolean) => {
    editorDirtyRef.current = dirty;
  }, []);

  const navigate = useCallback(
    async (next: Screen) => {
      if (editorDirtyRef.current) {
        const confirmed = await confirm(t("leaveUnsavedConfirm"), {
          confirmLabel: t("leaveEditor"),
          tone: "danger",
        });
        if (!confirmed) {
          return;
        }
        editorDirtyRef.current = false;
      }
      setScreen(next);
    },
    [confirm, t],
  );

  const handleNavigate: Navigate = useCallback(
    (next) => {
      void navigate(next);
    },
    [navigate],
  );

  const renderScreen = () => {
    switch (screen.name) {
      case "dashboard":
        return (
          <DashboardScreen
            t={t}
            dialog={confirmDialog.api}
            onNavigate={handleNavigate}
            onNotify={handleNotify}
          />
        );
      case "settings":
        return (
          <ProjectSettingsScreen
            t={t}
            projectId={screen.projectId}
            dialog={confirmDialog.api}
            onNavigate={handleNavigate}
            onNotify={handleNotify}
          />
        );
      case "upload":
        return (
          <UploadScreen
            t={t}
            projectId={screen.projectId}
            dialog={confirmDialog.api}
            onNavigate={handleNavigate}
          />
        );
      case "editor":
        return (
          <EditorScreen
            t={t}
            projectId={screen.projectId}
            dialog={confirmDialog.api}
            onNavigate={handleNavigate}
            onNotify={handleNotify}
            onDirtyChange={handleDirtyChange}
          />
        );
    }
  };

  return (
    <div className="app">
      <header className="app-header">
        <h1 className="app-header__title">{t("appTitle")}</h1>
        <label className="app-header__language">
          <span>{t("uiLanguage")}</span>
          <select
            value={uiLanguage}
            onChange={(event) => {
              if (isUiLanguage(event.target.value)) {
                setUiLanguage(event.target.value);
              }
            }}
          >
            <option value="en">English</option>
            <option value="nl">Nederlands</option>
          </select>
        </label>
      </header>

      <main className="app-main" key={screenKey(screen)}>
        {renderScreen()}
      </main>

      <ConfirmDialog
        request={confirmDialog.request}
        onAccept={confirmDialog.accept}
        onDecline={confirmDialog.decline}
      />
      {toast ? (
        <div className="toast-stack" role="status" aria-live="polite">
          <p className="toast toast--success">{toast.message}</p>
        </div>
      ) : null}
    </div>
  );
}
