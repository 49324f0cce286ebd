import { useCallback, useEffect, useState } from "react";
import type { ProjectSummary } from "@lingodesk/shared";
import { api, errorText } from "../api";

export function useProjects() {
  const [projects, setProjects] = useState<ProjectSummary[]>([]);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);

  const reload = useCallback(async () => {
    setLoading(true);
    try {
      setProjects(await api.listProjects());
      setError(null);
    } catch (loadError) {
      setError(errorText(loadError));
    } finally {
      setLoading(false);
    }
  }, []);

  useEffect(() => {
    void reload();
  }, [reload]);

  const removeProject = useCallback(async (id: string) => {
    await api.deleteProject(id);
    setProjects((current) => current.filter((project) => project.id !== id));
  }, []);

  return { projects, loading, error, reload, removeProject };
}
