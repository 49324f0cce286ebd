import type {
  LanguageCompletion,
  ProjectFieldError,
  ProjectInput,
  ProjectSummary,
  PublicConfig,
  TableResponse,
  TranslationChange,
  TranslationRow,
  UploadIssue,
  UploadMode,
} from "@lingodesk/shared";

export class ApiError extends Error {
  readonly status: number;
  readonly code: string | null;
  readonly details: unknown;

  constructor(message: string, status: number, code: string | null = null, details: unknown = null) {
    super(message);
    this.status = status;
    this.code = code;
    this.details = details;
    this.name = "ApiError";
  }
}

export type UploadPayload = {
  language: string;
  fileName: string;
  content: string;
  mode: UploadMode;
  force: boolean;
};

export type UploadResponse = {
  ok: true;
  language: string;
  mode: UploadMode;
  keyCount: number;
  warnings: UploadIssue[];
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isUploadIssue = (value: unknown): value is UploadIssue =>
  isRecord(value) && typeof value.code === "string" && typeof value.message === "string";

/** Upload problems carried by a 422 response, if any. */
export const uploadErrorsOf = (error: ApiError): UploadIssue[] => {
  if (!isRecord(error.details) || !Array.isArray(error.details.errors)) {
    return [];
  }

  return error.details.errors.filter(isUploadIssue);
};

const isFieldError = (value: unknown): value is ProjectFieldError =>
  isRecord(value) &&
  (value.field === "name" ||
    value.field === "sourceLanguage" ||
    value.field === "targetLanguages") &&
  typeof value.code === "string" &&
  typeof value.message === "string";

/** Field errors carried by a 400 response to a project create or update. */
export const fieldErrorsOf = (error: ApiError): ProjectFieldError[] => {
  if (!isRecord(error.details) || !Array.isArray(error.details.fieldErrors)) {
    return [];
  }

  return error.details.fieldErrors.filter(isFieldError);
};

const readError = async (response: Response) => {
  const payload: unknown = await response.json().catch(() => null);
  if (isRecord(payload) && typeof payload.error === "string") {
    return new ApiError(
      payload.error,
      response.status,
      typeof payload.code === "string" ? payload.code : null,
      payload.details ?? null,
    );
  }

  return new ApiError(`Request failed with status ${response.status}.`, response.status);
};

const requestJson = async <T>(path: string, init?: RequestInit): Promise<T> => {
  const response = await fetch(path, init);
  if (!response.ok) {
    throw await readError(response);
  }

  return response.json();
};

const jsonBody = (method: string, body: unknown): RequestInit => ({
  method,
  headers: { "Content-Type": "application/json" },
  body: JSON.stringify(body),
});

const projectPath = (id: string) => `/api/projects/${encodeURIComponent(id)}`;

export const api = {
  getConfig: () => requestJson<PublicConfig>("/api/config"),

  listProjects: async () =>
    (await requestJson<{ projects: ProjectSummary[] }>("/api/projects")).projects,

  getProject: (id: string) => requestJson<ProjectSummary>(projectPath(id)),

  createProject: (input: ProjectInput) =>
    requestJson<ProjectSummary>("/api/projects", jsonBody("POST", input)),

  updateProject: (id: string, input: ProjectInput) =>
    requestJson<ProjectSummary>(projectPath(id), jsonBody("PATCH", input)),

  deleteProject: (id: string) =>
    requestJson<{ ok: true }>(projectPath(id), { method: "DELETE" }),

  getTable: (id: string) => requestJson<TableResponse>(`${projectPath(id)}/table`),

  saveChanges: (id: string, changes: TranslationChange[]) =>
    requestJson<{ ok: true; updated: number; completion: LanguageCompletion[] }>(
      `${projectPath(id)}/translations`,
      jsonBody("POST", { changes }),
    ),

  addKey: (id: string, key: string) =>
    requestJson<{ ok: true; row: TranslationRow }>(
      `${projectPath(id)}/keys`,
      jsonBody("POST", { key }),
    ),

  renameKey: (id: string, oldKey: string, newKey: string) =>
    requestJson<{ ok: true; oldKey: string; newKey: string }>(
      `${projectPath(id)}/keys/rename`,
      jsonBody("POST", { oldKey, newKey }),
    ),

  removeKey: (id: string, key: string) =>
    requestJson<{ ok: true; key: string; completion: LanguageCompletion[] }>(
      `${projectPath(id)}/keys?${new URLSearchParams({ key })}`,
      { method: "DELETE" },
    ),

  upload: (id: string, payload: UploadPayload) =>
    requestJson<UploadResponse>(`${projectPath(id)}/uploads`, jsonBody("POST", payload)),

  exportUrl: (id: string, language: string) =>
    `${projectPath(id)}/export?${new URLSearchParams({ language })}`,
};

export const errorText = (error: unknown) =>
  error instanceof Error ? error.message : String(error);
