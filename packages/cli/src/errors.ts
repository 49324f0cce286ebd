import type { ProjectFieldError, UploadIssue } from "@lingodesk/shared";

export type ValidationErrorCode = "INVALID_PROJECT" | "INVALID_REQUEST";

export class ValidationError extends Error {
  readonly code: ValidationErrorCode;
  readonly fieldErrors: ProjectFieldError[];

  constructor(
    code: ValidationErrorCode,
    message: string,
    fieldErrors: ProjectFieldError[] = [],
  ) {
    super(message);
    this.code = code;
    this.fieldErrors = fieldErrors;
    this.name = "ValidationError";
  }
}

export class ProjectNotFoundError extends Error {
  readonly code = "PROJECT_NOT_FOUND";
  readonly projectRef: string;

  constructor(projectRef: string) {
    super(`Project "${projectRef}" was not found.`);
    this.projectRef = projectRef;
    this.name = "ProjectNotFoundError";
  }
}

export type StorageErrorCode = "CORRUPT_STORE" | "CORRUPT_LOCALE_FILE";

export class StorageError extends Error {
  readonly code: StorageErrorCode;
  readonly filePath: string;

  constructor(code: StorageErrorCode, filePath: string, message: string) {
    super(message);
    this.code = code;
    this.filePath = filePath;
    this.name = "StorageError";
  }
}

export class WriteLockError extends Error {
  readonly code = "WRITE_LOCKED";

  constructor(message: string) {
    super(message);
    this.name = "WriteLockError";
  }
}

export class UploadRejectedError extends Error {
  readonly code = "UPLOAD_REJECTED";
  readonly errors: UploadIssue[];
  /** True when `force` would let the same upload through. */
  readonly forceable: boolean;

  constructor(errors: UploadIssue[], forceable: boolean) {
    super(errors.map((issue) => issue.message).join(" "));
    this.errors = errors;
    this.forceable = forceable;
    this.name = "UploadRejectedError";
  }
}

export const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);
