import { isLanguageCode, normalizeLanguageCode } from "./languageCodes";
import type { AppProject, ProjectInput } from "./types";

export const MAX_PROJECT_NAME_LENGTH = 80;

export type ProjectField = "name" | "sourceLanguage" | "targetLanguages";

export type ProjectFieldErrorCode =
  | "name_required"
  | "name_too_long"
  | "name_taken"
  | "invalid_source_language"
  | "invalid_target_language"
  | "target_equals_source"
  | "duplicate_target_language";

export type ProjectFieldError = {
  field: ProjectField;
  code: ProjectFieldErrorCode;
  message: string;
  value?: string;
};

export const projectLanguages = (
  project: Pick<AppProject, "sourceLanguage" | "targetLanguages">,
) => [project.sourceLanguage, ...project.targetLanguages];

export const validateProjectInput = (input: ProjectInput): ProjectFieldError[] => {
  const errors: ProjectFieldError[] = [];
  const name = input.name.trim();

  if (!name) {
    errors.push({ field: "name", code: "name_required", message: "Name is required." });
  } else if (name.length > MAX_PROJECT_NAME_LENGTH) {
    errors.push({
      field: "name",
      code: "name_too_long",
      message: `Name must be at most ${MAX_PROJECT_NAME_LENGTH} characters.`,
    });
  }

  const sourceValid = isLanguageCode(input.sourceLanguage);
  if (!sourceValid) {
    errors.push({
      field: "sourceLanguage",
      code: "invalid_source_language",
      message: `"${input.sourceLanguage}" is not a valid language code.`,
      value: input.sourceLanguage,
    });
  }

  const source = sourceValid ? normalizeLanguageCode(input.sourceLanguage) : null;
  const seen = new Set<string>();

  for (const target of input.targetLanguages) {
    if (!isLanguageCode(target)) {
      errors.push({
        field: "targetLanguages",
        code: "invalid_target_language",
        message: `"${target}" is not a valid language code.`,
        value: target,
      });
      continue;
    }

    const normalized = normalizeLanguageCode(target);
    if (normalized === source) {
      errors.push({
        field: "targetLanguages",
        code: "target_equals_source",
        message: `"${normalized}" is already the source language.`,
        value: normalized,
      });
      continue;
    }

    if (seen.has(normalized)) {
      errors.push({
        field: "targetLanguages",
        code: "duplicate_target_language",
        message: `"${normalized}" is listed more than once.`,
        value: normalized,
      });
      continue;
    }

    seen.add(normalized);
  }

  return errors;
};

/** Assumes `validateProjectInput(input)` returned no errors. */
export const normalizeProjectInput = (input: ProjectInput): ProjectInput => ({
  name: input.name.trim(),
  sourceLanguage: normalizeLanguageCode(input.sourceLanguage),
  targetLanguages: input.targetLanguages.map(normalizeLanguageCode),
});
