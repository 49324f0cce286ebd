import {
  compareLanguages,
  isKnownLanguage,
  normalizeLanguageCode,
} from "./languageCodes";
import { flattenTranslations } from "./translationTree";
import type { FlatTranslations, TranslationTree } from "./types";

export type UploadIssueCode =
  | "INVALID_JSON"
  | "NOT_AN_OBJECT"
  | "LANGUAGE_MISMATCH"
  | "REGION_MISMATCH"
  | "LANGUAGE_NOT_DETECTED"
  | "COERCED_VALUES"
  | "KEY_COLLISION"
  | "INVALID_KEYS"
  | "EMPTY_FILE";

export type UploadIssue = {
  code: UploadIssueCode;
  message: string;
  keys?: string[];
};

export type UploadValidation =
  | {
      ok: true;
      tree: TranslationTree;
      entries: FlatTranslations;
      detectedLanguage: string | null;
      warnings: UploadIssue[];
    }
  | {
      ok: false;
      errors: UploadIssue[];
      detectedLanguage: string | null;
    };

export type LocaleUpload = {
  fileName: string;
  content: string;
  expectedLanguage: string;
  /** Reports a file name for another language as a warning instead of an error. */
  allowLanguageMismatch?: boolean;
};

const JSON_EXTENSION_PATTERN = /\.json$/i;

const baseName = (fileName: string) => {
  const segments = fileName.split(/[\\/]/);
  return segments[segments.length - 1].replace(JSON_EXTENSION_PATTERN, "");
};

export const inferLanguageFromFileName = (fileName: string) => {
  const name = baseName(fileName).trim();
  if (isKnownLanguage(name)) {
    return normalizeLanguageCode(name);
  }

  const dotIndex = name.lastIndexOf(".");
  if (dotIndex >= 0) {
    const suffix = name.slice(dotIndex + 1);
    if (isKnownLanguage(suffix)) {
      return normalizeLanguageCode(suffix);
    }
  }

  return null;
};

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const checkLanguage = (
  fileName: string,
  expectedLanguage: string,
  detectedLanguage: string | null,
): UploadIssue | null => {
  if (detectedLanguage === null) {
    return {
      code: "LANGUAGE_NOT_DETECTED",
      message: `Could not detect a language code in "${fileName}".`,
    };
  }

  const comparison = compareLanguages(expectedLanguage, detectedLanguage);
  if (comparison === "mismatch") {
    return {
      code: "LANGUAGE_MISMATCH",
      message: `File "${fileName}" does not match expected language code "${expectedLanguage}" (detected "${detectedLanguage}").`,
    };
  }

  if (comparison === "region_mismatch") {
    return {
      code: "REGION_MISMATCH",
      message: `File "${fileName}" is for "${detectedLanguage}", expected "${expectedLanguage}".`,
    };
  }

  return null;
};

export const validateLocaleUpload = ({
  fileName,
  content,
  expectedLanguage,
  allowLanguageMismatch = false,
}: LocaleUpload): UploadValidation => {
  const detectedLanguage = inferLanguageFromFileName(fileName);
  const languageIssue = checkLanguage(fileName, expectedLanguage, detectedLanguage);
  const errors: UploadIssue[] = [];
  const warnings: UploadIssue[] = [];

  if (languageIssue?.code === "LANGUAGE_MISMATCH" && !allowLanguageMismatch) {
    errors.push(languageIssue);
  } else if (languageIssue) {
    warnings.push(languageIssue);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content.replace(/^\uFEFF/, ""));
  } catch (error) {
    errors.push({
      code: "INVALID_JSON",
      message: `"${fileName}" is not valid JSON: ${
        error instanceof Error ? error.message : String(error)
      }`,
    });
    return { ok: false, errors, detectedLanguage };
  }

  if (!isPlainObject(parsed)) {
    errors.push({
      code: "NOT_AN_OBJECT",
      message: `"${fileName}" must contain a JSON object at the top level.`,
    });
    return { ok: false, errors, detectedLanguage };
  }

  if (errors.length > 0) {
    return { ok: false, errors, detectedLanguage };
  }

  const result = flattenTranslations(parsed);
  const keyCount = Object.keys(result.entries).length;

  if (keyCount === 0) {
    warnings.push({
      code: "EMPTY_FILE",
      message: `"${fileName}" contains no translations.`,
    });
  }

  if (result.coerced.length > 0) {
    warnings.push({
      code: "COERCED_VALUES",
      message: `${result.coerced.length} non-string value(s) were converted to text.`,
      keys: result.coerced,
    });
  }

  if (result.collisions.length > 0) {
    warnings.push({
      code: "KEY_COLLISION",
      message: `${result.collisions.length} key(s) collide with earlier keys and were skipped.`,
      keys: result.collisions,
    });
  }

  if (result.invalid.length > 0) {
    warnings.push({
      code: "INVALID_KEYS",
      message: `${result.invalid.length} key(s) have an empty or reserved segment and were skipped.`,
      keys: result.invalid,
    });
  }

  return {
    ok: true,
    tree: parsed,
    entries: result.entries,
    detectedLanguage,
    warnings,
  };
};

/** True when the only blocking problem is the file name's language. */
export const isForceableUploadFailure = (
  validation: Extract<UploadValidation, { ok: false }>,
) => validation.errors.every((issue) => issue.code === "LANGUAGE_MISMATCH");
