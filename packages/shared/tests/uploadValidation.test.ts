import { describe, expect, it } from "vitest";
import {
  inferLanguageFromFileName,
  isForceableUploadFailure,
  validateLocaleUpload,
} from "../src/uploadValidation";

describe("inferLanguageFromFileName", () => {
  it("reads the base name as a language code", () => {
    expect(inferLanguageFromFileName("locales/pt_br.json")).toBe("pt-BR");
    expect(inferLanguageFromFileName("zh-hant.json")).toBe("zh-Hant");
    expect(inferLanguageFromFileName("EN.JSON")).toBe("en");
  });

  it("reads a language suffix after the last dot", () => {
    expect(inferLanguageFromFileName("messages.en_GB.json")).toBe("en-GB");
  });

  it("ignores names that are not known languages", () => {
    expect(inferLanguageFromFileName("app.json")).toBeNull();
    expect(inferLanguageFromFileName("strings.json")).toBeNull();
  });
});

describe("validateLocaleUpload", () => {
  it("accepts a matching file", () => {
    const result = validateLocaleUpload({
      fileName: "fr.json",
      content: '{"auth":{"login":"Connexion"}}',
      expectedLanguage: "fr",
    });

    expect(result).toEqual({
      ok: true,
      tree: { auth: { login: "Connexion" } },
      entries: { "auth.login": "Connexion" },
      detectedLanguage: "fr",
      warnings: [],
    });
  });

  it("rejects a file named for another language", () => {
    const result = validateLocaleUpload({
      fileName: "de.json",
      content: '{"title":"Titel"}',
      expectedLanguage: "fr",
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors).toEqual([
        {
          code: "LANGUAGE_MISMATCH",
          message:
            'File "de.json" does not match expected language code "fr" (detected "de").',
        },
      ]);
      expect(isForceableUploadFailure(result)).toBe(true);
    }
  });

  it("downgrades a language mismatch to a warning when allowed", () => {
    const result = validateLocaleUpload({
      fileName: "de.json",
      content: '{"title":"Titel"}',
      expectedLanguage: "fr",
      allowLanguageMismatch: true,
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.warnings.map((issue) => issue.code)).toEqual(["LANGUAGE_MISMATCH"]);
    }
  });

  it("warns about a region mismatch", () => {
    const result = validateLocaleUpload({
      fileName: "messages.en_GB.json",
      content: '{"title":"Colour"}',
      expectedLanguage: "en-US",
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.warnings).toEqual([
        {
          code: "REGION_MISMATCH",
          message: 'File "messages.en_GB.json" is for "en-GB", expected "en-US".',
        },
      ]);
    }
  });

  it("warns when no language can be detected", () => {
    const result = validateLocaleUpload({
      fileName: "app.json",
      content: '{"title":"Title"}',
      expectedLanguage: "en",
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.warnings.map((issue) => issue.code)).toEqual(["LANGUAGE_NOT_DETECTED"]);
      expect(result.detectedLanguage).toBeNull();
    }
  });

  it("rejects invalid JSON", () => {
    const result = validateLocaleUpload({
      fileName: "fr.json",
      content: "{",
      expectedLanguage: "fr",
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].code).toBe("INVALID_JSON");
      expect(result.errors[0].message).toMatch(/^"fr\.json" is not valid JSON: /);
      expect(isForceableUploadFailure(result)).toBe(false);
    }
  });

  it("reports both a mismatch and invalid JSON", () => {
    const result = validateLocaleUpload({
      fileName: "de.json",
      content: "{",
      expectedLanguage: "fr",
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors.map((issue) => issue.code)).toEqual([
        "LANGUAGE_MISMATCH",
        "INVALID_JSON",
      ]);
      expect(isForceableUploadFailure(result)).toBe(false);
    }
  });

  it("rejects a top-level array", () => {
    const result = validateLocaleUpload({
      fileName: "fr.json",
      content: '["a"]',
      expectedLanguage: "fr",
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors.map((issue) => issue.code)).toEqual(["NOT_AN_OBJECT"]);
    }
  });

  it("strips a byte order mark", () => {
    const result = validateLocaleUpload({
      fileName: "fr.json",
      content: '\uFEFF{"title":"Titre"}',
      expectedLanguage: "fr",
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.entries).toEqual({ title: "Titre" });
    }
  });

  it("warns about an empty file", () => {
    const result = validateLocaleUpload({
      fileName: "fr.json",
      content: "{}",
      expectedLanguage: "fr",
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.warnings).toEqual([
        { code: "EMPTY_FILE", message: '"fr.json" contains no translations.' },
      ]);
    }
  });

  it("warns about coerced values and colliding keys", () => {
    const result = validateLocaleUpload({
      fileName: "fr.json",
      content: '{"count":1,"title":"Titre","title.sub":"Sous-titre"}',
      expectedLanguage: "fr",
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.entries).toEqual({ count: "1", title: "Titre" });
      expect(result.warnings).toEqual([
        {
          code: "COERCED_VALUES",
          message: "1 non-string value(s) were converted to text.",
          keys: ["count"],
        },
        {
          code: "KEY_COLLISION",
          message: "1 key(s) collide with earlier keys and were skipped.",
          keys: ["title.sub"],
        },
      ]);
    }
  });
});
