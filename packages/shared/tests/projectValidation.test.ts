import { describe, expect, it } from "vitest";
import {
  normalizeProjectInput,
  projectLanguages,
  validateProjectInput,
} from "../src/projectValidation";

describe("validateProjectInput", () => {
  it("accepts a well-formed project", () => {
    expect(
      validateProjectInput({
        name: "Storefront",
        sourceLanguage: "en",
        targetLanguages: ["fr", "de"],
      }),
    ).toEqual([]);
  });

  it("requires a name", () => {
    expect(
      validateProjectInput({ name: "   ", sourceLanguage: "en", targetLanguages: [] }),
    ).toEqual([{ field: "name", code: "name_required", message: "Name is required." }]);
  });

  it("limits the name length", () => {
    const errors = validateProjectInput({
      name: "x".repeat(81),
      sourceLanguage: "en",
      targetLanguages: [],
    });

    expect(errors.map((error) => error.code)).toEqual(["name_too_long"]);
  });

  it("rejects an invalid source language", () => {
    const errors = validateProjectInput({
      name: "Storefront",
      sourceLanguage: "english",
      targetLanguages: [],
    });

    expect(errors).toEqual([
      {
        field: "sourceLanguage",
        code: "invalid_source_language",
        message: '"english" is not a valid language code.',
        value: "english",
      },
    ]);
  });

  it("reports each bad target language after normalizing", () => {
    const errors = validateProjectInput({
      name: "Storefront",
      sourceLanguage: "en",
      targetLanguages: ["fr", "FR", "EN", "x1"],
    });

    expect(errors.map(({ code, value }) => ({ code, value }))).toEqual([
      { code: "duplicate_target_language", value: "fr" },
      { code: "target_equals_source", value: "en" },
      { code: "invalid_target_language", value: "x1" },
    ]);
  });
});

describe("normalizeProjectInput", () => {
  it("trims the name and normalizes language codes", () => {
    expect(
      normalizeProjectInput({
        name: "  Storefront ",
        sourceLanguage: "EN",
        targetLanguages: ["pt_br", "zh-hant"],
      }),
    ).toEqual({
      name: "Storefront",
      sourceLanguage: "en",
      targetLanguages: ["pt-BR", "zh-Hant"],
    });
  });
});

describe("projectLanguages", () => {
  it("lists the source language first", () => {
    expect(projectLanguages({ sourceLanguage: "en", targetLanguages: ["fr", "de"] })).toEqual([
      "en",
      "fr",
      "de",
    ]);
  });
});
