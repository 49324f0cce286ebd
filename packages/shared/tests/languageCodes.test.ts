import { describe, expect, it } from "vitest";
import {
  compareLanguages,
  isKnownLanguage,
  isLanguageCode,
  normalizeLanguageCode,
  parseLanguageList,
} from "../src/languageCodes";

describe("language codes", () => {
  it("recognizes well-formed tags", () => {
    expect(isLanguageCode("en")).toBe(true);
    expect(isLanguageCode("pt_BR")).toBe(true);
    expect(isLanguageCode("zh-Hant-TW")).toBe(true);
    expect(isLanguageCode("e")).toBe(false);
    expect(isLanguageCode("en-")).toBe(false);
  });

  it("normalizes casing and separators", () => {
    expect(normalizeLanguageCode(" en_us ")).toBe("en-US");
    expect(normalizeLanguageCode("SR-latn-rs")).toBe("sr-Latn-RS");
    expect(normalizeLanguageCode("es-419")).toBe("es-419");
  });

  it("only knows ISO 639-1 primary languages", () => {
    expect(isKnownLanguage("nl-BE")).toBe(true);
    expect(isKnownLanguage("app")).toBe(false);
  });

  it("compares languages by primary subtag", () => {
    expect(compareLanguages("en-us", "en_US")).toBe("match");
    expect(compareLanguages("en-US", "en-GB")).toBe("region_mismatch");
    expect(compareLanguages("en", "fr")).toBe("mismatch");
  });

  it("splits lists on commas, semicolons and whitespace", () => {
    expect(parseLanguageList(" fr, de;nl  es ")).toEqual(["fr", "de", "nl", "es"]);
  });
});
