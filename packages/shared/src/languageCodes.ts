import iso6391Codes from "./data/iso639-1.json";

const KNOWN_PRIMARY_LANGUAGES = new Set<string>(iso6391Codes);

const LANGUAGE_CODE_PATTERN = /^[A-Za-z]{2,3}(?:[-_][A-Za-z0-9]{2,8})*$/;

export const isLanguageCode = (value: string) =>
  LANGUAGE_CODE_PATTERN.test(value.trim());

const normalizeSubtag = (tag: string) => {
  if (/^[A-Za-z]{2}$/.test(tag)) {
    return tag.toUpperCase();
  }

  if (/^[A-Za-z]{4}$/.test(tag)) {
    return `${tag[0].toUpperCase()}${tag.slice(1).toLowerCase()}`;
  }

  return tag.toLowerCase();
};

/**
 * Canonical casing for a language tag: `en_us` becomes `en-US`,
 * `ZH-hant` becomes `zh-Hant`.
 */
export const normalizeLanguageCode = (value: string) => {
  const [primary, ...subtags] = value.trim().replace(/_/g, "-").split("-");
  return [primary.toLowerCase(), ...subtags.map(normalizeSubtag)].join("-");
};

export const primaryLanguage = (value: string) =>
  normalizeLanguageCode(value).split("-")[0];

/** True for a well-formed code whose primary subtag is an ISO 639-1 language. */
export const isKnownLanguage = (value: string) =>
  isLanguageCode(value) && KNOWN_PRIMARY_LANGUAGES.has(primaryLanguage(value));

export type LanguageComparison = "match" | "region_mismatch" | "mismatch";

export const compareLanguages = (
  expected: string,
  actual: string,
): LanguageComparison => {
  if (normalizeLanguageCode(expected) === normalizeLanguageCode(actual)) {
    return "match";
  }

  if (primaryLanguage(expected) === primaryLanguage(actual)) {
    return "region_mismatch";
  }

  return "mismatch";
};

export const parseLanguageList = (value: string) =>
  value
    .split(/[\s,;]+/)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
