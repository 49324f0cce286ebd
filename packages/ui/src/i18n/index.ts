import en from "./en.json";
import nl from "./nl.json";

export type UiLanguage = "en" | "nl";
export type UiMessageKey = keyof typeof en;

export const UI_LANGUAGE_STORAGE_KEY = "lingodesk-ui-language";

const DICTIONARY: Record<UiLanguage, Record<UiMessageKey, string>> = { en, nl };

const interpolate = (
  template: string,
  variables?: Record<string, string | number>,
): string => {
  if (!variables) {
    return template;
  }

  return template.replace(/\{(\w+)\}/g, (_match, key: string) => {
    const value = variables[key];
    return value === undefined ? "" : String(value);
  });
};

export const isUiLanguage = (value: unknown): value is UiLanguage =>
  value === "en" || value === "nl";

/** Stored choice first, then the browser language. */
export const initialUiLanguage = (): UiLanguage => {
  if (typeof window === "undefined") {
    return "en";
  }

  const stored = window.localStorage.getItem(UI_LANGUAGE_STORAGE_KEY);
  if (isUiLanguage(stored)) {
    return stored;
  }

  return window.navigator.language.toLowerCase().startsWith("nl") ? "nl" : "en";
};

export const translate = (
  language: UiLanguage,
  key: UiMessageKey,
  variables?: Record<string, string | number>,
): string => {
  return interpolate(DICTIONARY[language][key], variables);
};
