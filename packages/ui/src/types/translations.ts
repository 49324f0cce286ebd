import type { UiMessageKey } from "../i18n";

export type TranslateFn = (
  key: UiMessageKey,
  variables?: Record<string, string | number>,
) => string;

export type Screen =
  | { name: "dashboard" }
  | { name: "settings"; projectId: string | null }
  | { name: "upload"; projectId: string }
  | { name: "editor"; projectId: string };

export type Navigate = (screen: Screen) => void;

/** Unsaved cell edits, keyed by translation key and then language. */
export type CellEdits = Record<string, Record<string, string>>;
