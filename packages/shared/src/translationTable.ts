import type { InvalidKeyReason } from "./translationKeys";
import {
  describeInvalidKeyReason,
  getInvalidTranslationKeyReason,
} from "./translationKeys";
import type { FlattenResult } from "./translationTree";
import {
  compareKeys,
  flattenTranslations,
  isDotPrefix,
  unflattenTranslations,
} from "./translationTree";
import type {
  FlatTranslations,
  LanguageCompletion,
  TranslationRow,
  TranslationTree,
  TranslationsByLocale,
} from "./types";

export type TranslationTableErrorCode =
  | "UNKNOWN_KEY"
  | "UNKNOWN_LANGUAGE"
  | "DUPLICATE_LANGUAGE"
  | "INVALID_KEY"
  | "KEY_CONFLICT";

export class TranslationTableError extends Error {
  readonly code: TranslationTableErrorCode;
  readonly key: string | null;
  readonly reason: InvalidKeyReason | null;
  readonly conflictingKey: string | null;

  constructor(
    code: TranslationTableErrorCode,
    message: string,
    details: {
      key?: string;
      reason?: InvalidKeyReason;
      conflictingKey?: string;
    } = {},
  ) {
    super(message);
    this.code = code;
    this.key = details.key ?? null;
    this.reason = details.reason ?? null;
    this.conflictingKey = details.conflictingKey ?? null;
    this.name = "TranslationTableError";
  }
}

export type RowFilter = {
  search?: string;
  onlyIncomplete?: boolean;
  language?: string;
};

export type TreeExportOptions = {
  omitEmpty?: boolean;
  sortKeys?: boolean;
};

export const isFilled = (value: string | undefined) =>
  value !== undefined && value.trim() !== "";

const strictPrefixes = (key: string) => {
  const segments = key.split(".");
  const prefixes: string[] = [];
  for (let index = 1; index < segments.length; index += 1) {
    prefixes.push(segments.slice(0, index).join("."));
  }
  return prefixes;
};

/**
 * In-memory table of translation keys and their value per language.
 *
 * Keys never shadow each other: the table refuses `a.b` while `a` exists (and
 * the reverse), so every language can always be re-nested into a JSON tree.
 */
export class TranslationTable {
  private languageList: string[];
  private readonly valuesByKey = new Map<string, Map<string, string>>();
  private readonly parentCounts = new Map<string, number>();

  constructor(languages: readonly string[]) {
    const unique = new Set(languages);
    if (unique.size !== languages.length) {
      throw new TranslationTableError(
        "DUPLICATE_LANGUAGE",
        `Languages must be unique: ${languages.join(", ")}.`,
      );
    }
    this.languageList = [...languages];
  }

  static fromTrees(
    languages: readonly string[],
    trees: Partial<TranslationsByLocale>,
  ) {
    const table = new TranslationTable(languages);
    for (const language of languages) {
      table.loadLanguage(language, trees[language] ?? {}, "merge-all");
    }
    return table;
  }

  static fromRows(languages: readonly string[], rows: readonly TranslationRow[]) {
    const table = new TranslationTable(languages);
    for (const row of rows) {
      if (table.findConflict(row.key) !== null) {
        continue;
      }
      table.insertKey(row.key);
      for (const language of languages) {
        const value = row.values[language];
        if (value !== undefined) {
          table.writeValue(row.key, language, value);
        }
      }
    }
    return table;
  }

  get languages(): readonly string[] {
    return this.languageList;
  }

  get size() {
    return this.valuesByKey.size;
  }

  keys() {
    return Array.from(this.valuesByKey.keys());
  }

  has(key: string) {
    return this.valuesByKey.has(key);
  }

  value(key: string, language: string) {
    return this.valuesByKey.get(key)?.get(language) ?? "";
  }

  row(key: string): TranslationRow | undefined {
    if (!this.valuesByKey.has(key)) {
      return undefined;
    }

    const values: Record<string, string> = {};
    for (const language of this.languageList) {
      values[language] = this.value(key, language);
    }
    return { key, values };
  }

  rows(): TranslationRow[] {
    return this.keys().map((key) => ({
      key,
      values: Object.fromEntries(
        this.languageList.map((language) => [language, this.value(key, language)]),
      ),
    }));
  }

  completion(language: string): LanguageCompletion {
    this.requireLanguage(language);

    let filled = 0;
    for (const values of this.valuesByKey.values()) {
      if (isFilled(values.get(language))) {
        filled += 1;
      }
    }

    const total = this.valuesByKey.size;
    return {
      language,
      filled,
      total,
      percent: total === 0 ? 0 : Math.floor((filled * 100) / total),
    };
  }

  completionByLanguage() {
    return this.languageList.map((language) => this.completion(language));
  }

  isIncomplete(key: string, language?: string) {
    const languages = language === undefined ? this.languageList : [language];
    return languages.some((entry) => !isFilled(this.valuesByKey.get(key)?.get(entry)));
  }

  missingCount(language?: string) {
    if (language !== undefined) {
      this.requireLanguage(language);
    }
    return this.keys().filter((key) => this.isIncomplete(key, language)).length;
  }

  filterRows(filter: RowFilter = {}): TranslationRow[] {
    const search = filter.search?.trim().toLowerCase() ?? "";
    const language = filter.language || undefined;
    if (language !== undefined) {
      this.requireLanguage(language);
    }

    return this.rows().filter((row) => {
      if (filter.onlyIncomplete && !this.isIncomplete(row.key, language)) {
        return false;
      }

      if (!search) {
        return true;
      }

      if (row.key.toLowerCase().includes(search)) {
        return true;
      }

      return Object.values(row.values).some((value) =>
        value.toLowerCase().includes(search),
      );
    });
  }

  setValue(key: string, language: string, value: string) {
    this.requireKey(key);
    this.requireLanguage(language);
    this.writeValue(key, language, value);
  }

  addKey(rawKey: string, values: Record<string, string> = {}) {
    const key = rawKey.trim();
    this.assertUsableKey(key);
    for (const language of Object.keys(values)) {
      this.requireLanguage(language);
    }

    this.insertKey(key);
    for (const [language, value] of Object.entries(values)) {
      this.writeValue(key, language, value);
    }
    return key;
  }

  removeKey(key: string) {
    this.requireKey(key);
    this.deleteKey(key);
  }

  renameKey(oldKey: string, rawNewKey: string) {
    this.requireKey(oldKey);
    const newKey = rawNewKey.trim();
    if (newKey === oldKey) {
      return newKey;
    }
    this.assertUsableKey(newKey, oldKey);

    const entries = Array.from(this.valuesByKey.entries());
    for (const [key] of entries) {
      this.deleteKey(key);
    }
    for (const [key, values] of entries) {
      const nextKey = key === oldKey ? newKey : key;
      this.insertKey(nextKey);
      for (const [language, value] of values) {
        this.writeValue(nextKey, language, value);
      }
    }
    return newKey;
  }

  /**
   * Replaces every value of `language` with the uploaded tree. Keys the tree
   * does not mention are emptied for that language, new keys are appended.
   */
  replaceLanguage(language: string, tree: TranslationTree) {
    this.requireLanguage(language);
    for (const values of this.valuesByKey.values()) {
      values.delete(language);
    }
    return this.loadLanguage(language, tree, "merge-all");
  }

  /** Overlays the filled values of the uploaded tree onto `language`. */
  mergeLanguage(language: string, tree: TranslationTree) {
    this.requireLanguage(language);
    return this.loadLanguage(language, tree, "merge-filled");
  }

  addLanguage(language: string) {
    if (this.languageList.includes(language)) {
      throw new TranslationTableError(
        "DUPLICATE_LANGUAGE",
        `Language "${language}" is already part of the table.`,
      );
    }
    this.languageList = [...this.languageList, language];
  }

  removeLanguage(language: string) {
    this.requireLanguage(language);
    this.languageList = this.languageList.filter((entry) => entry !== language);
    for (const values of this.valuesByKey.values()) {
      values.delete(language);
    }
  }

  toFlat(language: string, options: Pick<TreeExportOptions, "omitEmpty"> = {}) {
    this.requireLanguage(language);
    const flat: FlatTranslations = {};
    for (const key of this.valuesByKey.keys()) {
      const value = this.value(key, language);
      if (options.omitEmpty && !isFilled(value)) {
        continue;
      }
      flat[key] = value;
    }
    return flat;
  }

  toTree(language: string, options: TreeExportOptions = {}): TranslationTree {
    return unflattenTranslations(this.toFlat(language, options), {
      sortKeys: options.sortKeys,
    });
  }

  toTrees(options: TreeExportOptions = {}): TranslationsByLocale {
    const trees: TranslationsByLocale = {};
    for (const language of this.languageList) {
      trees[language] = this.toTree(language, options);
    }
    return trees;
  }

  private loadLanguage(
    language: string,
    tree: TranslationTree,
    mode: "merge-all" | "merge-filled",
  ): FlattenResult {
    const result = flattenTranslations(tree);
    const conflicts: string[] = [];

    for (const [key, value] of Object.entries(result.entries)) {
      if (!this.valuesByKey.has(key)) {
        if (this.findConflict(key) !== null) {
          conflicts.push(key);
          continue;
        }
        this.insertKey(key);
      }

      if (mode === "merge-filled" && !isFilled(value)) {
        continue;
      }
      this.writeValue(key, language, value);
    }

    return {
      ...result,
      collisions: Array.from(new Set([...result.collisions, ...conflicts])).sort(
        compareKeys,
      ),
    };
  }

  private findConflict(key: string, ignoredKey?: string) {
    if (this.valuesByKey.has(key) && key !== ignoredKey) {
      return key;
    }

    for (const prefix of strictPrefixes(key)) {
      if (prefix !== ignoredKey && this.valuesByKey.has(prefix)) {
        return prefix;
      }
    }

    const nestedCount =
      (this.parentCounts.get(key) ?? 0) -
      (ignoredKey !== undefined && isDotPrefix(key, ignoredKey) ? 1 : 0);
    if (nestedCount > 0) {
      return (
        this.keys().find(
          (existing) => existing !== ignoredKey && isDotPrefix(key, existing),
        ) ?? null
      );
    }

    return null;
  }

  private assertUsableKey(key: string, ignoredKey?: string) {
    const reason = getInvalidTranslationKeyReason(key);
    if (reason) {
      throw new TranslationTableError("INVALID_KEY", describeInvalidKeyReason(reason), {
        key,
        reason,
      });
    }

    const conflictingKey = this.findConflict(key, ignoredKey);
    if (conflictingKey !== null) {
      throw new TranslationTableError(
        "KEY_CONFLICT",
        conflictingKey === key
          ? `Key "${key}" already exists.`
          : `Key "${key}" conflicts with existing key "${conflictingKey}".`,
        { key, conflictingKey },
      );
    }
  }

  private requireKey(key: string) {
    if (!this.valuesByKey.has(key)) {
      throw new TranslationTableError("UNKNOWN_KEY", `Unknown key "${key}".`, { key });
    }
  }

  private requireLanguage(language: string) {
    if (!this.languageList.includes(language)) {
      throw new TranslationTableError(
        "UNKNOWN_LANGUAGE",
        `Language "${language}" is not part of this project.`,
      );
    }
  }

  private insertKey(key: string) {
    this.valuesByKey.set(key, new Map());
    for (const prefix of strictPrefixes(key)) {
      this.parentCounts.set(prefix, (this.parentCounts.get(prefix) ?? 0) + 1);
    }
  }

  private deleteKey(key: string) {
    this.valuesByKey.delete(key);
    for (const prefix of strictPrefixes(key)) {
      const next = (this.parentCounts.get(prefix) ?? 0) - 1;
      if (next > 0) {
        this.parentCounts.set(prefix, next);
      } else {
        this.parentCounts.delete(prefix);
      }
    }
  }

  private writeValue(key: string, language: string, value: string) {
    this.valuesByKey.get(key)?.set(language, value);
  }
}
