import type { FlatTranslations, TranslationTree } from "./types";

export type TranslationTreeErrorCode = "KEY_COLLISION" | "INVALID_KEY";

export class TranslationTreeError extends Error {
  readonly code: TranslationTreeErrorCode;
  readonly keys: string[];

  constructor(code: TranslationTreeErrorCode, message: string, keys: string[] = []) {
    super(message);
    this.code = code;
    this.keys = keys;
    this.name = "TranslationTreeError";
  }
}

export type FlattenResult = {
  entries: FlatTranslations;
  /** Paths dropped because an earlier leaf already claimed them or one of their prefixes. */
  collisions: string[];
  /** Paths whose leaf was a number, boolean or null. */
  coerced: string[];
  /** Paths dropped because they contain an empty or reserved segment. */
  invalid: string[];
};

export type UnflattenOptions = {
  sortKeys?: boolean;
};

const INDEX_SEGMENT_PATTERN = /^(?:0|[1-9][0-9]*)$/;

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const joinPath = (parent: string, segment: string) =>
  parent ? `${parent}.${segment}` : segment;

const RESERVED_SEGMENT = "__proto__";

const hasUnusableSegment = (key: string) =>
  key
    .split(".")
    .some((segment) => segment.trim() === "" || segment === RESERVED_SEGMENT);

export const compareKeys = (left: string, right: string) => {
  if (left < right) {
    return -1;
  }
  if (left > right) {
    return 1;
  }
  return 0;
};

const sortedUnique = (items: Iterable<string>) =>
  Array.from(new Set(items)).sort(compareKeys);

export const isDotPrefix = (prefix: string, key: string) =>
  key.length > prefix.length &&
  key.startsWith(prefix) &&
  key.charAt(prefix.length) === ".";

const strictPrefixes = (key: string) => {
  const segments = key.split(".");
  const prefixes: string[] = [];
  for (let index = 1; index < segments.length; index += 1) {
    prefixes.push(segments.slice(0, index).join("."));
  }
  return prefixes;
};

export const flattenTranslations = (tree: TranslationTree): FlattenResult => {
  const entries = new Map<string, string>();
  const parentPaths = new Set<string>();
  const collisions = new Set<string>();
  const coerced = new Set<string>();
  const invalid = new Set<string>();

  const accept = (path: string, value: string) => {
    if (hasUnusableSegment(path)) {
      invalid.add(path);
      return false;
    }

    const prefixes = strictPrefixes(path);
    if (
      entries.has(path) ||
      parentPaths.has(path) ||
      prefixes.some((prefix) => entries.has(prefix))
    ) {
      collisions.add(path);
      return false;
    }

    entries.set(path, value);
    for (const prefix of prefixes) {
      parentPaths.add(prefix);
    }
    return true;
  };

  const visit = (node: unknown, path: string): void => {
    if (Array.isArray(node)) {
      node.forEach((child, index) => visit(child, joinPath(path, String(index))));
      return;
    }

    if (isPlainObject(node)) {
      for (const [key, child] of Object.entries(node)) {
        visit(child, joinPath(path, key));
      }
      return;
    }

    if (typeof node === "string") {
      accept(path, node);
      return;
    }

    if (node === null) {
      if (accept(path, "")) {
        coerced.add(path);
      }
      return;
    }

    if (typeof node === "number" || typeof node === "boolean") {
      if (accept(path, String(node))) {
        coerced.add(path);
      }
    }
  };

  for (const [key, child] of Object.entries(tree)) {
    visit(child, key);
  }

  return {
    entries: Object.fromEntries(entries),
    collisions: sortedUnique(collisions),
    coerced: sortedUnique(coerced),
    invalid: sortedUnique(invalid),
  };
};

export const flattenObject = (tree: TranslationTree): FlatTranslations =>
  flattenTranslations(tree).entries;

const collisionError = (leafKey: string, nestedKey: string) =>
  new TranslationTreeError(
    "KEY_COLLISION",
    `Translation key "${leafKey}" collides with "${nestedKey}".`,
    [leafKey, nestedKey],
  );

const isIndexSequence = (keys: string[]) => {
  if (keys.length === 0 || !keys.every((key) => INDEX_SEGMENT_PATTERN.test(key))) {
    return false;
  }

  const indexes = keys.map(Number).sort((left, right) => left - right);
  return indexes.every((value, position) => value === position);
};

const finalizeValue = (value: unknown, sortKeys: boolean): unknown => {
  if (!isPlainObject(value)) {
    return value;
  }

  const keys = Object.keys(value);
  if (isIndexSequence(keys)) {
    return keys
      .map(Number)
      .sort((left, right) => left - right)
      .map((index) => finalizeValue(value[String(index)], sortKeys));
  }

  return finalizeObject(value, sortKeys);
};

const finalizeObject = (node: Record<string, unknown>, sortKeys: boolean) => {
  const keys = sortKeys ? Object.keys(node).sort(compareKeys) : Object.keys(node);
  const result: Record<string, unknown> = {};
  for (const key of keys) {
    result[key] = finalizeValue(node[key], sortKeys);
  }
  return result;
};

export const unflattenTranslations = (
  flat: FlatTranslations,
  options: UnflattenOptions = {},
): TranslationTree => {
  const root: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(flat)) {
    if (!key || hasUnusableSegment(key)) {
      throw new TranslationTreeError(
        "INVALID_KEY",
        `Translation key "${key}" contains an empty or reserved segment.`,
        [key],
      );
    }

    const segments = key.split(".");
    const leaf = segments[segments.length - 1];
    let cursor = root;

    for (let index = 0; index < segments.length - 1; index += 1) {
      const segment = segments[index];
      const existing = cursor[segment];

      if (typeof existing === "string") {
        throw collisionError(segments.slice(0, index + 1).join("."), key);
      }

      if (isPlainObject(existing)) {
        cursor = existing;
        continue;
      }

      const next: Record<string, unknown> = {};
      cursor[segment] = next;
      cursor = next;
    }

    if (isPlainObject(cursor[leaf])) {
      const nestedKey =
        Object.keys(flat).find((candidate) => isDotPrefix(key, candidate)) ?? key;
      throw collisionError(key, nestedKey);
    }

    cursor[leaf] = value;
  }

  return finalizeObject(root, options.sortKeys === true);
};

/**
 * Returns the existing key that would make `key` ambiguous once nested:
 * the same key, a parent of it, or a key nested under it.
 */
export const findKeyConflict = (existingKeys: Iterable<string>, key: string) => {
  for (const existing of existingKeys) {
    if (existing === key || isDotPrefix(existing, key) || isDotPrefix(key, existing)) {
      return existing;
    }
  }

  return null;
};
