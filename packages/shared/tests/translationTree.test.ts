import { describe, expect, it } from "vitest";
import {
  TranslationTreeError,
  findKeyConflict,
  flattenObject,
  flattenTranslations,
  unflattenTranslations,
} from "../src/translationTree";

describe("flattenTranslations", () => {
  it("joins nested object paths with dots", () => {
    expect(
      flattenObject({
        auth: { login: { title: "Welcome" }, logout: "Bye" },
        home: "Home",
      }),
    ).toEqual({
      "auth.login.title": "Welcome",
      "auth.logout": "Bye",
      home: "Home",
    });
  });

  it("coerces numbers, booleans and null to text", () => {
    const result = flattenTranslations({ count: 3, enabled: true, empty: null });

    expect(result.entries).toEqual({ count: "3", enabled: "true", empty: "" });
    expect(result.coerced).toEqual(["count", "empty", "enabled"]);
  });

  it("flattens arrays by index", () => {
    expect(flattenObject({ steps: ["One", "Two"] })).toEqual({
      "steps.0": "One",
      "steps.1": "Two",
    });
  });

  it("keeps the first leaf when a dotted key and a nested key produce the same path", () => {
    const result = flattenTranslations({
      "a.b": "dotted",
      a: { b: "nested", c: "kept" },
    });

    expect(result.entries).toEqual({ "a.b": "dotted", "a.c": "kept" });
    expect(result.collisions).toEqual(["a.b"]);
  });

  it("drops a leaf that would nest under an earlier leaf", () => {
    const result = flattenTranslations({ a: "leaf", "a.b": "deeper" });

    expect(result.entries).toEqual({ a: "leaf" });
    expect(result.collisions).toEqual(["a.b"]);
  });

  it("drops a leaf that an earlier key already uses as a parent", () => {
    const result = flattenTranslations({ "a.b": "deeper", a: "leaf" });

    expect(result.entries).toEqual({ "a.b": "deeper" });
    expect(result.collisions).toEqual(["a"]);
  });

  it("skips paths with empty or reserved segments", () => {
    const result = flattenTranslations(
      JSON.parse('{"": "x", "ok": "y", "bad..key": "z", "__proto__": "p"}'),
    );

    expect(result.entries).toEqual({ ok: "y" });
    expect(result.invalid).toEqual(["", "__proto__", "bad..key"]);
  });

  it("produces nothing for empty objects", () => {
    expect(flattenObject({ section: {} })).toEqual({});
  });
});

describe("unflattenTranslations", () => {
  it("nests dot paths into objects", () => {
    expect(
      unflattenTranslations({ "a.b": "x", "a.c": "y", d: "z" }),
    ).toEqual({ a: { b: "x", c: "y" }, d: "z" });
  });

  it("restores arrays from index segments", () => {
    expect(unflattenTranslations({ "steps.1": "Two", "steps.0": "One" })).toEqual({
      steps: ["One", "Two"],
    });
  });

  it("keeps a numeric-keyed root as an object", () => {
    expect(unflattenTranslations({ "0": "zero" })).toEqual({ "0": "zero" });
  });

  it("rejects a key used both as a leaf and as a parent", () => {
    expect.assertions(3);
    try {
      unflattenTranslations({ a: "x", "a.b": "y" });
    } catch (error) {
      expect(error).toBeInstanceOf(TranslationTreeError);
      if (error instanceof TranslationTreeError) {
        expect(error.code).toBe("KEY_COLLISION");
        expect(error.keys).toEqual(["a", "a.b"]);
      }
    }
  });

  it("names the nested key when the parent comes second", () => {
    expect(() => unflattenTranslations({ "a.b": "y", a: "x" })).toThrow(
      'Translation key "a" collides with "a.b".',
    );
  });

  it("rejects keys with empty segments", () => {
    expect(() => unflattenTranslations({ "a..b": "x" })).toThrow(TranslationTreeError);
  });

  it("sorts keys when asked", () => {
    const tree = unflattenTranslations(
      { b: "2", "a.z": "1", "a.c": "0" },
      { sortKeys: true },
    );

    expect(JSON.stringify(tree)).toBe('{"a":{"c":"0","z":"1"},"b":"2"}');
  });

  it("keeps insertion order by default", () => {
    const tree = unflattenTranslations({ b: "2", "a.z": "1", "a.c": "0" });

    expect(JSON.stringify(tree)).toBe('{"b":"2","a":{"z":"1","c":"0"}}');
  });

  it("restores a tree that was flattened", () => {
    const tree = {
      auth: { login: { title: "Welcome", cta: "Sign in" } },
      steps: ["One", "Two"],
      footer: "Bye",
    };

    expect(unflattenTranslations(flattenObject(tree))).toEqual(tree);
  });
});

describe("findKeyConflict", () => {
  const keys = ["auth.login", "nav"];

  it("finds an existing child of the key", () => {
    expect(findKeyConflict(keys, "auth")).toBe("auth.login");
  });

  it("finds an existing parent of the key", () => {
    expect(findKeyConflict(keys, "auth.login.title")).toBe("auth.login");
  });

  it("finds the same key", () => {
    expect(findKeyConflict(keys, "nav")).toBe("nav");
  });

  it("returns null for siblings", () => {
    expect(findKeyConflict(keys, "auth.logout")).toBeNull();
  });
});
