import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  DEFAULT_CONFIG,
  LingoDeskConfigError,
  loadLingoDeskConfig,
  resolveConfig,
} from "../src/config";
import { createTempDir, removeTempDir } from "./helpers";

describe("loadLingoDeskConfig", () => {
  let cwd = "";

  beforeEach(async () => {
    cwd = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(cwd);
  });

  const writeConfig = (content: string) =>
    fs.writeFile(path.join(cwd, "lingodesk.config.json"), content, "utf8");

  it("uses the defaults without a config file", async () => {
    const loaded = await loadLingoDeskConfig(cwd, {});

    expect(loaded.config).toEqual(DEFAULT_CONFIG);
    expect(loaded.configPath).toBeNull();
    expect(loaded.dataDir).toBe(path.join(cwd, ".lingodesk"));
  });

  it("merges a JSON config with the defaults", async () => {
    await writeConfig('{"port": 6001, "export": {"indent": 4}}');

    const loaded = await loadLingoDeskConfig(cwd, {});

    expect(loaded.configPath).toBe(path.join(cwd, "lingodesk.config.json"));
    expect(loaded.config.port).toBe(6001);
    expect(loaded.config.export).toEqual({ sortKeys: true, omitEmpty: false, indent: 4 });
  });

  it("names the file and the field when a value is invalid", async () => {
    await writeConfig('{"port": "x"}');

    await expect(loadLingoDeskConfig(cwd, {})).rejects.toThrow(
      "Invalid lingodesk.config.json: `port` must be an integer between 1 and 65535.",
    );
  });

  it("reports a config file that cannot be parsed", async () => {
    await writeConfig("{ port: ");

    const error = await loadLingoDeskConfig(cwd, {}).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(LingoDeskConfigError);
    expect(error instanceof Error ? error.message : "").toMatch(
      /^Invalid lingodesk\.config\.json: /,
    );
  });

  it("lets the environment override the data directory and port", async () => {
    await writeConfig('{"dataDir": "store", "port": 6001}');

    const loaded = await loadLingoDeskConfig(cwd, {
      LINGODESK_DATA_DIR: "/srv/lingodesk",
      LINGODESK_PORT: "7000",
    });

    expect(loaded.dataDir).toBe("/srv/lingodesk");
    expect(loaded.config.port).toBe(7000);
  });
});

describe("resolveConfig", () => {
  it("normalizes the default source language", () => {
    expect(resolveConfig({ defaultSourceLanguage: "pt_br" }, {}).defaultSourceLanguage).toBe(
      "pt-BR",
    );
  });

  it("rejects an unknown upload limit format", () => {
    expect(() => resolveConfig({ uploadLimit: "lots" }, {})).toThrow(
      "`uploadLimit` must be a size such as `5mb` or `500kb`.",
    );
  });

  it("rejects a non-object config", () => {
    expect(() => resolveConfig(["en"], {})).toThrow("Default export must be a config object.");
  });

  it("rejects an invalid port in the environment", () => {
    expect(() => resolveConfig({}, { LINGODESK_PORT: "http" })).toThrow(
      "`LINGODESK_PORT` must be an integer between 1 and 65535.",
    );
  });
});
