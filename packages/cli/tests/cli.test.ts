import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { MockInstance } from "vitest";
import { CliUsageError, parseArgs, runCli, slugify } from "../src/cli";
import { ProjectNotFoundError } from "../src/errors";
import { createTempDir, createTestStore, removeTempDir } from "./helpers";

describe("parseArgs", () => {
  it("serves by default", () => {
    expect(parseArgs([])).toEqual({
      command: "serve",
      help: false,
      version: false,
      noOpen: false,
    });
  });

  it("reads serve flags without the command name", () => {
    expect(parseArgs(["--port", "6000", "--no-open"])).toMatchObject({
      command: "serve",
      port: 6000,
      noOpen: true,
    });
  });

  it("reads status options", () => {
    expect(parseArgs(["status", "Storefront", "--strict"])).toEqual({
      command: "status",
      help: false,
      version: false,
      project: "Storefront",
      json: false,
      strict: true,
    });
  });

  it("reads export options", () => {
    expect(
      parseArgs(["export", "shop", "-l", "fr", "--out", "dist/i18n", "--omit-empty"]),
    ).toMatchObject({
      command: "export",
      project: "shop",
      language: "fr",
      outDir: "dist/i18n",
      omitEmpty: true,
    });
  });

  it("requires a language for imports", () => {
    expect(() => parseArgs(["import", "shop", "fr.json"])).toThrow(
      "Missing --language. Usage: lingodesk import <project> <file> --language <code>",
    );
  });

  it("does not require positionals with --help", () => {
    expect(parseArgs(["import", "--help"])).toMatchObject({ command: "import", help: true });
  });

  it("rejects unknown commands and flags", () => {
    expect(() => parseArgs(["bogus"])).toThrow(CliUsageError);
    expect(() => parseArgs(["bogus"])).toThrow("Unknown command: bogus");
    expect(() => parseArgs(["projects", "--verbose"])).toThrow(
      "Unknown argument: --verbose",
    );
    expect(() => parseArgs(["--port", "zero"])).toThrow("Port must be a positive integer.");
  });
});

describe("slugify", () => {
  it("turns a project name into a directory name", () => {
    expect(slugify("My Shop! 2")).toBe("my-shop-2");
  });
});

describe("runCli", () => {
  let cwd = "";
  const context = () => ({ cwd, env: {} });
  let log: MockInstance<typeof console.log>;
  let errorLog: MockInstance<typeof console.error>;

  const logged = () => log.mock.calls.map((call) => String(call[0]));

  beforeEach(async () => {
    cwd = await createTempDir();
    log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    errorLog = vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const { store } = createTestStore(path.join(cwd, ".lingodesk"));
    await store.create({ name: "Storefront", sourceLanguage: "en", targetLanguages: ["fr"] });
    await fs.writeFile(
      path.join(cwd, "en.json"),
      JSON.stringify({ home: { title: "Home" }, auth: { login: "Log in" } }),
      "utf8",
    );
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(cwd);
  });

  it("imports a file and reports the status", async () => {
    expect(await runCli(["import", "storefront", "en.json", "--language", "en"], context())).toBe(0);
    expect(logged()).toContain('Imported 2 key(s) into en of "Storefront" (replace).');

    log.mockClear();
    expect(await runCli(["status", "Storefront", "--strict"], context())).toBe(1);
    expect(logged()).toEqual([
      "Storefront (p1)",
      "Keys: 2",
      "  en  100%  2/2",
      "  fr    0%  0/2",
      "    - home.title",
      "    - auth.login",
    ]);
  });

  it("fails a strict status for a project without keys", async () => {
    expect(await runCli(["status", "Storefront", "--strict"], context())).toBe(1);
    expect(logged()).toEqual(["Storefront (p1)", "Keys: 0", "  en    0%  0/0", "  fr    0%  0/0"]);
  });

  it("refuses a file named for another language", async () => {
    await fs.writeFile(path.join(cwd, "de.json"), '{"title":"Titel"}', "utf8");

    expect(await runCli(["import", "Storefront", "de.json", "-l", "fr"], context())).toBe(1);
    expect(errorLog).toHaveBeenCalledWith("Use --force to import it anyway.");
  });

  it("exports every language into a directory", async () => {
    await runCli(["import", "p1", "en.json", "--language", "en"], context());

    expect(await runCli(["export", "p1", "--out", "out", "--omit-empty"], context())).toBe(0);

    const outDir = path.join(cwd, "out");
    expect(logged()).toContain(`Wrote 2 file(s) to ${outDir}.`);
    expect(await fs.readFile(path.join(outDir, "fr.json"), "utf8")).toBe("{}\n");
    expect(await fs.readFile(path.join(outDir, "en.json"), "utf8")).toBe(
      '{\n  "auth": {\n    "login": "Log in"\n  },\n  "home": {\n    "title": "Home"\n  }\n}\n',
    );
  });

  it("lists projects as JSON", async () => {
    expect(await runCli(["projects", "--json"], context())).toBe(0);

    const projects: unknown = JSON.parse(logged()[0]);
    expect(projects).toMatchObject([{ id: "p1", name: "Storefront", keyCount: 0 }]);
  });

  it("fails for an unknown project", async () => {
    await expect(runCli(["status", "Backoffice"], context())).rejects.toBeInstanceOf(
      ProjectNotFoundError,
    );
  });
});
