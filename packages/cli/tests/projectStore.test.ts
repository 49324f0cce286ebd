import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ProjectNotFoundError, StorageError, ValidationError } from "../src/errors";
import { localeFilePath, writeProjectTranslations } from "../src/localeFiles";
import { projectIndexPath } from "../src/projectStore";
import { createTempDir, createTestStore, exists, removeTempDir } from "./helpers";

describe("ProjectStore", () => {
  let dataDir = "";

  beforeEach(async () => {
    dataDir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dataDir);
  });

  it("creates projects with normalized languages", async () => {
    const { store } = createTestStore(dataDir);

    const project = await store.create({
      name: " Storefront ",
      sourceLanguage: "EN",
      targetLanguages: ["fr", "DE"],
    });

    expect(project).toEqual({
      id: "p1",
      name: "Storefront",
      sourceLanguage: "en",
      targetLanguages: ["fr", "de"],
      createdAt: "2026-01-01T00:00:00.000Z",
      updatedAt: "2026-01-01T00:00:00.000Z",
    });

    const index = JSON.parse(await fs.readFile(projectIndexPath(dataDir), "utf8"));
    expect(index).toEqual({ schemaVersion: 1, projects: [project] });
  });

  it("lists the most recently updated project first", async () => {
    const { store, tick } = createTestStore(dataDir);
    await store.create({ name: "Storefront", sourceLanguage: "en", targetLanguages: [] });
    tick();
    await store.create({ name: "Admin", sourceLanguage: "en", targetLanguages: [] });

    expect((await store.list()).map((project) => project.id)).toEqual(["p2", "p1"]);

    tick();
    const touched = await store.touch("p1");

    expect(touched.updatedAt).toBe("2026-01-01T00:00:02.000Z");
    expect((await store.list()).map((project) => project.id)).toEqual(["p1", "p2"]);
  });

  it("rejects a name that is already taken", async () => {
    const { store } = createTestStore(dataDir);
    await store.create({ name: "Storefront", sourceLanguage: "en", targetLanguages: [] });

    const error = await store
      .create({ name: "storefront", sourceLanguage: "en", targetLanguages: [] })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.fieldErrors).toEqual([
        {
          field: "name",
          code: "name_taken",
          message: 'A project named "storefront" already exists.',
          value: "storefront",
        },
      ]);
    }
  });

  it("swaps source and target when a target becomes the source", async () => {
    const { store } = createTestStore(dataDir);
    await store.create({ name: "Storefront", sourceLanguage: "en", targetLanguages: ["fr", "de"] });

    const { project, removedLanguages } = await store.update("p1", { sourceLanguage: "fr" });

    expect(project.sourceLanguage).toBe("fr");
    expect(project.targetLanguages).toEqual(["en", "de"]);
    expect(removedLanguages).toEqual([]);
  });

  it("keeps the old source as a target when only the source changes", async () => {
    const { store } = createTestStore(dataDir);
    const created = await store.create({
      name: "Storefront",
      sourceLanguage: "en",
      targetLanguages: ["fr"],
    });
    await writeProjectTranslations(dataDir, created, {
      en: { home: "Home" },
      fr: { home: "Accueil" },
    });

    const { project, removedLanguages } = await store.update("p1", { sourceLanguage: "es" });

    expect(project.sourceLanguage).toBe("es");
    expect(project.targetLanguages).toEqual(["en", "fr"]);
    expect(removedLanguages).toEqual([]);
    expect(await exists(localeFilePath(dataDir, "p1", "en"))).toBe(true);
  });

  it("reports the old source as removed when a full update leaves it out", async () => {
    const { store } = createTestStore(dataDir);
    const created = await store.create({
      name: "Storefront",
      sourceLanguage: "en",
      targetLanguages: ["fr"],
    });
    await writeProjectTranslations(dataDir, created, {
      en: { home: "Home" },
      fr: { home: "Accueil" },
    });

    const { removedLanguages } = await store.update("p1", {
      name: "Storefront",
      sourceLanguage: "es",
      targetLanguages: ["fr"],
    });

    expect(removedLanguages).toEqual(["en"]);
    expect(await exists(localeFilePath(dataDir, "p1", "en"))).toBe(false);
  });

  it("deletes the file of a removed target language", async () => {
    const { store } = createTestStore(dataDir);
    const created = await store.create({
      name: "Storefront",
      sourceLanguage: "en",
      targetLanguages: ["fr", "de"],
    });
    await writeProjectTranslations(dataDir, created, {
      en: { title: "Title" },
      fr: { title: "Titre" },
      de: { title: "Titel" },
    });

    const { removedLanguages } = await store.update("p1", { targetLanguages: ["fr"] });

    expect(removedLanguages).toEqual(["de"]);
    expect(await exists(localeFilePath(dataDir, "p1", "de"))).toBe(false);
    expect(await exists(localeFilePath(dataDir, "p1", "fr"))).toBe(true);
  });

  it("removes the project and its files", async () => {
    const { store } = createTestStore(dataDir);
    const created = await store.create({
      name: "Storefront",
      sourceLanguage: "en",
      targetLanguages: [],
    });
    await writeProjectTranslations(dataDir, created, { en: { title: "Title" } });

    await store.remove("p1");

    expect(await store.list()).toEqual([]);
    expect(await exists(path.join(dataDir, "projects", "p1"))).toBe(false);
  });

  it("throws for an unknown project", async () => {
    const { store } = createTestStore(dataDir);

    await expect(store.get("nope")).rejects.toBeInstanceOf(ProjectNotFoundError);
  });

  it("never overwrites a corrupt project index", async () => {
    const { store } = createTestStore(dataDir);
    await fs.writeFile(projectIndexPath(dataDir), "not json", "utf8");

    const error = await store
      .create({ name: "Storefront", sourceLanguage: "en", targetLanguages: [] })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(StorageError);
    if (error instanceof StorageError) {
      expect(error.code).toBe("CORRUPT_STORE");
    }
    expect(await fs.readFile(projectIndexPath(dataDir), "utf8")).toBe("not json");
  });

  it("rejects an index with another schema version", async () => {
    const { store } = createTestStore(dataDir);
    await fs.writeFile(
      projectIndexPath(dataDir),
      JSON.stringify({ schemaVersion: 2, projects: [] }),
      "utf8",
    );

    await expect(store.list()).rejects.toBeInstanceOf(StorageError);
  });
});
