import fs from "node:fs/promises";
import { createRequire } from "node:module";
import path from "node:path";
import { pathToFileURL } from "node:url";
import type { ExportConfig, LingoDeskConfig } from "@lingodesk/shared";
import { isLanguageCode, normalizeLanguageCode } from "@lingodesk/shared";
import { errorMessage } from "./errors.js";
import { projectRoot } from "./fs.js";

export class LingoDeskConfigError extends Error {
  readonly code = "INVALID_CONFIG";
  readonly configPath: string | null;

  constructor(message: string, configPath: string | null = null) {
    super(message);
    this.configPath = configPath;
    this.name = "LingoDeskConfigError";
  }
}

export type LingoDeskConfigInput = Partial<Omit<LingoDeskConfig, "export">> & {
  export?: Partial<ExportConfig>;
};

export type LoadedConfig = {
  config: LingoDeskConfig;
  /** Absolute path of the config file, or `null` when the defaults are used. */
  configPath: string | null;
  /** Absolute form of `config.dataDir`. */
  dataDir: string;
  root: string;
};

export const CONFIG_FILE_NAMES = [
  "lingodesk.config.ts",
  "lingodesk.config.mts",
  "lingodesk.config.js",
  "lingodesk.config.mjs",
  "lingodesk.config.cjs",
  "lingodesk.config.json",
];

export const DEFAULT_CONFIG: LingoDeskConfig = {
  dataDir: ".lingodesk",
  port: 5280,
  defaultSourceLanguage: "en",
  uploadLimit: "5mb",
  export: {
    sortKeys: true,
    omitEmpty: false,
    indent: 2,
  },
};

const UPLOAD_LIMIT_PATTERN = /^\d+(?:\.\d+)?\s*(?:b|kb|mb|gb)$/i;
const MAX_EXPORT_INDENT = 8;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isPort = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value > 0 && value < 65_536;

const resolveConfigPath = async (cwd: string) => {
  for (const fileName of CONFIG_FILE_NAMES) {
    const candidatePath = path.join(cwd, fileName);
    try {
      await fs.access(candidatePath);
      return candidatePath;
    } catch {
      continue;
    }
  }

  return null;
};

const unwrapDefaultExport = (value: unknown): unknown => {
  if (isRecord(value) && "default" in value) {
    return value.default;
  }

  return value;
};

const importConfigFile = async (configPath: string): Promise<unknown> => {
  const extension = path.extname(configPath).toLowerCase();

  if (extension === ".json") {
    return JSON.parse(await fs.readFile(configPath, "utf8"));
  }

  if (extension === ".cjs") {
    return unwrapDefaultExport(createRequire(import.meta.url)(configPath));
  }

  return unwrapDefaultExport(await import(pathToFileURL(configPath).href));
};

const readExportConfig = (value: unknown): ExportConfig => {
  if (value === undefined) {
    return { ...DEFAULT_CONFIG.export };
  }

  if (!isRecord(value)) {
    throw new LingoDeskConfigError("`export` must be an object when provided.");
  }

  const { sortKeys, omitEmpty, indent } = value;
  if (sortKeys !== undefined && typeof sortKeys !== "boolean") {
    throw new LingoDeskConfigError("`export.sortKeys` must be a boolean.");
  }
  if (omitEmpty !== undefined && typeof omitEmpty !== "boolean") {
    throw new LingoDeskConfigError("`export.omitEmpty` must be a boolean.");
  }
  if (
    indent !== undefined &&
    (typeof indent !== "number" ||
      !Number.isInteger(indent) ||
      indent < 0 ||
      indent > MAX_EXPORT_INDENT)
  ) {
    throw new LingoDeskConfigError(
      `\`export.indent\` must be an integer between 0 and ${MAX_EXPORT_INDENT}.`,
    );
  }

  return {
    sortKeys: typeof sortKeys === "boolean" ? sortKeys : DEFAULT_CONFIG.export.sortKeys,
    omitEmpty: typeof omitEmpty === "boolean" ? omitEmpty : DEFAULT_CONFIG.export.omitEmpty,
    indent: typeof indent === "number" ? indent : DEFAULT_CONFIG.export.indent,
  };
};

/**
 * Validates a raw config value and fills in defaults. `LINGODESK_DATA_DIR` and
 * `LINGODESK_PORT` in `env` win over the file.
 */
export const resolveConfig = (
  value: unknown,
  env: NodeJS.ProcessEnv = process.env,
): LingoDeskConfig => {
  const cfg = value === undefined || value === null ? {} : value;
  if (!isRecord(cfg)) {
    throw new LingoDeskConfigError("Default export must be a config object.");
  }

  const { dataDir, port, defaultSourceLanguage, uploadLimit } = cfg;

  if (dataDir !== undefined && (typeof dataDir !== "string" || !dataDir.trim())) {
    throw new LingoDeskConfigError("`dataDir` must be a non-empty string when provided.");
  }

  if (port !== undefined && !isPort(port)) {
    throw new LingoDeskConfigError("`port` must be an integer between 1 and 65535.");
  }

  if (
    defaultSourceLanguage !== undefined &&
    (typeof defaultSourceLanguage !== "string" || !isLanguageCode(defaultSourceLanguage))
  ) {
    throw new LingoDeskConfigError(
      "`defaultSourceLanguage` must be a language code such as `en` or `pt-BR`.",
    );
  }

  if (
    uploadLimit !== undefined &&
    (typeof uploadLimit !== "string" || !UPLOAD_LIMIT_PATTERN.test(uploadLimit.trim()))
  ) {
    throw new LingoDeskConfigError("`uploadLimit` must be a size such as `5mb` or `500kb`.");
  }

  const envDataDir = env.LINGODESK_DATA_DIR?.trim();
  const envPortValue = env.LINGODESK_PORT?.trim();
  const envPort = envPortValue ? Number(envPortValue) : undefined;
  if (envPort !== undefined && !isPort(envPort)) {
    throw new LingoDeskConfigError(
      "`LINGODESK_PORT` must be an integer between 1 and 65535.",
    );
  }

  return {
    dataDir:
      envDataDir ||
      (typeof dataDir === "string" ? dataDir.trim() : DEFAULT_CONFIG.dataDir),
    port: envPort ?? (typeof port === "number" ? port : DEFAULT_CONFIG.port),
    defaultSourceLanguage:
      typeof defaultSourceLanguage === "string"
        ? normalizeLanguageCode(defaultSourceLanguage)
        : DEFAULT_CONFIG.defaultSourceLanguage,
    uploadLimit:
      typeof uploadLimit === "string" ? uploadLimit.trim() : DEFAULT_CONFIG.uploadLimit,
    export: readExportConfig(cfg.export),
  };
};

export const resolveDataDir = (root: string, config: LingoDeskConfig) =>
  path.isAbsolute(config.dataDir) ? config.dataDir : path.join(root, config.dataDir);

export async function loadLingoDeskConfig(
  cwd: string = projectRoot(),
  env: NodeJS.ProcessEnv = process.env,
): Promise<LoadedConfig> {
  const configPath = await resolveConfigPath(cwd);

  let raw: unknown;
  if (configPath) {
    try {
      raw = await importConfigFile(configPath);
    } catch (error) {
      throw new LingoDeskConfigError(
        `Invalid ${path.basename(configPath)}: ${errorMessage(error)}`,
        configPath,
      );
    }
  }

  let config: LingoDeskConfig;
  try {
    config = resolveConfig(raw, env);
  } catch (error) {
    if (error instanceof LingoDeskConfigError && configPath) {
      throw new LingoDeskConfigError(
        `Invalid ${path.basename(configPath)}: ${error.message}`,
        configPath,
      );
    }
    throw error;
  }

  return {
    config,
    configPath,
    dataDir: resolveDataDir(cwd, config),
    root: cwd,
  };
}
