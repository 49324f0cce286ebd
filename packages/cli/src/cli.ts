import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { ProjectSummary } from "@lingodesk/shared";
import { isFilled, normalizeLanguageCode } from "@lingodesk/shared";
import open from "open";
import { LingoDeskConfigError, loadLingoDeskConfig } from "./config.js";
import type { LoadedConfig } from "./config.js";
import { UploadRejectedError } from "./errors.js";
import { projectRoot } from "./fs.js";
import { createProjectService } from "./projectService.js";
import type { ProjectService } from "./projectService.js";
import { createProjectStore } from "./projectStore.js";
import { startServer } from "./server.js";

type BaseOptions = {
  help: boolean;
  version: boolean;
};

type ServeCommand = BaseOptions & {
  command: "serve";
  noOpen: boolean;
  port?: number;
};

type ProjectsCommand = BaseOptions & {
  command: "projects";
  json: boolean;
};

type StatusCommand = BaseOptions & {
  command: "status";
  project: string;
  json: boolean;
  strict: boolean;
};

type ImportCommand = BaseOptions & {
  command: "import";
  project: string;
  file: string;
  language: string;
  merge: boolean;
  force: boolean;
};

type ExportCommand = BaseOptions & {
  command: "export";
  project: string;
  language?: string;
  outDir?: string;
  omitEmpty: boolean;
};

export type CliOptions =
  | ServeCommand
  | ProjectsCommand
  | StatusCommand
  | ImportCommand
  | ExportCommand;

export type CliContext = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const MISSING_KEY_SAMPLE_SIZE = 12;
const COMMANDS = ["serve", "projects", "status", "import", "export"] as const;

const isCommandName = (value: string): value is CliOptions["command"] =>
  COMMANDS.some((command) => command === value);

export const getVersion = async () => {
  const packagePath = fileURLToPath(new URL("../package.json", import.meta.url));
  const raw = await fs.readFile(packagePath, "utf8");
  const pkg: unknown = JSON.parse(raw);
  return typeof pkg === "object" && pkg !== null && "version" in pkg &&
    typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";
};

export const printHelp = () => {
  console.log(`LingoDesk

Usage:
  lingodesk [serve] [options]
  lingodesk projects [--json]
  lingodesk status <project> [--json] [--strict]
  lingodesk import <project> <file> --language <code> [--merge] [--force]
  lingodesk export <project> [--language <code>] [--out <dir>] [--omit-empty]

<project> is a project id or name.

Options:
  -h, --help                 Show help
  -v, --version              Show version

Serve options:
  --no-open                  Do not open browser automatically
  -p, --port                 Set server port (default: config port, 5280)

Status options:
  --json                     Print completion as JSON
  --strict                   Exit with code 1 when a language is incomplete

Import options:
  -l, --language <code>      Language the file belongs to (required)
  --merge                    Only overwrite keys with a value in the file
  --force                    Import even when the file name names another language

Export options:
  -l, --language <code>      Export a single language
  -o, --out <dir>            Output directory (default: export/<project>)
  --omit-empty               Leave out keys without a value
`);
};

const parsePort = (value: string | undefined) => {
  if (!value) {
    throw new CliUsageError("Missing value for --port.");
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new CliUsageError("Port must be a positive integer.");
  }
  return parsed;
};

const requireValue = (flag: string, value: string | undefined) => {
  if (!value || value.startsWith("-")) {
    throw new CliUsageError(`Missing value for ${flag}.`);
  }
  return value;
};

/** Splits `args` into positionals and handles the shared help/version flags. */
const scanArgs = (
  args: string[],
  base: BaseOptions,
  onFlag: (arg: string, next: () => string | undefined) => boolean,
) => {
  const positionals: string[] = [];

  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];

    if (arg === "-h" || arg === "--help") {
      base.help = true;
      continue;
    }
    if (arg === "-v" || arg === "--version") {
      base.version = true;
      continue;
    }
    if (!arg.startsWith("-")) {
      positionals.push(arg);
      continue;
    }

    const handled = onFlag(arg, () => {
      index += 1;
      return args[index];
    });
    if (!handled) {
      throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  return positionals;
};

const requirePositionals = (
  options: BaseOptions,
  positionals: string[],
  names: string[],
  usage: string,
) => {
  if (options.help || options.version) {
    return;
  }
  if (positionals.length < names.length) {
    throw new CliUsageError(`Missing ${names[positionals.length]}. Usage: ${usage}`);
  }
  if (positionals.length > names.length) {
    throw new CliUsageError(`Unexpected argument: ${positionals[names.length]}`);
  }
};

export const parseArgs = (args: string[]): CliOptions => {
  const firstArg = args[0];
  const command = firstArg && isCommandName(firstArg) ? firstArg : "serve";
  const commandArgs = firstArg && isCommandName(firstArg) ? args.slice(1) : args;
  const base: BaseOptions = { help: false, version: false };

  if (command === "projects") {
    const options: ProjectsCommand = { command, ...base, json: false };
    const positionals = scanArgs(commandArgs, options, (arg) => {
      if (arg === "--json") {
        options.json = true;
        return true;
      }
      return false;
    });
    requirePositionals(options, positionals, [], "lingodesk projects [--json]");
    return options;
  }

  if (command === "status") {
    const options: StatusCommand = {
      command,
      ...base,
      project: "",
      json: false,
      strict: false,
    };
    const positionals = scanArgs(commandArgs, options, (arg) => {
      if (arg === "--json") {
        options.json = true;
        return true;
      }
      if (arg === "--strict") {
        options.strict = true;
        return true;
      }
      return false;
    });
    requirePositionals(options, positionals, ["<project>"], "lingodesk status <project>");
    options.project = positionals[0] ?? "";
    return options;
  }

  if (command === "import") {
    const options: ImportCommand = {
      command,
      ...base,
      project: "",
      file: "",
      language: "",
      merge: false,
      force: false,
    };
    const positionals = scanArgs(commandArgs, options, (arg, next) => {
      if (arg === "-l" || arg === "--language") {
        options.language = requireValue(arg, next());
        return true;
      }
      if (arg === "--merge") {
        options.merge = true;
        return true;
      }
      if (arg === "--force") {
        options.force = true;
        return true;
      }
      return false;
    });
    const usage = "lingodesk import <project> <file> --language <code>";
    requirePositionals(options, positionals, ["<project>", "<file>"], usage);
    if (!options.help && !options.version && !options.language) {
      throw new CliUsageError(`Missing --language. Usage: ${usage}`);
    }
    options.project = positionals[0] ?? "";
    options.file = positionals[1] ?? "";
    return options;
  }

  if (command === "export") {
    const options: ExportCommand = { command, ...base, project: "", omitEmpty: false };
    const positionals = scanArgs(commandArgs, options, (arg, next) => {
      if (arg === "-l" || arg === "--language") {
        options.language = requireValue(arg, next());
        return true;
      }
      if (arg === "-o" || arg === "--out") {
        options.outDir = requireValue(arg, next());
        return true;
      }
      if (arg === "--omit-empty") {
        options.omitEmpty = true;
        return true;
      }
      return false;
    });
    requirePositionals(options, positionals, ["<project>"], "lingodesk export <project>");
    options.project = positionals[0] ?? "";
    return options;
  }

  const options: ServeCommand = { command: "serve", ...base, noOpen: false };
  const positionals = scanArgs(commandArgs, options, (arg, next) => {
    if (arg === "--no-open") {
      options.noOpen = true;
      return true;
    }
    if (arg === "-p" || arg === "--port") {
      options.port = parsePort(next());
      return true;
    }
    return false;
  });
  if (positionals.length > 0) {
    throw new CliUsageError(`Unknown command: ${positionals[0]}`);
  }
  return options;
};

export const printConfigError = (error: LingoDeskConfigError) => {
  console.error("LingoDesk could not start: invalid configuration.");
  console.error(error.message);
  if (error.configPath) {
    console.error(`Fix ${error.configPath} or remove it to use the defaults.`);
  }
};

export const slugify = (value: string) =>
  value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");

const formatCompletion = (summary: ProjectSummary) =>
  summary.completion.map((entry) => `${entry.language} ${entry.percent}%`).join(", ");

const printProjects = (summaries: ProjectSummary[]) => {
  if (summaries.length === 0) {
    console.log("No projects yet. Run `lingodesk` and create one in the browser.");
    return;
  }

  for (const summary of summaries) {
    const targets = summary.targetLanguages.join(", ") || "none";
    console.log(`${summary.name} (${summary.id})`);
    console.log(`  languages: ${summary.sourceLanguage} -> ${targets}`);
    console.log(`  keys: ${summary.keyCount}`);
    console.log(`  completion: ${formatCompletion(summary)}`);
  }
};

type LanguageStatus = {
  language: string;
  filled: number;
  total: number;
  percent: number;
  missing: string[];
};

export const buildStatus = async (service: ProjectService, ref: string) => {
  const project = await service.resolveProject(ref);
  const table = await service.getTable(project.id);

  const statuses: LanguageStatus[] = table.completion.map((entry) => ({
    ...entry,
    missing: table.rows
      .filter((row) => !isFilled(row.values[entry.language]))
      .map((row) => row.key),
  }));
  return { project, keyCount: table.total, languages: statuses };
};

const printStatus = (status: Awaited<ReturnType<typeof buildStatus>>) => {
  const width = Math.max(...status.languages.map((entry) => entry.language.length));
  console.log(`${status.project.name} (${status.project.id})`);
  console.log(`Keys: ${status.keyCount}`);

  for (const entry of status.languages) {
    const label = entry.language.padEnd(width);
    const percent = `${entry.percent}%`.padStart(4);
    console.log(`  ${label}  ${percent}  ${entry.filled}/${entry.total}`);

    for (const key of entry.missing.slice(0, MISSING_KEY_SAMPLE_SIZE)) {
      console.log(`    - ${key}`);
    }
    const hidden = entry.missing.length - MISSING_KEY_SAMPLE_SIZE;
    if (hidden > 0) {
      console.log(`    ... and ${hidden} more`);
    }
  }
};

const runImport = async (
  options: ImportCommand,
  cwd: string,
  service: ProjectService,
) => {
  const project = await service.resolveProject(options.project);
  const filePath = path.resolve(cwd, options.file);
  const content = await fs.readFile(filePath, "utf8");

  try {
    const result = await service.importUpload(project.id, {
      language: options.language,
      fileName: path.basename(filePath),
      content,
      mode: options.merge ? "merge" : "replace",
      force: options.force,
    });
    for (const warning of result.warnings) {
      console.warn(`Warning: ${warning.message}`);
    }
    console.log(
      `Imported ${result.keyCount} key(s) into ${result.language} of "${project.name}" (${result.mode}).`,
    );
    return 0;
  } catch (error) {
    if (!(error instanceof UploadRejectedError)) {
      throw error;
    }
    for (const issue of error.errors) {
      console.error(`Error: ${issue.message}`);
    }
    if (error.forceable) {
      console.error("Use --force to import it anyway.");
    }
    return 1;
  }
};

const runExport = async (
  options: ExportCommand,
  cwd: string,
  service: ProjectService,
) => {
  const project = await service.resolveProject(options.project);
  const outDir = path.resolve(
    cwd,
    options.outDir ?? path.join("export", slugify(project.name) || project.id),
  );
  const files = await service.exportProject(project.id, {
    languages: options.language ? [normalizeLanguageCode(options.language)] : undefined,
    omitEmpty: options.omitEmpty ? true : undefined,
  });

  await fs.mkdir(outDir, { recursive: true });
  for (const file of files) {
    await fs.writeFile(path.join(outDir, file.fileName), file.content, "utf8");
  }
  console.log(`Wrote ${files.length} file(s) to ${outDir}.`);
};

const runServe = async (
  options: ServeCommand,
  loaded: LoadedConfig,
  service: ProjectService,
  env: NodeJS.ProcessEnv,
) => {
  const { port } = await startServer(
    { service, config: loaded.config },
    options.port ?? loaded.config.port,
  );
  const url = `http://localhost:${port}`;
  console.log(`LingoDesk running at ${url}`);
  console.log(`Data directory: ${loaded.dataDir}`);

  if (options.noOpen || env.CI) {
    return;
  }

  try {
    await open(url);
  } catch (error) {
    console.error(
      `Could not open browser automatically: ${
        error instanceof Error ? error.message : String(error)
      }`,
    );
    console.error(`Open ${url} manually.`);
  }
};

/** Runs one command and resolves with its exit code. */
export async function runCli(args: string[], context: CliContext = {}) {
  const options = parseArgs(args);
  const cwd = context.cwd ?? projectRoot();
  const env = context.env ?? process.env;

  if (options.help) {
    printHelp();
    return 0;
  }

  if (options.version) {
    console.log(await getVersion());
    return 0;
  }

  const loaded = await loadLingoDeskConfig(cwd, env);
  const service = createProjectService(
    createProjectStore(loaded.dataDir),
    loaded.config.export,
  );

  switch (options.command) {
    case "projects": {
      const summaries = await service.listProjects();
      if (options.json) {
        console.log(JSON.stringify(summaries, null, 2));
      } else {
        printProjects(summaries);
      }
      return 0;
    }
    case "status": {
      const status = await buildStatus(service, options.project);
      if (options.json) {
        console.log(JSON.stringify(status, null, 2));
      } else {
        printStatus(status);
      }
      const incomplete = status.languages.some((entry) => entry.percent < 100);
      return options.strict && incomplete ? 1 : 0;
    }
    case "import":
      return runImport(options, cwd, service);
    case "export":
      await runExport(options, cwd, service);
      return 0;
    case "serve":
      await runServe(options, loaded, service, env);
      return 0;
  }
}
