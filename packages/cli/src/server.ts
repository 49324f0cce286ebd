import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import express from "express";
import cors from "cors";
import type {
  LingoDeskConfig,
  ProjectInput,
  PublicConfig,
  TranslationChange,
  UploadMode,
} from "@lingodesk/shared";
import {
  TranslationTableError,
  TranslationTreeError,
  parseLanguageList,
} from "@lingodesk/shared";
import {
  ProjectNotFoundError,
  StorageError,
  UploadRejectedError,
  ValidationError,
  WriteLockError,
} from "./errors.js";
import type { ProjectPatch } from "./projectStore.js";
import type { ProjectService } from "./projectService.js";

export type ServerOptions = {
  service: ProjectService;
  config: LingoDeskConfig;
  /** Directory holding the built UI. Looked up next to the package when omitted. */
  uiDistPath?: string | null;
};

type ErrorBody = {
  ok: false;
  error: string;
  code?: string;
  details?: unknown;
};

const resolveUiDistPath = () => {
  const runtimeDir = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [
    path.resolve(runtimeDir, "ui"),
    path.resolve(runtimeDir, "../../ui/dist"),
    path.resolve(process.cwd(), "packages/ui/dist"),
  ];

  for (const candidate of candidates) {
    const indexPath = path.join(candidate, "index.html");
    if (fs.existsSync(indexPath)) {
      return candidate;
    }
  }

  return null;
};

const TABLE_ERROR_STATUS: Record<TranslationTableError["code"], number> = {
  INVALID_KEY: 400,
  UNKNOWN_LANGUAGE: 400,
  DUPLICATE_LANGUAGE: 400,
  UNKNOWN_KEY: 404,
  KEY_CONFLICT: 409,
};

const bodyParserFailure = (error: unknown) => {
  if (!(error instanceof Error) || !("type" in error)) {
    return null;
  }
  if (error.type === "entity.parse.failed") {
    return { status: 400, error: "Request body must be valid JSON." };
  }
  if (error.type === "entity.too.large") {
    return { status: 413, error: "Request body is too large." };
  }
  return null;
};

export const sendError = (res: express.Response, error: unknown) => {
  const reply = (status: number, body: Omit<ErrorBody, "ok">) => {
    res.status(status).json({ ok: false, ...body } satisfies ErrorBody);
  };

  if (error instanceof ValidationError) {
    reply(400, {
      error: error.message,
      code: error.code,
      details: { fieldErrors: error.fieldErrors },
    });
    return;
  }

  if (error instanceof TranslationTableError) {
    reply(TABLE_ERROR_STATUS[error.code], {
      error: error.message,
      code: error.code,
      details: {
        key: error.key,
        reason: error.reason,
        conflictingKey: error.conflictingKey,
      },
    });
    return;
  }

  if (error instanceof TranslationTreeError) {
    reply(400, { error: error.message, code: error.code, details: { keys: error.keys } });
    return;
  }

  if (error instanceof ProjectNotFoundError) {
    reply(404, { error: error.message, code: error.code });
    return;
  }

  if (error instanceof WriteLockError) {
    reply(409, { error: error.message, code: error.code });
    return;
  }

  if (error instanceof UploadRejectedError) {
    reply(422, {
      error: error.message,
      code: error.code,
      details: { errors: error.errors, forceable: error.forceable },
    });
    return;
  }

  if (error instanceof StorageError) {
    console.error(error.message);
    reply(500, { error: error.message, code: error.code });
    return;
  }

  const parserFailure = bodyParserFailure(error);
  if (parserFailure) {
    reply(parserFailure.status, { error: parserFailure.error });
    return;
  }

  console.error(error);
  reply(500, { error: "Internal server error." });
};

type Handler = (req: express.Request, res: express.Response) => Promise<void>;

const handle =
  (run: Handler) => (req: express.Request, res: express.Response) => {
    run(req, res).catch((error: unknown) => sendError(res, error));
  };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const invalidRequest = (message: string) => new ValidationError("INVALID_REQUEST", message);

const requireBody = (req: express.Request) => {
  const body: unknown = req.body;
  if (!isRecord(body)) {
    throw invalidRequest("Request body must be a JSON object.");
  }
  return body;
};

const requireString = (body: Record<string, unknown>, field: string) => {
  const value = body[field];
  if (typeof value !== "string" || !value.trim()) {
    throw invalidRequest(`\`${field}\` is required and must be a non-empty string.`);
  }
  return value;
};

const queryString = (value: unknown) => (typeof value === "string" ? value.trim() : "");

const isTruthyFlag = (value: unknown) => {
  const text = queryString(value).toLowerCase();
  return text === "1" || text === "true";
};

const readLanguageList = (value: unknown, field: string) => {
  if (typeof value === "string") {
    return parseLanguageList(value);
  }
  if (Array.isArray(value)) {
    const entries = value.filter((entry): entry is string => typeof entry === "string");
    if (entries.length === value.length) {
      return entries.map((entry) => entry.trim()).filter((entry) => entry.length > 0);
    }
  }
  throw invalidRequest(`\`${field}\` must be a list of language codes.`);
};

const readOptionalString = (body: Record<string, unknown>, field: string) => {
  const value = body[field];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw invalidRequest(`\`${field}\` must be a string.`);
  }
  return value;
};

const readProjectInput = (
  body: Record<string, unknown>,
  defaultSourceLanguage: string,
): ProjectInput => ({
  name: readOptionalString(body, "name") ?? "",
  sourceLanguage: readOptionalString(body, "sourceLanguage") || defaultSourceLanguage,
  targetLanguages:
    body.targetLanguages === undefined
      ? []
      : readLanguageList(body.targetLanguages, "targetLanguages"),
});

const readProjectPatch = (body: Record<string, unknown>): ProjectPatch => {
  const patch: ProjectPatch = {};
  const name = readOptionalString(body, "name");
  const sourceLanguage = readOptionalString(body, "sourceLanguage");
  if (name !== undefined) {
    patch.name = name;
  }
  if (sourceLanguage !== undefined) {
    patch.sourceLanguage = sourceLanguage;
  }
  if (body.targetLanguages !== undefined) {
    patch.targetLanguages = readLanguageList(body.targetLanguages, "targetLanguages");
  }
  return patch;
};

const readChanges = (body: Record<string, unknown>): TranslationChange[] => {
  const { changes } = body;
  if (!Array.isArray(changes)) {
    throw invalidRequest("`changes` must be an array.");
  }

  return changes.map((change, index) => {
    if (
      !isRecord(change) ||
      typeof change.key !== "string" ||
      typeof change.language !== "string" ||
      typeof change.value !== "string"
    ) {
      throw invalidRequest(
        `changes[${index}] must have string \`key\`, \`language\` and \`value\`.`,
      );
    }
    return { key: change.key, language: change.language, value: change.value };
  });
};

const readUploadMode = (value: unknown): UploadMode => {
  if (value === undefined || value === "replace") {
    return "replace";
  }
  if (value === "merge") {
    return "merge";
  }
  throw invalidRequest("`mode` must be `replace` or `merge`.");
};

export function createServerApp({ service, config, uiDistPath }: ServerOptions) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: config.uploadLimit }));

  const publicConfig: PublicConfig = {
    defaultSourceLanguage: config.defaultSourceLanguage,
    export: config.export,
  };

  app.get("/api/config", (_req, res) => {
    res.json(publicConfig);
  });

  app.get(
    "/api/projects",
    handle(async (_req, res) => {
      res.json({ projects: await service.listProjects() });
    }),
  );

  app.post(
    "/api/projects",
    handle(async (req, res) => {
      const input = readProjectInput(requireBody(req), config.defaultSourceLanguage);
      const project = await service.createProject(input);
      console.log(`Created project "${project.name}" (${project.id}).`);
      res.status(201).json(project);
    }),
  );

  app.get(
    "/api/projects/:id",
    handle(async (req, res) => {
      res.json(await service.getProject(req.params.id));
    }),
  );

  app.patch(
    "/api/projects/:id",
    handle(async (req, res) => {
      const patch = readProjectPatch(requireBody(req));
      res.json(await service.updateProject(req.params.id, patch));
    }),
  );

  app.delete(
    "/api/projects/:id",
    handle(async (req, res) => {
      await service.deleteProject(req.params.id);
      console.log(`Deleted project ${req.params.id}.`);
      res.json({ ok: true });
    }),
  );

  app.get(
    "/api/projects/:id/table",
    handle(async (req, res) => {
      const language = queryString(req.query.language);
      const table = await service.getTable(req.params.id, {
        search: queryString(req.query.search),
        onlyIncomplete: isTruthyFlag(req.query.missing),
        language: language || undefined,
      });
      res.json(table);
    }),
  );

  app.post(
    "/api/projects/:id/translations",
    handle(async (req, res) => {
      const changes = readChanges(requireBody(req));
      const completion = await service.applyChanges(req.params.id, changes);
      res.json({ ok: true, updated: changes.length, completion });
    }),
  );

  app.post(
    "/api/projects/:id/keys",
    handle(async (req, res) => {
      const key = requireString(requireBody(req), "key");
      const row = await service.addKey(req.params.id, key);
      res.status(201).json({ ok: true, row });
    }),
  );

  app.post(
    "/api/projects/:id/keys/rename",
    handle(async (req, res) => {
      const body = requireBody(req);
      const oldKey = requireString(body, "oldKey");
      const newKey = requireString(body, "newKey");
      const key = await service.renameKey(req.params.id, oldKey, newKey);
      res.json({ ok: true, oldKey, newKey: key });
    }),
  );

  app.delete(
    "/api/projects/:id/keys",
    handle(async (req, res) => {
      const key = typeof req.query.key === "string" ? req.query.key : "";
      if (!key.trim()) {
        throw invalidRequest("Query parameter `key` is required.");
      }
      const completion = await service.removeKey(req.params.id, key);
      res.json({ ok: true, key, completion });
    }),
  );

  app.post(
    "/api/projects/:id/uploads",
    handle(async (req, res) => {
      const body = requireBody(req);
      const content = body.content;
      if (typeof content !== "string") {
        throw invalidRequest("`content` is required and must be a string.");
      }
      const result = await service.importUpload(req.params.id, {
        language: requireString(body, "language"),
        fileName: requireString(body, "fileName"),
        content,
        mode: readUploadMode(body.mode),
        force: body.force === true,
      });
      res.json({ ok: true, ...result });
    }),
  );

  app.get(
    "/api/projects/:id/export",
    handle(async (req, res) => {
      const language = queryString(req.query.language);
      if (!language) {
        throw invalidRequest("Query parameter `language` is required.");
      }
      const project = await service.getProject(req.params.id);
      if (![project.sourceLanguage, ...project.targetLanguages].includes(language)) {
        throw invalidRequest(`Language "${language}" is not part of this project.`);
      }

      const [file] = await service.exportProject(project.id, { languages: [language] });
      res.setHeader("Content-Type", "application/json; charset=utf-8");
      res.setHeader("Content-Disposition", `attachment; filename="${file.fileName}"`);
      res.send(file.content);
    }),
  );

  app.use("/api", (_req, res) => {
    res.status(404).json({ ok: false, error: "Not found." } satisfies ErrorBody);
  });

  const staticPath = uiDistPath === undefined ? resolveUiDistPath() : uiDistPath;
  if (staticPath) {
    app.use(express.static(staticPath, { index: false }));
    app.get(/^\/(?!api(?:\/|$)).*/, (_req, res) => {
      res.sendFile(path.join(staticPath, "index.html"));
    });
  } else if (uiDistPath === undefined) {
    console.warn("LingoDesk UI build not found. Run `npm run build:ui`.");
  }

  app.use(
    (
      error: unknown,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction,
    ) => {
      sendError(res, error);
    },
  );

  return app;
}

export async function startServer(options: ServerOptions, port: number) {
  const app = createServerApp(options);

  const server = await new Promise<ReturnType<typeof app.listen>>((resolve, reject) => {
    const nextServer = app.listen(port, () => resolve(nextServer));
    nextServer.once("error", reject);
  });
  const address = server.address();
  const resolvedPort = typeof address === "object" && address ? address.port : port;

  return { port: resolvedPort, server };
}
