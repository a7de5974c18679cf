import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { mergeStrategySchema } from "../refactor/merge/merge-strategy.js";
import { ConfigurationError } from "./errors.js";

export const defaultSourceExtensions = ["ts", "tsx", "mts", "cts", "js", "jsx", "mjs", "cjs"];
export const defaultConfigFileName = "arch-repair.config.json";

const positiveInt = z.number().int().positive();

export const appConfigSchema = z
  .object({
    sourceDir: z.string().min(1).default("."),
    outputDir: z.string().min(1).default("arch-repair-out"),
    extensions: z.array(z.string().min(1)).default(defaultSourceExtensions),
    excludedDirs: z.array(z.string().min(1)).optional(),
    maxChunkSize: positiveInt.default(300),
    chunkOverlap: z.number().int().nonnegative().default(0),
    chunkMode: z.enum(["line", "structure", "paragraph", "auto"]).default("auto"),
    maxAttempts: positiveInt.default(3),
    concurrency: positiveInt.default(4),
    chunkConcurrency: positiveInt.default(4),
    cacheEnabled: z.boolean().default(true),
    cacheBackend: z.enum(["file", "postgres"]).default("file"),
    cacheDir: z.string().min(1).default(".arch-repair/cache"),
    databaseUrl: z.string().min(1).optional(),
    databaseSsl: z.enum(["require", "disable"]).default("disable"),
    requestTimeoutMs: positiveInt.default(90_000),
    shutdownTimeoutMs: positiveInt.default(60_000),
    provider: z.string().min(1).optional(),
    model: z.string().min(1).optional(),
    systemPrompt: z.string().min(1).optional(),
    basePrompt: z.string().min(1).optional(),
    merge: mergeStrategySchema.default({}),
    rag: z
      .object({
        enabled: z.boolean().default(true),
        topK: z.number().int().nonnegative().default(2),
        minScore: z.number().min(-1).max(1).default(0.7),
        queryCharLimit: z.number().int().nonnegative().default(500),
        queryPrefix: z.string().default("TypeScript code for domain-driven design review: "),
        includeCitations: z.boolean().default(false),
        indexBackend: z.enum(["memory", "remote"]).default("memory"),
        remoteUrl: z.string().url().optional(),
        remoteApiKey: z.string().optional(),
        namespace: z.string().default(""),
        storePath: z.string().min(1).optional(),
        indexProcessedFiles: z.boolean().default(false)
      })
      .default({}),
    embedding: z
      .object({
        provider: z.enum(["auto", "openai", "hashing"]).default("auto"),
        model: z.string().min(1).default("text-embedding-ada-002"),
        dimension: positiveInt.optional(),
        batchSize: positiveInt.default(20),
        apiUrl: z.string().url().default("https://api.openai.com/v1"),
        apiKey: z.string().optional()
      })
      .default({})
  })
  .strict();

export type AppConfig = z.infer<typeof appConfigSchema>;

type EnvKind = "string" | "int" | "number" | "bool" | "list";

interface EnvBinding {
  name: string;
  path: string[];
  kind: EnvKind;
}

const envBindings: EnvBinding[] = [
  { name: "ARCH_REPAIR_SOURCE_DIR", path: ["sourceDir"], kind: "string" },
  { name: "ARCH_REPAIR_OUTPUT_DIR", path: ["outputDir"], kind: "string" },
  { name: "ARCH_REPAIR_EXTENSIONS", path: ["extensions"], kind: "list" },
  { name: "ARCH_REPAIR_EXCLUDED_DIRS", path: ["excludedDirs"], kind: "list" },
  { name: "ARCH_REPAIR_MAX_CHUNK_SIZE", path: ["maxChunkSize"], kind: "int" },
  { name: "ARCH_REPAIR_CHUNK_OVERLAP", path: ["chunkOverlap"], kind: "int" },
  { name: "ARCH_REPAIR_CHUNK_MODE", path: ["chunkMode"], kind: "string" },
  { name: "ARCH_REPAIR_MAX_ATTEMPTS", path: ["maxAttempts"], kind: "int" },
  { name: "ARCH_REPAIR_CONCURRENCY", path: ["concurrency"], kind: "int" },
  { name: "ARCH_REPAIR_CHUNK_CONCURRENCY", path: ["chunkConcurrency"], kind: "int" },
  { name: "ARCH_REPAIR_CACHE_ENABLED", path: ["cacheEnabled"], kind: "bool" },
  { name: "ARCH_REPAIR_CACHE_BACKEND", path: ["cacheBackend"], kind: "string" },
  { name: "ARCH_REPAIR_CACHE_DIR", path: ["cacheDir"], kind: "string" },
  { name: "DATABASE_URL", path: ["databaseUrl"], kind: "string" },
  { name: "ARCH_REPAIR_DATABASE_URL", path: ["databaseUrl"], kind: "string" },
  { name: "DATABASE_SSL", path: ["databaseSsl"], kind: "string" },
  { name: "ARCH_REPAIR_REQUEST_TIMEOUT_MS", path: ["requestTimeoutMs"], kind: "int" },
  { name: "ARCH_REPAIR_SHUTDOWN_TIMEOUT_MS", path: ["shutdownTimeoutMs"], kind: "int" },
  { name: "ARCH_REPAIR_PROVIDER", path: ["provider"], kind: "string" },
  { name: "ARCH_REPAIR_MODEL", path: ["model"], kind: "string" },
  { name: "ARCH_REPAIR_BASE_PROMPT", path: ["basePrompt"], kind: "string" },
  { name: "ARCH_REPAIR_MEMBER_REMOVALS", path: ["merge", "memberRemovals"], kind: "list" },
  { name: "ARCH_REPAIR_DOMAIN_KEYWORDS", path: ["merge", "domainKeywords"], kind: "list" },
  { name: "ARCH_REPAIR_RAG_ENABLED", path: ["rag", "enabled"], kind: "bool" },
  { name: "ARCH_REPAIR_RAG_TOP_K", path: ["rag", "topK"], kind: "int" },
  { name: "ARCH_REPAIR_RAG_MIN_SCORE", path: ["rag", "minScore"], kind: "number" },
  { name: "ARCH_REPAIR_RAG_QUERY_CHAR_LIMIT", path: ["rag", "queryCharLimit"], kind: "int" },
  { name: "ARCH_REPAIR_RAG_QUERY_PREFIX", path: ["rag", "queryPrefix"], kind: "string" },
  { name: "ARCH_REPAIR_RAG_INCLUDE_CITATIONS", path: ["rag", "includeCitations"], kind: "bool" },
  { name: "ARCH_REPAIR_RAG_INDEX_BACKEND", path: ["rag", "indexBackend"], kind: "string" },
  { name: "ARCH_REPAIR_RAG_REMOTE_URL", path: ["rag", "remoteUrl"], kind: "string" },
  { name: "ARCH_REPAIR_RAG_REMOTE_API_KEY", path: ["rag", "remoteApiKey"], kind: "string" },
  { name: "ARCH_REPAIR_RAG_NAMESPACE", path: ["rag", "namespace"], kind: "string" },
  { name: "ARCH_REPAIR_RAG_STORE_PATH", path: ["rag", "storePath"], kind: "string" },
  { name: "ARCH_REPAIR_RAG_INDEX_PROCESSED_FILES", path: ["rag", "indexProcessedFiles"], kind: "bool" },
  { name: "ARCH_REPAIR_EMBEDDING_PROVIDER", path: ["embedding", "provider"], kind: "string" },
  { name: "ARCH_REPAIR_EMBEDDING_MODEL", path: ["embedding", "model"], kind: "string" },
  { name: "ARCH_REPAIR_EMBEDDING_DIMENSION", path: ["embedding", "dimension"], kind: "int" },
  { name: "ARCH_REPAIR_EMBEDDING_BATCH_SIZE", path: ["embedding", "batchSize"], kind: "int" },
  { name: "ARCH_REPAIR_EMBEDDING_API_URL", path: ["embedding", "apiUrl"], kind: "string" },
  { name: "OPENAI_API_KEY", path: ["embedding", "apiKey"], kind: "string" }
];

export type ConfigLayer = { [key: string]: unknown };

function isPlainObject(value: unknown): value is ConfigLayer {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function mergeLayers(base: ConfigLayer, overlay: ConfigLayer): ConfigLayer {
  const merged: ConfigLayer = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    if (value === undefined) {
      continue;
    }
    const existing = merged[key];
    merged[key] = isPlainObject(existing) && isPlainObject(value) ? mergeLayers(existing, value) : value;
  }
  return merged;
}

function setPath(target: ConfigLayer, keys: string[], value: unknown): void {
  let cursor = target;
  for (const key of keys.slice(0, -1)) {
    const next = cursor[key];
    if (isPlainObject(next)) {
      cursor = next;
    } else {
      const created: ConfigLayer = {};
      cursor[key] = created;
      cursor = created;
    }
  }
  cursor[keys[keys.length - 1]] = value;
}

function convertEnvValue(binding: EnvBinding, raw: string, issues: string[]): unknown {
  const value = raw.trim();
  switch (binding.kind) {
    case "string":
      return value;
    case "list":
      return value
        .split(",")
        .map((entry) => entry.trim())
        .filter(Boolean);
    case "bool": {
      const normalized = value.toLowerCase();
      if (["1", "true", "yes", "on"].includes(normalized)) {
        return true;
      }
      if (["0", "false", "no", "off"].includes(normalized)) {
        return false;
      }
      issues.push(`${binding.name} must be a boolean (got '${raw}')`);
      return undefined;
    }
    case "int":
    case "number": {
      const parsed = Number(value);
      if (!value || !Number.isFinite(parsed) || (binding.kind === "int" && !Number.isInteger(parsed))) {
        issues.push(`${binding.name} must be ${binding.kind === "int" ? "an integer" : "a number"} (got '${raw}')`);
        return undefined;
      }
      return parsed;
    }
  }
}

export function configFromEnv(env: NodeJS.ProcessEnv): ConfigLayer {
  const layer: ConfigLayer = {};
  const issues: string[] = [];

  for (const binding of envBindings) {
    const raw = env[binding.name];
    if (raw === undefined || raw.trim() === "") {
      continue;
    }
    const value = convertEnvValue(binding, raw, issues);
    if (value !== undefined) {
      setPath(layer, binding.path, value);
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError("Invalid environment configuration", issues);
  }
  return layer;
}

async function readConfigFile(configFile: string, required: boolean): Promise<ConfigLayer> {
  let raw: string;
  try {
    raw = await fs.readFile(configFile, "utf8");
  } catch (error) {
    const code = error instanceof Error && "code" in error ? error.code : undefined;
    if (!required && code === "ENOENT") {
      return {};
    }
    throw new ConfigurationError(`Cannot read config file ${configFile}`, [String(error)]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Config file ${configFile} is not valid JSON`, [String(error)]);
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Config file ${configFile} must contain a JSON object`);
  }
  return parsed;
}

export function validateConfig(layer: ConfigLayer): AppConfig {
  const parsed = appConfigSchema.safeParse(layer);
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid configuration",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }

  const config = parsed.data;
  const issues: string[] = [];
  if (config.maxChunkSize <= config.chunkOverlap) {
    issues.push(`maxChunkSize (${config.maxChunkSize}) must be greater than chunkOverlap (${config.chunkOverlap})`);
  }
  if (config.rag.indexBackend === "remote" && !config.rag.remoteUrl) {
    issues.push("rag.remoteUrl is required when rag.indexBackend is 'remote'");
  }
  if (config.cacheEnabled && config.cacheBackend === "postgres" && !config.databaseUrl) {
    issues.push("databaseUrl is required when cacheBackend is 'postgres'");
  }
  if (config.embedding.provider === "openai" && !config.embedding.apiKey) {
    issues.push("embedding.apiKey (OPENAI_API_KEY) is required when embedding.provider is 'openai'");
  }

  if (issues.length > 0) {
    throw new ConfigurationError("Invalid configuration", issues);
  }
  return config;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigLayer;
  /** Explicit file must exist; without one, `arch-repair.config.json` in `cwd` is used when present. */
  configFile?: string;
  cwd?: string;
}

/** defaults <- JSON config file <- environment <- overrides */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const fileLayer = options.configFile
    ? await readConfigFile(path.resolve(options.cwd ?? process.cwd(), options.configFile), true)
    : await readConfigFile(path.resolve(options.cwd ?? process.cwd(), defaultConfigFileName), false);

  const layered = mergeLayers(mergeLayers(fileLayer, configFromEnv(env)), options.overrides ?? {});
  return validateConfig(layered);
}
