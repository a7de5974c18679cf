import path from "node:path";
import { AppConfig, ConfigLayer, loadConfig } from "../lib/config.js";
import { ConfigurationError, errorMessage } from "../lib/errors.js";
import { readTextFile, writeTextFileAtomic } from "../lib/fs-utils.js";
import { logDebug, logInfo, setLogLevel } from "../lib/logging.js";
import { runAll } from "../refactor/orchestrator.js";
import { DocumentProcessor } from "../refactor/retrieval/document-processor.js";
import { RagEvaluator, evaluationSuiteSchema, saveEvaluationReport } from "../refactor/retrieval/rag-evaluator.js";
import { loadIndexSnapshot, saveIndexSnapshot } from "../refactor/retrieval/reference-index-store.js";
import { Runtime, RuntimeOverrides, createEmbedder, createRuntime } from "../refactor/runtime.js";
import { discoverSourceUnits } from "../refactor/source-unit.js";
import { RunningReferenceIndexServer, startReferenceIndexServer } from "../server/reference-index-server.js";

export type CliCommand = "run" | "index" | "serve-index" | "evaluate-rag" | "help";

export interface ParsedArgs {
  command: CliCommand;
  args: string[];
  options: Record<string, string | boolean>;
  verbose: boolean;
}

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** Test seam for collaborators such as the transformer. */
  runtime?: RuntimeOverrides;
  /** Resolves when a long-running command should stop; defaults to SIGINT/SIGTERM. */
  untilStopped?: () => Promise<void>;
  onServerStarted?: (server: RunningReferenceIndexServer) => void;
}

const knownCommands: CliCommand[] = ["run", "index", "serve-index", "evaluate-rag", "help"];

// flags that never take a value, so a following positional stays a positional
const booleanFlags = new Set(["no-cache", "no-rag"]);

function isCliCommand(value: string): value is CliCommand {
  return knownCommands.some((command) => command === value);
}

export function parseArgs(argv: string[]): ParsedArgs {
  const first = argv[0] || "help";
  const options: Record<string, string | boolean> = {};
  const args: string[] = [];

  for (let index = 1; index < argv.length; index += 1) {
    const token = argv[index];

    if (!token.startsWith("-")) {
      args.push(token);
      continue;
    }

    if (token === "-v" || token === "--verbose") {
      options.verbose = true;
      continue;
    }

    if (token.startsWith("--")) {
      const eqIndex = token.indexOf("=");
      if (eqIndex > 2) {
        const key = token.slice(2, eqIndex);
        const value = token.slice(eqIndex + 1);
        options[key] = value;
      } else {
        const key = token.slice(2);
        const next = argv[index + 1];

        if (!booleanFlags.has(key) && next && !next.startsWith("-")) {
          options[key] = next;
          index += 1;
        } else {
          options[key] = true;
        }
      }
    }
  }

  return {
    command: isCliCommand(first) ? first : "help",
    args,
    options,
    verbose: options.verbose === true
  };
}

function optionString(options: Record<string, string | boolean>, key: string): string | undefined {
  const value = options[key];
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  return undefined;
}

function optionInt(options: Record<string, string | boolean>, key: string): number | undefined {
  const raw = optionString(options, key);
  if (!raw) {
    return undefined;
  }

  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`--${key} must be an integer (got '${raw}')`);
  }
  return parsed;
}

function optionList(options: Record<string, string | boolean>, key: string): string[] | undefined {
  const raw = optionString(options, key);
  return raw
    ? raw
        .split(",")
        .map((entry) => entry.trim())
        .filter(Boolean)
    : undefined;
}

export function commandUsage(): string {
  return [
    "arch-repair CLI",
    "",
    "Commands:",
    "  run [sourceDir] [--config <file>] [--output <dir>] [--provider <id>] [--model <id>] [--max-attempts <n>] [--concurrency <n>] [--chunk-concurrency <n>] [--chunk-size <n>] [--chunk-overlap <n>] [--chunk-mode line|structure|paragraph|auto] [--no-cache] [--cache-dir <dir>] [--no-rag] [--report <file>]",
    "  index <docsDir> [--config <file>] [--store <file>] [--extensions md,txt,ts]",
    "  serve-index [--config <file>] [--store <file>] [--port <n>] [--host <host>] [--api-key <key>]",
    "  evaluate-rag <suite.json> [--config <file>] [--store <file>] [--report-dir <dir>]",
    "  help",
    "",
    "Notes:",
    "  - Configuration layers: defaults, arch-repair.config.json (or --config), ARCH_REPAIR_* environment, flags.",
    "  - The run report is printed to stdout as JSON; logs go to stderr.",
    "  - Exit codes: 0 success, 1 some units failed or were abandoned, 2 configuration error.",
    "  - serve-index saves the default namespace back to --store on shutdown.",
    "  - Use --verbose to include debug logs."
  ].join("\n");
}

export function overridesFromOptions(args: string[], options: Record<string, string | boolean>): ConfigLayer {
  const overrides: ConfigLayer = {
    sourceDir: args[0],
    outputDir: optionString(options, "output"),
    provider: optionString(options, "provider"),
    model: optionString(options, "model"),
    maxAttempts: optionInt(options, "max-attempts"),
    concurrency: optionInt(options, "concurrency"),
    chunkConcurrency: optionInt(options, "chunk-concurrency"),
    maxChunkSize: optionInt(options, "chunk-size"),
    chunkOverlap: optionInt(options, "chunk-overlap"),
    chunkMode: optionString(options, "chunk-mode"),
    cacheDir: optionString(options, "cache-dir"),
    extensions: optionList(options, "extensions"),
    cacheEnabled: options["no-cache"] === true ? false : undefined
  };

  const rag: ConfigLayer = {
    enabled: options["no-rag"] === true ? false : undefined,
    storePath: optionString(options, "store")
  };
  overrides.rag = rag;
  return overrides;
}

function resolvePaths(config: AppConfig, cwd: string): AppConfig {
  return {
    ...config,
    sourceDir: path.resolve(cwd, config.sourceDir),
    outputDir: path.resolve(cwd, config.outputDir),
    cacheDir: path.resolve(cwd, config.cacheDir),
    rag: {
      ...config.rag,
      storePath: config.rag.storePath ? path.resolve(cwd, config.rag.storePath) : undefined
    }
  };
}

async function handleRun(parsed: ParsedArgs, config: AppConfig, io: CliIo): Promise<number> {
  const sourceDir = config.sourceDir;
  const units = await discoverSourceUnits(sourceDir, {
    extensions: config.extensions,
    excludedDirs: config.excludedDirs
  });
  logInfo("source_units_discovered", { sourceDir, units: units.length });

  const runtime = await createRuntime(config, { env: io.env, ...io.runtime });

  try {
    const report = await runAll(units, runtime.pipeline, {
      concurrency: config.concurrency,
      shutdownTimeoutMs: config.shutdownTimeoutMs
    });
    await runtime.persistIndex();

    const rendered = `${JSON.stringify(report, null, 2)}\n`;
    const reportPath = optionString(parsed.options, "report");
    if (reportPath) {
      await writeTextFileAtomic(path.resolve(io.cwd, reportPath), rendered);
    }
    io.stdout(rendered);

    return report.totals.failed > 0 || report.totals.abandoned > 0 ? 1 : 0;
  } finally {
    await runtime.close();
  }
}

async function handleIndex(parsed: ParsedArgs, config: AppConfig, io: CliIo): Promise<number> {
  const docsDir = parsed.args[0];
  if (!docsDir) {
    throw new ConfigurationError("index requires a <docsDir> argument");
  }
  if (config.rag.indexBackend === "memory" && !config.rag.storePath) {
    throw new ConfigurationError("index requires --store <file> (or rag.storePath) for the in-memory backend");
  }

  const indexConfig: AppConfig = { ...config, rag: { ...config.rag, enabled: true } };
  const runtime: Runtime = await createRuntime(indexConfig, { env: io.env, ...io.runtime });

  try {
    if (!runtime.rag || !runtime.index) {
      throw new Error("reference index is not available");
    }

    const processor = new DocumentProcessor(runtime.rag, {
      chunkSize: config.maxChunkSize,
      chunkOverlap: config.chunkOverlap
    });
    const extensions = optionList(parsed.options, "extensions") ?? ["md", "markdown", "txt", ...config.extensions];
    const processed = await processor.processDirectory(path.resolve(io.cwd, docsDir), extensions);
    await runtime.persistIndex();

    io.stdout(`${JSON.stringify({ processedFiles: processed, indexSize: await runtime.index.size() })}\n`);
    return 0;
  } finally {
    await runtime.close();
  }
}

function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    const stop = (): void => {
      process.off("SIGINT", stop);
      process.off("SIGTERM", stop);
      resolve();
    };
    process.on("SIGINT", stop);
    process.on("SIGTERM", stop);
  });
}

async function handleServeIndex(parsed: ParsedArgs, config: AppConfig, io: CliIo): Promise<number> {
  const embedder = io.runtime?.embedder ?? createEmbedder(config);
  const storePath = config.rag.storePath;
  const index = storePath
    ? await loadIndexSnapshot(storePath, { modelName: embedder.modelName, dimension: embedder.dimension() })
    : undefined;

  const server = await startReferenceIndexServer({
    index,
    port: optionInt(parsed.options, "port") ?? 8787,
    host: optionString(parsed.options, "host"),
    apiKey: optionString(parsed.options, "api-key") ?? io.env.ARCH_REPAIR_INDEX_API_KEY,
    corsOrigins: (io.env.CORS_ALLOWED_ORIGINS || "")
      .split(",")
      .map((entry) => entry.trim())
      .filter(Boolean)
  });
  io.onServerStarted?.(server);
  io.stderr(`reference index listening on ${server.url}\n`);

  try {
    await (io.untilStopped ?? waitForSignal)();
    if (storePath) {
      await saveIndexSnapshot(storePath, server.defaultIndex, {
        modelName: embedder.modelName,
        dimension: embedder.dimension()
      });
      logInfo("reference_index_saved", { storePath, vectors: await server.defaultIndex.size() });
    }
  } finally {
    await server.close();
  }
  return 0;
}

async function handleEvaluateRag(parsed: ParsedArgs, config: AppConfig, io: CliIo): Promise<number> {
  const suitePath = parsed.args[0];
  if (!suitePath) {
    throw new ConfigurationError("evaluate-rag requires a <suite.json> argument");
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readTextFile(path.resolve(io.cwd, suitePath)));
  } catch (error) {
    throw new ConfigurationError(`Cannot read evaluation suite ${suitePath}`, [errorMessage(error)]);
  }
  const suite = evaluationSuiteSchema.safeParse(raw);
  if (!suite.success) {
    throw new ConfigurationError(
      `Invalid evaluation suite ${suitePath}`,
      suite.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }

  const evalConfig: AppConfig = { ...config, rag: { ...config.rag, enabled: true } };
  const runtime = await createRuntime(evalConfig, { env: io.env, ...io.runtime });

  try {
    if (!runtime.index) {
      throw new Error("reference index is not available");
    }

    const report = await new RagEvaluator({ index: runtime.index, embedder: runtime.embedder }).evaluate(suite.data);
    const reportDir = optionString(parsed.options, "report-dir");
    if (reportDir) {
      const written = await saveEvaluationReport(path.resolve(io.cwd, reportDir), report);
      logInfo("rag_evaluation_saved", { path: written });
    }
    io.stdout(`${JSON.stringify(report, null, 2)}\n`);
    return 0;
  } finally {
    await runtime.close();
  }
}

export async function runCli(argv: string[], io: CliIo): Promise<number> {
  const parsed = parseArgs(argv);

  if (parsed.command === "help") {
    io.stdout(`${commandUsage()}\n`);
    return 0;
  }

  if (parsed.verbose) {
    setLogLevel("debug");
    logDebug("cli_verbose_logging", { command: parsed.command });
  }

  let config: AppConfig;
  try {
    config = await loadConfig({
      env: io.env,
      cwd: io.cwd,
      configFile: optionString(parsed.options, "config"),
      overrides: overridesFromOptions(parsed.args, parsed.options)
    });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      io.stderr(`${error.message}\n`);
      return 2;
    }
    throw error;
  }

  const resolved = resolvePaths(config, io.cwd);
  try {
    switch (parsed.command) {
      case "run":
        return await handleRun(parsed, resolved, io);
      case "index":
        return await handleIndex(parsed, resolved, io);
      case "serve-index":
        return await handleServeIndex(parsed, resolved, io);
      case "evaluate-rag":
        return await handleEvaluateRag(parsed, resolved, io);
      default:
        io.stdout(`${commandUsage()}\n`);
        return 0;
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      io.stderr(`${error.message}\n`);
      return 2;
    }
    io.stderr(`${errorMessage(error)}\n`);
    return 1;
  }
}
