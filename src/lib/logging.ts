export type LogValue = unknown;

export type LogLevel = "debug" | "info" | "warn" | "error";

const levelRank: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

let levelOverride: LogLevel | "silent" | null = null;

// stdout is reserved for the CLI report, so every level is written to stderr.
function writeToStderr(line: string): void {
  process.stderr.write(line);
}

let writeLine: (line: string) => void = writeToStderr;

/** Takes precedence over ARCH_REPAIR_LOG_LEVEL; null restores the environment threshold. */
export function setLogLevel(level: LogLevel | "silent" | null): void {
  levelOverride = level;
}

/** Redirects log lines; null restores stderr. */
export function setLogWriter(writer: ((line: string) => void) | null): void {
  writeLine = writer ?? writeToStderr;
}

function resolveThreshold(): number {
  if (levelOverride) {
    return levelRank[levelOverride];
  }
  const configured = String(process.env.ARCH_REPAIR_LOG_LEVEL || "").trim().toLowerCase();
  if (configured === "debug" || configured === "info" || configured === "warn" || configured === "error") {
    return levelRank[configured];
  }
  if (configured === "silent") {
    return levelRank.silent;
  }
  return levelRank.info;
}

function emit(level: LogLevel, event: string, fields: Record<string, LogValue>): void {
  if (levelRank[level] < resolveThreshold()) {
    return;
  }

  const payload = {
    level,
    event,
    timestamp: new Date().toISOString(),
    ...fields
  };

  writeLine(`${JSON.stringify(payload)}\n`);
}

export function logDebug(event: string, fields: Record<string, LogValue> = {}): void {
  emit("debug", event, fields);
}

export function logInfo(event: string, fields: Record<string, LogValue> = {}): void {
  emit("info", event, fields);
}

export function logWarn(event: string, fields: Record<string, LogValue> = {}): void {
  emit("warn", event, fields);
}

export function logError(event: string, fields: Record<string, LogValue> = {}): void {
  emit("error", event, fields);
}

export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }

  return {
    message: String(error)
  };
}
