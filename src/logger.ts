import { inspect } from "node:util";

export type LogLevel = "debug" | "info" | "warn" | "error";
export const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_PREFIX: Record<LogLevel, string> = {
  debug: "·",
  info: "ℹ️",
  warn: "⚠️",
  error: "⛔",
};

export type LogMeta = Record<string, unknown>;

export interface Logger {
  child(scope: string): Logger;
  log(level: LogLevel, message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  isLevelEnabled(level: LogLevel): boolean;
}

export type ConsoleLoggerOptions = {
  scope?: string;
  // receives each formatted line; defaults to stderr
  write?: (line: string) => void;
};

// DRIVE_CATALOG_DISABLE_LOG_ECHO=1 mutes the default stderr writer.
function isEchoSuppressed(): boolean {
  const raw = process.env.DRIVE_CATALOG_DISABLE_LOG_ECHO?.trim().toLowerCase();
  if (!raw) return false;
  return raw !== "0" && raw !== "false";
}

function writeStderr(line: string): void {
  if (isEchoSuppressed()) return;
  console.error(line);
}

function serializeMeta(meta: LogMeta): string {
  try {
    return JSON.stringify(meta);
  } catch {
    return inspect(meta, { depth: 4 });
  }
}

export function formatLogLine(
  level: LogLevel,
  scope: string | undefined,
  message: string,
  meta?: LogMeta,
): string {
  const scopeText = scope ? `[${scope}] ` : "";
  const line = `${LEVEL_PREFIX[level]} ${scopeText}${message}`;
  return meta && Object.keys(meta).length ? `${line} ${serializeMeta(meta)}` : line;
}

/**
 * Leveled logger for the CLI. Lines at or above `minLevel` go to the writer;
 * children share it and extend the dotted scope.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly scope?: string;
  private readonly write: (line: string) => void;

  constructor(minLevel: LogLevel = "info", opts: ConsoleLoggerOptions = {}) {
    this.minLevel = minLevel;
    this.scope = opts.scope;
    this.write = opts.write ?? writeStderr;
  }

  child(scope: string): Logger {
    return new ConsoleLogger(this.minLevel, {
      scope: this.scope ? `${this.scope}.${scope}` : scope,
      write: this.write,
    });
  }

  log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (!this.isLevelEnabled(level)) return;
    this.write(formatLogLine(level, this.scope, message, meta));
  }

  debug(message: string, meta?: LogMeta): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.log("error", message, meta);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }
}

export class NullLogger implements Logger {
  child(_scope: string): Logger {
    return this;
  }
  log(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  isLevelEnabled(_level: LogLevel): boolean {
    return false;
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((lvl) => lvl === value);
}

/** Case-insensitive; undefined when `raw` names no level. */
export function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  const normalized = raw?.trim().toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : undefined;
}
