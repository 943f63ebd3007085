import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
import process from "node:process";

import { getRunContext } from "./infra/runContext.js";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Placeholder inserted when a secret token is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Keys whose values are replaced when structured redaction is enabled. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "api-key",
  "api_key",
  "apikey",
  "token",
  "access_token",
  "refresh_token",
  "password",
  "secret",
]);

/**
 * Parses the `AUDIT_LOG_REDACT` directive list. Accepts comma-separated
 * toggles and literal substrings, e.g. `"on,ghp_"` or `"off"`. Providing
 * patterns without an explicit toggle enables redaction.
 */
export function parseRedactionDirectives(raw: string | undefined): {
  enabled: boolean;
  tokens: string[];
} {
  if (!raw) {
    return { enabled: false, tokens: [] };
  }

  const directives = raw
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  let enabled: boolean | undefined;
  const tokens: string[] = [];
  for (const directive of directives) {
    const lower = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(lower)) {
      enabled = false;
      continue;
    }
    if (REDACTION_ENABLE_TOKENS.has(lower)) {
      enabled = true;
      continue;
    }
    tokens.push(directive);
  }

  return { enabled: enabled ?? tokens.length > 0, tokens: Array.from(new Set(tokens)) };
}

const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB
const DEFAULT_MAX_FILE_COUNT = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"] as const;

const LEVEL_WEIGHT: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  run_id?: string;
  agent?: string | null;
  payload?: unknown;
}

/** Minimal writable surface used for the primary log sink. */
export interface LogSink {
  write(line: string): unknown;
}

export interface LoggerOptions {
  /** Minimum level emitted. Defaults to `debug`. */
  readonly level?: LogLevel;
  readonly logFile?: string | null;
  /** Maximum size in bytes before the mirrored log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of files retained during rotation, including the active one. */
  readonly maxFileCount?: number;
  /** Literal substrings or patterns scrubbed from string payload values. */
  readonly redactSecrets?: Array<string | RegExp>;
  /** Overrides the toggle derived from `AUDIT_LOG_REDACT`. */
  readonly redactionEnabled?: boolean;
  /** Primary sink. Defaults to `process.stdout`. */
  readonly sink?: LogSink;
  /** Listener invoked with a clone of every emitted entry. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Structured logger that emits JSON lines on the primary sink and optionally
 * mirrors them to a file. File writes are queued sequentially so the mirrored
 * file keeps the emission order.
 */
export class StructuredLogger {
  private readonly level: LogLevel;
  private readonly logFile: string | null;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly redactSecrets: Array<string | RegExp>;
  private readonly redactionEnabled: boolean;
  private readonly sink: LogSink;
  private readonly entryListener?: (entry: LogEntry) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "debug";
    this.logFile = options.logFile ?? null;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    const directives = parseRedactionDirectives(process.env.AUDIT_LOG_REDACT);
    this.redactSecrets = [...new Set<string | RegExp>([...directives.tokens, ...(options.redactSecrets ?? [])])];
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
    this.sink = options.sink ?? process.stdout;
    this.entryListener = options.onEntry;
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  /** Waits until every mirrored line has been appended to the log file. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.level]) {
      return;
    }
    const run = getRunContext();
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(run ? { run_id: run.runId, agent: run.agent } : {}),
      ...(payload !== undefined ? { payload: this.redact(payload) } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.sink.write(line);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }

    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue
      .then(async () => {
        try {
          await this.ensureLogDirectory(logFile);
          await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
          await appendFile(logFile, line, "utf8");
        } catch (err) {
          this.logDirectoryReady = false;
          reportInternalFailure("log_file_write_failed", err);
        }
      });
  }

  private async ensureLogDirectory(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  /**
   * Rotates `file` → `file.1` → … when appending `pendingBytes` would exceed
   * the size limit. At most {@link maxFileCount} files are kept.
   */
  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        return;
      }
      throw error;
    }
    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    if (this.maxFileCount === 1) {
      await rm(logFile, { force: true });
      return;
    }
    await rm(`${logFile}.${this.maxFileCount - 1}`, { force: true });
    for (let index = this.maxFileCount - 2; index >= 1; index -= 1) {
      await renameIfPresent(`${logFile}.${index}`, `${logFile}.${index + 1}`);
    }
    await renameIfPresent(logFile, `${logFile}.1`);
  }

  private redact(value: unknown): unknown {
    if (!this.redactionEnabled) {
      return value;
    }
    return this.deepRedact(value);
  }

  private deepRedact(value: unknown): unknown {
    if (typeof value === "string") {
      return this.scrub(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.deepRedact(item));
    }
    if (value instanceof Error) {
      return { name: value.name, message: this.scrub(value.message) };
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.deepRedact(entry);
      }
      return result;
    }
    return value;
  }

  private scrub(text: string): string {
    let sanitised = text;
    for (const pattern of this.redactSecrets) {
      if (typeof pattern === "string") {
        if (pattern.length > 0) {
          sanitised = sanitised.split(pattern).join(REDACTION_TOKEN);
        }
      } else {
        sanitised = sanitised.replace(pattern, REDACTION_TOKEN);
      }
    }
    return sanitised;
  }
}

async function renameIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (errorCode(error) !== "ENOENT") {
      throw error;
    }
  }
}

function errorCode(error: unknown): string | undefined {
  if (error && typeof error === "object" && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function reportInternalFailure(message: string, error: unknown): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level: "error",
    message,
    payload: { message: error instanceof Error ? error.message : String(error) },
  };
  process.stderr.write(`${JSON.stringify(entry)}\n`);
}
