import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const REDACTED = "[REDACTED]";

/** Payload keys whose values never reach a log line. Compared lowercase. */
const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  "authorization",
  "apikey",
  "api_key",
  "x-api-key",
  "token",
  "auth_token",
  "access_token",
  "refresh_token",
  "supabase_key",
  "service_role_key",
  "cookie",
  "set-cookie",
]);

/**
 * Returns a copy of `value` with sensitive keys masked and every occurrence of
 * the given secrets replaced in strings. Errors become `{ name, message }`.
 */
export function redactPayload(value: unknown, secrets: readonly string[], maskKeys = true): unknown {
  if (typeof value === "string") {
    return secrets.reduce((text, secret) => (secret ? text.split(secret).join(REDACTED) : text), value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactPayload(item, secrets, maskKeys));
  }
  if (value instanceof Error) {
    return { name: value.name, message: redactPayload(value.message, secrets, maskKeys) };
  }
  if (value !== null && typeof value === "object") {
    const copy: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      copy[key] = maskKeys && SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTED : redactPayload(entry, secrets, maskKeys);
    }
    return copy;
  }
  return value;
}

export interface LogFileMirrorOptions {
  /** Size at which the active file is rotated. */
  readonly maxBytes?: number;
  /** Files kept on disk, the active one included. */
  readonly maxFiles?: number;
}

/**
 * Appends lines to a file through a single promise chain so writes land in
 * call order. The file rotates to `<path>.1`, `<path>.2`... once full.
 */
export class LogFileMirror {
  private readonly maxBytes: number;
  private readonly maxFiles: number;
  private queue: Promise<void> = Promise.resolve();
  private directoryReady = false;

  constructor(
    readonly path: string,
    options: LogFileMirrorOptions = {},
  ) {
    this.maxBytes = options.maxBytes ?? 5 * 1024 * 1024;
    this.maxFiles = Math.max(1, options.maxFiles ?? 5);
  }

  append(line: string): void {
    this.queue = this.queue.then(() => this.write(line));
  }

  async drain(): Promise<void> {
    await this.queue;
  }

  private async write(line: string): Promise<void> {
    try {
      if (!this.directoryReady) {
        await mkdir(dirname(this.path), { recursive: true });
        this.directoryReady = true;
      }
      await this.rotateBefore(Buffer.byteLength(line, "utf8"));
      await appendFile(this.path, line, "utf8");
    } catch (error) {
      this.directoryReady = false;
      reportLoggerFailure("log_file_write_failed", error);
    }
  }

  private async rotateBefore(pendingBytes: number): Promise<void> {
    const size = await fileSize(this.path);
    if (size === null || size + pendingBytes <= this.maxBytes) {
      return;
    }
    if (this.maxFiles === 1) {
      await rm(this.path, { force: true });
      return;
    }
    await rm(`${this.path}.${this.maxFiles - 1}`, { force: true });
    for (let generation = this.maxFiles - 2; generation >= 1; generation -= 1) {
      await moveIfPresent(`${this.path}.${generation}`, `${this.path}.${generation + 1}`);
    }
    await moveIfPresent(this.path, `${this.path}.1`);
  }
}

export interface LoggerOptions {
  /** Mirror file; stdout only when absent. */
  readonly logFile?: string | null;
  readonly fileRotation?: LogFileMirrorOptions;
  /** Literal values scrubbed from every string of a payload. */
  readonly redactSecrets?: readonly string[];
  /** Masks the values of well-known credential keys. On by default. */
  readonly redactKeys?: boolean;
  readonly minLevel?: LogLevel;
  /** Sink of the JSON lines, stdout by default. */
  readonly write?: (line: string) => void;
  /** Receives a copy of every emitted entry. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/** JSON-lines logger with snake_case event names and structured payloads. */
export class StructuredLogger {
  private readonly mirror: LogFileMirror | null;
  private readonly secrets: readonly string[];
  private readonly redactKeys: boolean;
  private readonly minWeight: number;
  private readonly writeLine: (line: string) => void;
  private readonly onEntry: ((entry: LogEntry) => void) | null;

  constructor(options: LoggerOptions = {}) {
    this.mirror = options.logFile ? new LogFileMirror(options.logFile, options.fileRotation) : null;
    this.secrets = [...new Set(options.redactSecrets ?? [])].filter((secret) => secret.length > 0);
    this.redactKeys = options.redactKeys ?? true;
    this.minWeight = LEVEL_WEIGHT[options.minLevel ?? "debug"];
    this.writeLine = options.write ?? ((line) => void process.stdout.write(line));
    this.onEntry = options.onEntry ?? null;
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

  /** Resolves once every queued file write has landed. */
  async flush(): Promise<void> {
    await this.mirror?.drain();
  }

  private log(level: LogLevel, message: string, payload: unknown): void {
    if (LEVEL_WEIGHT[level] < this.minWeight) {
      return;
    }
    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
    if (payload !== undefined) {
      entry.payload = redactPayload(payload, this.secrets, this.redactKeys);
    }
    const line = `${JSON.stringify(entry)}\n`;
    this.writeLine(line);
    this.mirror?.append(line);
    this.onEntry?.(structuredClone(entry));
  }
}

async function fileSize(path: string): Promise<number | null> {
  try {
    return (await stat(path)).size;
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }
}

async function moveIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (!isMissingFile(error)) {
      throw error;
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** The logger cannot log its own failures; they go to stderr. */
function reportLoggerFailure(message: string, error: unknown): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level: "error",
    message,
    payload: { message: error instanceof Error ? error.message : String(error) },
  };
  process.stderr.write(`${JSON.stringify(entry)}\n`);
}
