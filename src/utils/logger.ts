export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

type LogFields = Record<string, unknown>;

const REDACTED = "[redacted]";
const SECRET_KEYS = new Set(["connectionstring", "password", "pwd", "token", "authorization"]);

// Driver errors can echo the descriptor back: "Password=...;" pairs and "user:pass@" URL credentials
const ADO_SECRET = /\b(password|pwd)\s*=\s*[^;]*/gi;
const URL_CREDENTIALS = /(\/\/[^:/@\s]+):[^@\s]*@/g;

export function scrubSecrets(text: string): string {
  return text.replace(ADO_SECRET, `$1=${REDACTED}`).replace(URL_CREDENTIALS, `$1:${REDACTED}@`);
}

function redactValue(value: unknown): unknown {
  if (typeof value === "string") return scrubSecrets(value);
  if (Array.isArray(value)) return value.map(redactValue);
  if (value !== null && typeof value === "object" && !(value instanceof Date)) {
    return redact(Object.fromEntries(Object.entries(value)));
  }
  return value;
}

/** Copy of `fields` with secret-named keys masked and credentials scrubbed from nested strings. */
export function redact(fields: LogFields): LogFields {
  const result: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    result[key] = SECRET_KEYS.has(key.toLowerCase()) ? REDACTED : redactValue(value);
  }
  return result;
}

export class Logger {
  readonly level: LogLevel;
  private readonly bound: LogFields;

  constructor(level: LogLevel = "info", bound: LogFields = {}) {
    this.level = level;
    this.bound = redact(bound);
  }

  /** Logger at the same level whose entries also carry `fields`. */
  child(fields: LogFields): Logger {
    return new Logger(this.level, { ...this.bound, ...fields });
  }

  debug(message: string, fields?: LogFields) {
    this.write("debug", message, fields);
  }

  info(message: string, fields?: LogFields) {
    this.write("info", message, fields);
  }

  warn(message: string, fields?: LogFields) {
    this.write("warn", message, fields);
  }

  error(message: string, fields?: LogFields) {
    this.write("error", message, fields);
  }

  private write(level: LogLevel, message: string, fields?: LogFields) {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;

    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message: scrubSecrets(message),
      ...this.bound,
      ...(fields ? redact(fields) : {}),
    });
    // stdout carries the MCP stdio protocol
    process.stderr.write(`${line}\n`);
  }
}

let processLogger = new Logger("info");

export function initLogger(level: LogLevel): Logger {
  processLogger = new Logger(level);
  return processLogger;
}

export function getLogger(): Logger {
  return processLogger;
}
