export type ErrorKind = "connectivity" | "execution" | "completion" | "configuration";

export class AnalyzerError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AnalyzerError";
    this.kind = kind;
  }
}

/** The completion service was unreachable or answered with a non-success status. */
export class CompletionError extends AnalyzerError {
  constructor(cause: unknown) {
    super("completion", `Failed to connect to Ollama: ${errorMessage(cause)}`, { cause });
    this.name = "CompletionError";
  }
}

/** The database rejected a statement. The message is the driver's own. */
export class QueryExecutionError extends AnalyzerError {
  constructor(cause: unknown) {
    super("execution", errorMessage(cause), { cause });
    this.name = "QueryExecutionError";
  }
}

export class UnsupportedDescriptorError extends AnalyzerError {
  constructor() {
    super(
      "configuration",
      "Unsupported connection string. Use a postgres://, mssql://, sqlserver://, clickhouse:// or http(s):// URL, or a Server=...;Database=... string",
    );
    this.name = "UnsupportedDescriptorError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
