import type { ZodError } from "zod/v4";

export type IoOperation = "open" | "read" | "write" | "remove";

/**
 * Fatal file-system failure. Carries the path and operation so the CLI can
 * report it without a stack trace.
 */
export class LogIoError extends Error {
  readonly operation: IoOperation;
  readonly path: string;

  constructor(operation: IoOperation, path: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : cause ? String(cause) : "unknown error";
    super(`Failed to ${operation} ${path}: ${reason}`, { cause });
    this.name = "LogIoError";
    this.operation = operation;
    this.path = path;
  }
}

/** Invalid command-line or programmatic options. */
export class OptionsError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid options: ${issues.join("; ")}`);
    this.name = "OptionsError";
    this.issues = issues;
  }

  static fromZod(error: ZodError): OptionsError {
    return new OptionsError(
      error.issues.map((issue) => {
        const field = issue.path.map(String).join(".");
        return field ? `${field}: ${issue.message}` : issue.message;
      })
    );
  }
}
