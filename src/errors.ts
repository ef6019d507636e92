/**
 * Errors raised while reading, configuring or processing a table.
 *
 * Each carries a stable `code` so callers can branch without matching on
 * message text. The CLI prints `message` and exits with status 1.
 *
 * @module
 */
import type { ZodError } from "zod";

export type ColshapeErrorCode =
  | "INVALID_FILTER_PATTERN"
  | "INVALID_COLUMN_SPEC"
  | "INVALID_OPTION"
  | "INPUT_ERROR";

export class ColshapeError extends Error {
  readonly code: ColshapeErrorCode;

  constructor(code: ColshapeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ColshapeError";
    this.code = code;
  }
}

/** Thrown when `--filter` is not a valid regular expression. */
export class FilterPatternError extends ColshapeError {
  readonly pattern: string;

  constructor(pattern: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("INVALID_FILTER_PATTERN", `Invalid filter regex '${pattern}': ${reason}`, { cause });
    this.name = "FilterPatternError";
    this.pattern = pattern;
  }
}

/** Thrown for a column spec that is not `N` or `N:M` with 1-based N, M. */
export class ColumnSpecError extends ColshapeError {
  readonly spec: string;

  constructor(spec: string, reason: string) {
    super("INVALID_COLUMN_SPEC", `Invalid column spec '${spec}': ${reason}`);
    this.name = "ColumnSpecError";
    this.spec = spec;
  }
}

/**
 * Wraps a ZodError from option validation, one line per failing option:
 *
 * ```
 * Invalid options:
 *   • 'padding': Expected number, received nan
 * ```
 */
export class ConfigError extends ColshapeError {
  constructor(zodError: ZodError) {
    const fieldErrors = zodError.issues
      .map((issue) => {
        const path = issue.path.length > 0 ? `'${issue.path.join(".")}'` : "(root)";
        return `  • ${path}: ${issue.message}`;
      })
      .join("\n");

    super("INVALID_OPTION", `Invalid options:\n${fieldErrors}`, { cause: zodError });
    this.name = "ConfigError";
  }
}

export class InputError extends ColshapeError {
  readonly source: string;

  constructor(source: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("INPUT_ERROR", `Cannot read ${source}: ${reason}`, { cause });
    this.name = "InputError";
    this.source = source;
  }
}
