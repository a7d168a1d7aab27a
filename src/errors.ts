/**
 * Error types and exit codes for the ecs-mgr CLI.
 *
 * Every failure the dispatcher can report maps onto one of these classes so
 * the entry point only has to read `exitCode` and print.
 */

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_FAILURE = 1;
export const EXIT_INVALID_OPERATION = 99;

export type ExitCode = typeof EXIT_OK | typeof EXIT_USAGE | typeof EXIT_INVALID_OPERATION;

/**
 * Bad or missing arguments. The dispatcher prints the usage text after the
 * diagnostic.
 */
export class UsageError extends Error {
  readonly exitCode: ExitCode;

  constructor(message: string, options: { exitCode?: ExitCode } = {}) {
    super(message);
    this.name = "UsageError";
    this.exitCode = options.exitCode ?? EXIT_USAGE;
  }
}

export class MissingDependencyError extends Error {
  readonly exitCode = EXIT_FAILURE;

  constructor(public readonly dependency: string, cause?: unknown) {
    super(`Module not found and required: ${dependency}`, { cause });
    this.name = "MissingDependencyError";
  }
}

/**
 * A control-plane call was rejected. Carries the API operation name and the
 * SDK's error name so the caller can print both.
 */
export class TransportError extends Error {
  readonly exitCode = EXIT_FAILURE;
  readonly code: string | undefined;
  readonly statusCode: number | undefined;

  constructor(public readonly operation: string, cause: unknown) {
    super(`${operation} failed: ${formatErrorMessage(cause)}`, { cause });
    this.name = "TransportError";
    this.code = extractErrorCode(cause);
    this.statusCode = extractStatusCode(cause);
  }

  /** One-line description used for `[ERROR]` output. */
  describe(): string {
    const parts: string[] = [];
    if (this.code) parts.push(`[${this.code}]`);
    if (this.statusCode) parts.push(`(HTTP ${this.statusCode})`);
    parts.push(formatErrorMessage(this.cause));
    return `${this.operation} failed: ${parts.join(" ")}`;
  }
}

/**
 * Extract an error code from an SDK exception. AWS SDK v3 exceptions carry the
 * service error code in `name`; older shapes use `code`.
 */
export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object") return undefined;
  const code = (err as { code?: unknown }).code;
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  const name = (err as { name?: unknown }).name;
  if (typeof name === "string" && name !== "Error") return name;
  return undefined;
}

export function extractStatusCode(err: unknown): number | undefined {
  if (!err || typeof err !== "object") return undefined;
  const metadata = (err as { $metadata?: unknown }).$metadata;
  if (!metadata || typeof metadata !== "object") return undefined;
  const status = (metadata as { httpStatusCode?: unknown }).httpStatusCode;
  return typeof status === "number" ? status : undefined;
}

/**
 * Format error message from any error type
 */
export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || "Error";
  }
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  try {
    return JSON.stringify(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}
