// CHANGE: Introduce typed error classes for configuration, resolution, transport and cancellation failures.
// WHY: The orchestrator decides between warning, fatal and cancel by error class instead of message text.
// SOURCE: internal reasoning

/**
 * Failure category reported by the GitHub transport.
 */
export type ApiErrorKind = "not_found" | "forbidden" | "rate_limited" | "server" | "network" | "invalid";

/**
 * Invalid user configuration, raised before any network activity.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Malformed glob pattern.
 */
export class PatternError extends Error {
  constructor(
    readonly pattern: string,
    reason: string
  ) {
    super(`invalid pattern "${pattern}": ${reason}`);
    this.name = "PatternError";
  }
}

/**
 * Repository selector that is neither `owner`, `owner/repo` nor `owner/repo@ref`.
 */
export class InvalidRepositorySpecError extends Error {
  constructor(readonly spec: string) {
    super(`invalid repo spec: ${spec} (expected owner, owner/repo or owner/repo@ref)`);
    this.name = "InvalidRepositorySpecError";
  }
}

export class EmptyRepositoryError extends Error {
  constructor(readonly fullName: string) {
    super("repository is empty (no commits yet)");
    this.name = "EmptyRepositoryError";
  }
}

/**
 * Failed REST or GraphQL request.
 *
 * @property kind - Failure category.
 * @property status - HTTP status when a response was received.
 */
export class GitHubApiError extends Error {
  constructor(
    readonly kind: ApiErrorKind,
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = "GitHubApiError";
  }
}

/**
 * Run stopped by the caller's abort signal.
 */
export class CanceledError extends Error {
  constructor(message = "operation canceled") {
    super(message);
    this.name = "CanceledError";
  }
}

/**
 * Every scheduled repository failed.
 */
export class SearchFailedError extends Error {
  constructor(readonly total: number) {
    super(`failed to search all ${total} repositories`);
    this.name = "SearchFailedError";
  }
}

/**
 * Throw `CanceledError` when the signal has fired.
 */
export function throwIfCanceled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CanceledError();
  }
}

/**
 * Render any thrown value as a message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
