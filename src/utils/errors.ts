export class GetNextInvocationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "GetNextInvocationError";
  }
}

export class PostResultError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PostResultError";
  }
}

export class PostErrorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PostErrorError";
  }
}

/**
 * Raised when none of the handler identifiers yields a function. The message
 * lists every attempt and every name the registry knows about.
 */
export class FunctionResolutionError extends Error {
  readonly attempts: readonly ResolutionAttempt[];
  readonly availableFunctions: readonly string[];

  constructor(
    attempts: readonly ResolutionAttempt[],
    availableFunctions: readonly string[],
  ) {
    const tried = attempts
      .map(({ source, identifier }) => `${source}=${identifier ?? "<unset>"}`)
      .join(", ");
    const available = availableFunctions.length
      ? availableFunctions.join(", ")
      : "<none>";

    super(
      `Failed to locate function. Tried [${tried}]. Functions available in registry: [${available}]`,
    );
    this.name = "FunctionResolutionError";
    this.attempts = attempts;
    this.availableFunctions = availableFunctions;
  }
}

export class ErrorReportingFailedError extends Error {
  readonly requestId: string;

  constructor(requestId: string, options?: ErrorOptions) {
    super(`Failed to report error for request ${requestId}`, options);
    this.name = "ErrorReportingFailedError";
    this.requestId = requestId;
  }
}

export type ResolutionSource =
  | "DEFAULT_HANDLER"
  | "_HANDLER"
  | "default"
  | "function.definition"
  | "function.definition header";

export interface ResolutionAttempt {
  source: ResolutionSource;
  identifier: string | undefined;
}

/// Failures scoped to a single invocation are reported upstream and the loop
/// carries on. The other two scopes end the loop.
export type RuntimeFailure =
  | { scope: "invocation"; requestId: string; cause: unknown }
  | { scope: "transport"; cause: unknown }
  | { scope: "reporting"; requestId: string; cause: unknown };

export type FatalRuntimeFailure = Exclude<
  RuntimeFailure,
  { scope: "invocation" }
>;

const SOCKET_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "EPIPE",
  "ENOTCONN",
  "UND_ERR_SOCKET",
  "UND_ERR_CLOSED",
]);

/**
 * Walks the `cause` chain looking for a socket-level error code. `fetch`
 * wraps these in a `TypeError("fetch failed")`.
 */
export function isSocketError(error: unknown): boolean {
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (typeof current === "object" && current !== null && !seen.has(current)) {
    seen.add(current);
    if (
      "code" in current &&
      typeof current.code === "string" &&
      SOCKET_ERROR_CODES.has(current.code)
    ) {
      return true;
    }
    current = "cause" in current ? current.cause : undefined;
  }

  return false;
}
