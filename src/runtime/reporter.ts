import { type ILogger, silentLogger } from "../utils/logger.js";
import { ErrorReportingFailedError } from "../utils/errors.js";
import { ErrorReport } from "../schemas/events.js";
import type { IInvocationTransport } from "./transport.js";

export interface IErrorReporter {
  report(requestId: string, failure: unknown): Promise<void>;
}

export class ErrorReporter implements IErrorReporter {
  constructor(
    private readonly transport: Pick<IInvocationTransport, "reportError">,
    private readonly logger: ILogger = silentLogger,
  ) {}

  /**
   * Sends the failure upstream as an error report. Rejects with
   * `ErrorReportingFailedError` when the control plane can't be told.
   */
  public async report(requestId: string, failure: unknown): Promise<void> {
    const errorReport = formatErrorReport(failure);
    this.logger.error(
      `Invocation ${requestId} failed with ${errorReport.errorType}: ${errorReport.errorMessage}`,
    );

    const body = new TextEncoder().encode(JSON.stringify(errorReport));
    try {
      await this.transport.reportError(requestId, body);
    } catch (error: unknown) {
      throw new ErrorReportingFailedError(requestId, { cause: error });
    }
  }
}

const FALLBACK_REPORT: ErrorReport = {
  errorMessage: "",
  errorType: "UnknownError",
  stackTrace: "UnknownError",
};

/**
 * Never throws: whatever was thrown, the result has three string fields.
 * Values that can't even be turned into text give `FALLBACK_REPORT`.
 */
export function formatErrorReport(failure: unknown): ErrorReport {
  let candidate: ErrorReport;
  try {
    candidate = buildErrorReport(failure);
  } catch {
    return FALLBACK_REPORT;
  }

  const checked = ErrorReport.safeParse(candidate);
  return checked.success ? checked.data : FALLBACK_REPORT;
}

function buildErrorReport(failure: unknown): ErrorReport {
  if (failure instanceof Error) {
    return {
      errorMessage: textOf(failure.message),
      errorType: errorTypeOf(failure),
      stackTrace: formatStackTrace(failure),
    };
  }

  const errorMessage = messageOf(failure);
  return {
    errorMessage,
    errorType: "UnknownError",
    stackTrace: errorMessage ? `UnknownError: ${errorMessage}` : "UnknownError",
  };
}

/// Thrown errors can carry anything in `message`, `name` and `stack`.
function textOf(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  return value === undefined || value === null ? "" : String(value);
}

function errorTypeOf(error: Error): string {
  const name = textOf(error.name);
  if (name && name !== "Error") {
    return name;
  }
  return error.constructor.name || "Error";
}

function messageOf(failure: unknown): string {
  if (
    typeof failure === "object" &&
    failure !== null &&
    "message" in failure
  ) {
    return textOf(failure.message);
  }
  return textOf(failure);
}

/// The error's own stack followed by each cause, one "Caused by:" per level.
export function formatStackTrace(error: Error): string {
  const sections: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && !seen.has(current)) {
    seen.add(current);
    const section =
      current instanceof Error
        ? stackOf(current)
        : String(current);
    sections.push(sections.length === 0 ? section : `Caused by: ${section}`);
    current = current instanceof Error ? current.cause : undefined;
  }

  return sections.join("\n");
}

function stackOf(error: Error): string {
  const stack = textOf(error.stack);
  if (stack) {
    return stack;
  }
  const message = textOf(error.message);
  return message ? `${errorTypeOf(error)}: ${message}` : errorTypeOf(error);
}
