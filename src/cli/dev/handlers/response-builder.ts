import type { ServerResponse } from "node:http";

/**
 * Error body the runtime API answers with (its `ErrorResponse` model).
 */
export interface RuntimeApiError {
  errorType: string;
  errorMessage: string;
  details?: unknown;
}

export interface IResponseBuilder {
  sendJson(res: ServerResponse, statusCode: number, data: unknown): void;

  sendError(
    res: ServerResponse,
    statusCode: number,
    errorType: string,
    errorMessage: string,
    details?: unknown,
  ): void;

  /// 202, how the runtime API acknowledges a result or an error report.
  sendAccepted(res: ServerResponse): void;

  sendInvalidRequestId(res: ServerResponse, requestId: string): void;

  sendInvalidErrorReport(res: ServerResponse, details: unknown): void;

  sendPayloadTooLarge(res: ServerResponse, limitBytes: number): void;

  sendRouteNotFound(res: ServerResponse, method: string, path: string): void;

  sendRuntimeUnavailable(res: ServerResponse, reason: string): void;

  sendInternalError(res: ServerResponse): void;
}

function sendJson(res: ServerResponse, statusCode: number, data: unknown): void {
  res.writeHead(statusCode, { "Content-Type": "application/json" });
  res.end(JSON.stringify(data));
}

function sendError(
  res: ServerResponse,
  statusCode: number,
  errorType: string,
  errorMessage: string,
  details?: unknown,
): void {
  const body: RuntimeApiError = { errorType, errorMessage };
  if (details !== undefined) {
    body.details = details;
  }
  sendJson(res, statusCode, body);
}

export const responseBuilder: IResponseBuilder = {
  sendJson,
  sendError,

  sendAccepted(res) {
    sendJson(res, 202, { status: "OK" });
  },

  sendInvalidRequestId(res, requestId) {
    sendError(
      res,
      400,
      "InvalidRequestID",
      `No invocation in progress with request id ${requestId}`,
    );
  },

  sendInvalidErrorReport(res, details) {
    sendError(
      res,
      400,
      "InvalidErrorReport",
      "Error report must have errorMessage, errorType and stackTrace",
      details,
    );
  },

  sendPayloadTooLarge(res, limitBytes) {
    sendError(
      res,
      413,
      "RequestEntityTooLarge",
      `Request body exceeds ${limitBytes} bytes`,
    );
  },

  sendRouteNotFound(res, method, path) {
    sendError(res, 404, "RouteNotFound", `No route for ${method} ${path}`);
  },

  sendRuntimeUnavailable(res, reason) {
    sendError(res, 503, "RuntimeUnavailable", reason);
  },

  sendInternalError(res) {
    sendError(res, 500, "InternalServerError", "Internal server error");
  },
};
