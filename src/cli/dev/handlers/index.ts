import { IncomingMessage, ServerResponse } from "node:http";
import { z } from "zod";
import chalk from "chalk";

import { type IInvocationBridge } from "../bridge.js";
import {
  InvalidJsonBodyError,
  PayloadTooLargeError,
  requestParser,
} from "./request-parser.js";
import { responseBuilder } from "./response-builder.js";
import { ErrorReport } from "../../../schemas/events.js";

/**
 * Dependencies required by the request handlers
 */
export interface RequestHandlerDependencies {
  bridge: IInvocationBridge;
}

/**
 * Interface for request handlers
 */
export interface IRequestHandlers {
  /**
   * Handle GET /2018-06-01/runtime/invocation/next
   * Called by the runtime to get the next invocation. The connection is held
   * until an invocation arrives.
   */
  handleInvocationNext(req: IncomingMessage, res: ServerResponse): Promise<void>;

  /**
   * Handle POST /v1/functions/:name/invoke
   * Called by external clients to invoke a function.
   */
  handleFunctionInvoke(
    req: IncomingMessage,
    res: ServerResponse,
    functionName: string,
  ): Promise<void>;

  /**
   * Handle POST /2018-06-01/runtime/invocation/:requestId/response
   */
  handleInvocationResponse(
    req: IncomingMessage,
    res: ServerResponse,
    requestId: string,
  ): Promise<void>;

  /**
   * Handle POST /2018-06-01/runtime/invocation/:requestId/error
   */
  handleInvocationError(
    req: IncomingMessage,
    res: ServerResponse,
    requestId: string,
  ): Promise<void>;
}

/**
 * Implementation of request handlers for the dev server
 */
export class DevServerHandlers implements IRequestHandlers {
  private readonly bridge: IInvocationBridge;

  constructor(deps: RequestHandlerDependencies) {
    this.bridge = deps.bridge;
  }

  public async handleInvocationNext(
    _req: IncomingMessage,
    res: ServerResponse,
  ): Promise<void> {
    // Completed later, when an invocation arrives through the bridge
    this.bridge.holdNextConnection(res);
  }

  public async handleFunctionInvoke(
    req: IncomingMessage,
    res: ServerResponse,
    functionName: string,
  ): Promise<void> {
    try {
      const body = await requestParser.readBody(req);
      const contentType = req.headers["content-type"] || "application/json";

      const success = this.bridge.triggerInvocation(
        { functionName, body, contentType },
        res,
      );

      if (!success) {
        responseBuilder.sendRuntimeUnavailable(
          res,
          this.bridge.hasActiveInvocation()
            ? "Another invocation is in progress"
            : "No runtime connected",
        );
      }

      // Otherwise the response is completed when the runtime reports back
    } catch (error: unknown) {
      if (error instanceof PayloadTooLargeError) {
        responseBuilder.sendPayloadTooLarge(res, error.limitBytes);
        return;
      }
      console.error(chalk.red("Error handling invoke:"), error);
      responseBuilder.sendInternalError(res);
    }
  }

  public async handleInvocationResponse(
    req: IncomingMessage,
    res: ServerResponse,
    requestId: string,
  ): Promise<void> {
    try {
      const body = await requestParser.readBody(req);

      if (!this.bridge.completeWithSuccess(requestId, body)) {
        responseBuilder.sendInvalidRequestId(res, requestId);
        return;
      }

      responseBuilder.sendAccepted(res);
    } catch (error: unknown) {
      console.error(chalk.red("Error handling response:"), error);
      responseBuilder.sendInternalError(res);
    }
  }

  public async handleInvocationError(
    req: IncomingMessage,
    res: ServerResponse,
    requestId: string,
  ): Promise<void> {
    try {
      const validatedError = await requestParser.parseAndValidate(
        req,
        ErrorReport,
      );

      if (!this.bridge.completeWithError(requestId, validatedError)) {
        responseBuilder.sendInvalidRequestId(res, requestId);
        return;
      }

      responseBuilder.sendAccepted(res);
    } catch (error: unknown) {
      if (error instanceof z.ZodError) {
        responseBuilder.sendInvalidErrorReport(res, error.issues);
      } else if (error instanceof InvalidJsonBodyError) {
        responseBuilder.sendInvalidErrorReport(res, error.message);
      } else if (error instanceof PayloadTooLargeError) {
        responseBuilder.sendPayloadTooLarge(res, error.limitBytes);
      } else {
        console.error(chalk.red("Error handling error report:"), error);
        responseBuilder.sendInternalError(res);
      }
    }
  }
}
