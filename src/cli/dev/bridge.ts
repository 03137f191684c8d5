import { ServerResponse } from "node:http";
import { randomBytes, randomUUID } from "node:crypto";
import chalk from "chalk";

import type { ErrorReport } from "../../schemas/events.js";

interface HeldConnection {
  response: ServerResponse;
  timestamp: number;
}

export interface InvocationRequest {
  functionName: string;
  body: Buffer;
  contentType: string;
}

export interface IInvocationBridge {
  holdNextConnection(response: ServerResponse): void;
  triggerInvocation(
    request: InvocationRequest,
    invokeResponse: ServerResponse,
  ): boolean;
  completeWithSuccess(requestId: string, body: Buffer): boolean;
  completeWithError(requestId: string, error: ErrorReport): boolean;
  isReady(): boolean;
  hasActiveInvocation(): boolean;
  getCurrentRequestId(): string | null;
  isRuntimeConnected(): boolean;
}

/// X-Ray style trace header: Root=1-<epoch seconds hex>-<96 bit id>
export function generateTraceId(now: number = Date.now()): string {
  const epoch = Math.floor(now / 1000).toString(16).padStart(8, "0");
  return `Root=1-${epoch}-${randomBytes(12).toString("hex")};Sampled=0`;
}

/**
 * Manages the lifecycle of invocations, bridging between external invoke requests
 * and the runtime's long poll on `/invocation/next`.
 */
export class InvocationBridge implements IInvocationBridge {
  private nextConnection: HeldConnection | null = null;
  private invokeConnection: HeldConnection | null = null;
  private currentRequestId: string | null = null;
  private currentFunctionName: string | null = null;
  private verbose: boolean;
  private runtimeConnectedOnce: boolean = false;

  constructor(verbose: boolean = false) {
    this.verbose = verbose;
  }

  /**
   * Hold a connection from the runtime waiting for the next invocation.
   * This corresponds to the runtime calling GET /invocation/next.
   */
  public holdNextConnection(response: ServerResponse): void {
    if (this.nextConnection) {
      // If there's already a held connection, close the old one
      this.nextConnection.response.writeHead(503, {
        "Content-Type": "application/json",
      });
      this.nextConnection.response.end(
        JSON.stringify({ error: "Another runtime connected" }),
      );
    }

    // The runtime only polls again once it has finished, so a poll during an
    // invocation means it restarted or crashed without answering
    if (this.invokeConnection) {
      this.abandonInvocation(
        `Runtime polled for the next invocation before completing ${this.currentRequestId}`,
      );
    }

    const held: HeldConnection = { response, timestamp: Date.now() };
    this.nextConnection = held;
    this.runtimeConnectedOnce = true;

    // The runtime gave up on this poll (stopped or restarted)
    response.on("close", () => {
      if (this.nextConnection === held) {
        this.nextConnection = null;
      }
    });

    if (this.verbose) {
      console.log(chalk.cyan("🔌 Runtime connected, ready for invocations"));
    }
  }

  /**
   * Complete the held /next connection with the invocation and hold the
   * invoke connection until the runtime answers.
   */
  public triggerInvocation(
    request: InvocationRequest,
    invokeResponse: ServerResponse,
  ): boolean {
    if (!this.nextConnection) {
      if (this.verbose) {
        console.log(chalk.yellow("⚠️  No runtime connected to handle invocation"));
      }
      return false;
    }

    if (this.invokeConnection) {
      if (this.verbose) {
        console.log(chalk.yellow("⚠️  Another invocation is already in progress"));
      }
      return false;
    }

    const requestId = randomUUID();
    this.currentRequestId = requestId;
    this.currentFunctionName = request.functionName;
    const invokeConnection: HeldConnection = {
      response: invokeResponse,
      timestamp: Date.now(),
    };
    this.invokeConnection = invokeConnection;

    // The caller gave up; a late result for this request id is rejected
    invokeResponse.on("close", () => {
      if (this.invokeConnection === invokeConnection) {
        console.log(
          chalk.yellow(`⚠️  Client disconnected before ${requestId} completed`),
        );
        this.invokeConnection = null;
        this.clearCurrent();
      }
    });

    this.nextConnection.response.writeHead(200, {
      "Content-Type": request.contentType,
      "Lambda-Runtime-Aws-Request-Id": requestId,
      "Lambda-Runtime-Trace-Id": generateTraceId(),
      "Lambda-Runtime-Deadline-Ms": String(Date.now() + 300000), // 5 minutes from now
      "Lambda-Runtime-Invoked-Function-Arn": `arn:aws:lambda:us-east-1:000000000000:function:${request.functionName}`,
      "function.definition": request.functionName,
    });
    this.nextConnection.response.end(request.body);
    this.nextConnection = null;

    console.log(
      chalk.blue(
        `🚀 Invoking function '${request.functionName}' (request-id: ${requestId})`,
      ),
    );

    return true;
  }

  public completeWithSuccess(requestId: string, body: Buffer): boolean {
    const invokeConnection = this.takeInvokeConnection(requestId);
    if (!invokeConnection) {
      return false;
    }

    invokeConnection.response.writeHead(200, {
      "Content-Type": "application/json",
    });
    invokeConnection.response.end(body);

    console.log(
      chalk.green(`✓ Function '${this.currentFunctionName}' completed successfully`),
    );
    this.clearCurrent();

    return true;
  }

  public completeWithError(requestId: string, error: ErrorReport): boolean {
    const invokeConnection = this.takeInvokeConnection(requestId);
    if (!invokeConnection) {
      return false;
    }

    invokeConnection.response.writeHead(500, {
      "Content-Type": "application/json",
    });
    invokeConnection.response.end(
      JSON.stringify({
        error: {
          message: error.errorMessage,
          type: error.errorType,
          stackTrace: error.stackTrace,
        },
      }),
    );

    console.log(
      chalk.red(
        `✗ Function '${this.currentFunctionName}' failed: ${error.errorType} ${error.errorMessage}`,
      ),
    );
    this.clearCurrent();

    return true;
  }

  public isReady(): boolean {
    return this.nextConnection !== null && this.invokeConnection === null;
  }

  public hasActiveInvocation(): boolean {
    return this.invokeConnection !== null;
  }

  public getCurrentRequestId(): string | null {
    return this.currentRequestId;
  }

  public isRuntimeConnected(): boolean {
    return this.runtimeConnectedOnce && this.nextConnection !== null;
  }

  private abandonInvocation(reason: string): void {
    const invokeConnection = this.invokeConnection;
    if (!invokeConnection) {
      return;
    }
    this.invokeConnection = null;

    invokeConnection.response.writeHead(502, {
      "Content-Type": "application/json",
    });
    invokeConnection.response.end(
      JSON.stringify({
        error: { message: reason, type: "RuntimeRestarted", stackTrace: "" },
      }),
    );

    console.log(
      chalk.red(`✗ Function '${this.currentFunctionName}' abandoned: ${reason}`),
    );
    this.clearCurrent();
  }

  private takeInvokeConnection(requestId: string): HeldConnection | null {
    if (requestId !== this.currentRequestId) {
      if (this.verbose) {
        console.log(
          chalk.yellow(
            `⚠️  Request ID mismatch: expected ${this.currentRequestId}, got ${requestId}`,
          ),
        );
      }
      return null;
    }

    if (!this.invokeConnection) {
      if (this.verbose) {
        console.log(chalk.yellow("⚠️  No active invocation to complete"));
      }
      return null;
    }

    const invokeConnection = this.invokeConnection;
    this.invokeConnection = null;
    return invokeConnection;
  }

  private clearCurrent(): void {
    this.currentRequestId = null;
    this.currentFunctionName = null;
  }
}
