import { type ILogger, silentLogger } from "../utils/logger.js";
import {
  GetNextInvocationError,
  PostErrorError,
  PostResultError,
  isSocketError,
  type FatalRuntimeFailure,
} from "../utils/errors.js";
import type { InvocationEvent } from "../types/runtime.js";
import { buildUserAgent, type RuntimeEndpoint } from "./endpoint.js";

export const DEFAULT_CONTENT_TYPE = "application/json";

export const REQUEST_ID_HEADER = "Lambda-Runtime-Aws-Request-Id";
export const TRACE_ID_HEADER = "Lambda-Runtime-Trace-Id";

export type FetchFn = typeof fetch;

/// The part of the loop state the transport may touch.
export interface LoopControl {
  stop(failure?: FatalRuntimeFailure): void;
}

export interface IInvocationTransport {
  poll(signal?: AbortSignal): Promise<InvocationEvent | null>;
  respond(requestId: string, body: Uint8Array): Promise<void>;
  reportError(requestId: string, body: Uint8Array): Promise<void>;
}

export interface InvocationTransportOptions {
  endpoint: RuntimeEndpoint;
  loopControl: LoopControl;
  fetch?: FetchFn;
  userAgent?: string;
  logger?: ILogger;
}

/**
 * Speaks the three calls of the runtime control protocol. Only `poll` decides
 * whether a failure is fatal to the loop.
 */
export class InvocationTransport implements IInvocationTransport {
  private readonly endpoint: RuntimeEndpoint;
  private readonly loopControl: LoopControl;
  private readonly fetchFn: FetchFn;
  private readonly userAgent: string;
  private readonly logger: ILogger;

  constructor(options: InvocationTransportOptions) {
    this.endpoint = options.endpoint;
    this.loopControl = options.loopControl;
    this.fetchFn = options.fetch ?? fetch;
    this.userAgent = options.userAgent ?? buildUserAgent();
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Long-polls for the next event. Resolves to `null` when there is nothing
   * to process this round. A socket-level failure also stops the loop.
   */
  public async poll(signal?: AbortSignal): Promise<InvocationEvent | null> {
    try {
      const response = await this.fetchFn(this.endpoint.nextUrl, {
        method: "GET",
        headers: { "User-Agent": this.userAgent },
        signal,
      });

      if (!response.ok) {
        throw new GetNextInvocationError(
          `Next invocation failed: ${response.status} ${response.statusText}`,
        );
      }

      const requestId = response.headers.get(REQUEST_ID_HEADER);
      if (!requestId) {
        throw new GetNextInvocationError(
          `Next invocation response has no ${REQUEST_ID_HEADER} header`,
        );
      }

      const body = new Uint8Array(await response.arrayBuffer());
      const event: InvocationEvent = {
        requestId,
        traceId: response.headers.get(TRACE_ID_HEADER) || undefined,
        contentType: response.headers.get("Content-Type") || DEFAULT_CONTENT_TYPE,
        body,
        headers: response.headers,
      };

      this.logger.debug(
        `New event received: ${requestId} (${event.contentType}, ${body.byteLength} bytes)`,
        Object.fromEntries(response.headers),
      );
      return event;
    } catch (error: unknown) {
      if (isSocketError(error)) {
        this.logger.error(
          "Lost connection to the runtime API, stopping event loop",
          error,
        );
        this.loopControl.stop({ scope: "transport", cause: error });
        return null;
      }

      if (signal?.aborted) {
        this.logger.debug("Poll for next invocation cancelled");
        return null;
      }

      this.logger.warn("Failed to poll for next invocation, will retry", error);
      return null;
    }
  }

  /**
   * Posts the encoded result. A rejected status is only logged; failing to
   * reach the runtime API rejects with `PostResultError`.
   */
  public async respond(requestId: string, body: Uint8Array): Promise<void> {
    let response: Response;
    let reply: string;
    try {
      response = await this.fetchFn(this.endpoint.responseUrl(requestId), {
        method: "POST",
        headers: { "User-Agent": this.userAgent },
        body,
      });
      reply = await response.text();
    } catch (error: unknown) {
      throw new PostResultError(`Failed to post result for ${requestId}`, {
        cause: error,
      });
    }

    if (response.ok) {
      this.logger.info(
        `Result POST status for ${requestId}: ${response.status} ${response.statusText}`,
      );
    } else {
      this.logger.warn(
        `Result POST for ${requestId} was not accepted: ${response.status} ${response.statusText}`,
        reply,
      );
    }
  }

  public async reportError(requestId: string, body: Uint8Array): Promise<void> {
    let response: Response;
    try {
      response = await this.fetchFn(this.endpoint.errorUrl(requestId), {
        method: "POST",
        headers: {
          "User-Agent": this.userAgent,
          "Content-Type": "application/json",
        },
        body,
      });
    } catch (error: unknown) {
      throw new PostErrorError(`Failed to post error for ${requestId}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new PostErrorError(
        `Failed to post error for ${requestId}: ${response.status} ${response.statusText}`,
      );
    }

    this.logger.info(
      `Result ERROR status for ${requestId}: ${response.status} ${response.statusText}`,
    );
  }
}
