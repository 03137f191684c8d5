import { setTimeout as sleep } from "node:timers/promises";

import { type ILogger, silentLogger } from "../utils/logger.js";
import type { IEnvironmentManager } from "../utils/env.js";
import {
  ErrorReportingFailedError,
  type FatalRuntimeFailure,
  type RuntimeFailure,
} from "../utils/errors.js";
import type {
  IFunctionRegistry,
  IMessageCodec,
  TraceSink,
} from "../types/runtime.js";
import { createRuntimeEndpoint } from "./endpoint.js";
import { ErrorReporter, type IErrorReporter } from "./reporter.js";
import { FunctionResolver, type IFunctionResolver } from "./resolver.js";
import {
  InvocationTransport,
  type FetchFn,
  type IInvocationTransport,
  type LoopControl,
} from "./transport.js";

export type InvocationFailure = Extract<RuntimeFailure, { scope: "invocation" }>;

export type IterationResult =
  | { status: "skipped" }
  | { status: "responded"; requestId: string; definition: string }
  | { status: "reported"; failure: InvocationFailure }
  | { status: "fatal"; failure: FatalRuntimeFailure };

/// Lets the X-Ray SDK trace across invocations.
export const xrayTraceSink: TraceSink = (traceId) => {
  process.env["_X_AMZN_TRACE_ID"] = traceId;
};

/**
 * The running flag, the cancellation signal of the current run and the fatal
 * failure that ended it, if any. Only the controller and its transport
 * write to it.
 */
export class LoopState implements LoopControl {
  private running = false;
  private abortController = new AbortController();
  private failure: FatalRuntimeFailure | undefined;

  /// Starts a new run and returns the signal that cancels it.
  start(): AbortSignal {
    this.running = true;
    this.failure = undefined;
    this.abortController = new AbortController();
    return this.abortController.signal;
  }

  stop(failure?: FatalRuntimeFailure): void {
    if (failure && this.running && !this.failure) {
      this.failure = failure;
    }
    this.running = false;
    this.abortController.abort();
  }

  isRunning(): boolean {
    return this.running;
  }

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get fatalFailure(): FatalRuntimeFailure | undefined {
    return this.failure;
  }
}

export interface RuntimeEventLoopOptions {
  registry: IFunctionRegistry;
  codec: IMessageCodec;
  environment: IEnvironmentManager;
  traceSink?: TraceSink;
  fetch?: FetchFn;
  userAgent?: string;
  logger?: ILogger;
  /// Called once when the loop ends itself on a transport or reporting failure.
  onFatalError?: (failure: FatalRuntimeFailure) => void;
}

export interface LoopComponents {
  transport: IInvocationTransport;
  resolver: IFunctionResolver;
  reporter: IErrorReporter;
}

/**
 * Polls the runtime API and handles one invocation at a time until stopped.
 *
 * `start()` returns straight away; the loop runs as a single background task.
 * A failing function is reported upstream and the loop moves on. Losing the
 * connection to the runtime API, or failing to report an error, ends it.
 */
export class RuntimeEventLoop {
  private readonly state = new LoopState();
  private readonly logger: ILogger;
  private readonly traceSink: TraceSink;
  private worker: Promise<void> | null = null;

  constructor(private readonly options: RuntimeEventLoopOptions) {
    this.logger = options.logger ?? silentLogger;
    this.traceSink = options.traceSink ?? xrayTraceSink;
  }

  public start(): void {
    if (this.state.isRunning()) {
      this.logger.debug("Event loop already running");
      return;
    }

    const signal = this.state.start();
    const components = this.createComponents(signal);
    const run = () => this.eventLoop(components, signal);
    if (!this.worker) {
      this.worker = run();
      return;
    }

    // A stopped run may still be finishing its invocation; queue behind it
    this.worker = this.worker.then(run, (error: unknown) => {
      this.logger.error("Previous event loop run failed", error);
      return run();
    });
  }

  /// Flips the running flag and cancels the in-flight poll. Doesn't wait.
  public stop(): void {
    if (this.state.isRunning()) {
      this.logger.info("Stopping event loop");
    }
    this.state.stop();
  }

  public isRunning(): boolean {
    return this.state.isRunning();
  }

  /// Settles once the background task has exited.
  public whenStopped(): Promise<void> {
    return this.worker ?? Promise.resolve();
  }

  private createComponents(signal: AbortSignal): LoopComponents {
    const { environment, registry, logger } = this.options;
    const endpoint = createRuntimeEndpoint(environment.runtimeApi);
    this.logger.debug(`Event URI: ${endpoint.nextUrl}`);

    const transport = new InvocationTransport({
      endpoint,
      loopControl: { stop: (failure) => this.stopRun(signal, failure) },
      fetch: this.options.fetch,
      userAgent: this.options.userAgent,
      logger,
    });

    return {
      transport,
      resolver: new FunctionResolver(registry, environment, logger),
      reporter: new ErrorReporter(transport, logger),
    };
  }

  /// Applies a fatal stop only while `signal` belongs to the current run.
  private stopRun(signal: AbortSignal, failure?: FatalRuntimeFailure): boolean {
    if (this.state.signal !== signal) {
      return false;
    }
    this.state.stop(failure);
    return true;
  }

  private async eventLoop(
    components: LoopComponents,
    signal: AbortSignal,
  ): Promise<void> {
    this.logger.info("Entering event loop");

    // A stopped run keeps its aborted signal, so it can't resume after a restart
    while (this.state.isRunning() && !signal.aborted) {
      const result = await this.runIteration(components, signal);

      if (result.status === "fatal") {
        if (!this.stopRun(signal, result.failure)) {
          this.logger.warn(
            `Ignoring ${result.failure.scope} failure of a stopped run`,
            result.failure.cause,
          );
          break;
        }
        this.logger.error(
          `Event loop stopped by a ${result.failure.scope} failure`,
          result.failure.cause,
        );
        this.options.onFatalError?.(result.failure);
        break;
      }

      if (result.status === "skipped") {
        await this.pauseAfterSkip(signal);
      }
    }

    this.logger.info("Event loop exited");
  }

  /**
   * One poll/resolve/invoke/respond cycle. Never rejects: every failure comes
   * back as a tagged result.
   */
  public async runIteration(
    { transport, resolver, reporter }: LoopComponents,
    signal: AbortSignal,
  ): Promise<IterationResult> {
    this.logger.debug("Attempting to get new event");
    const event = await transport.poll(signal);
    if (!event) {
      const failure =
        this.state.signal === signal ? this.state.fatalFailure : undefined;
      return failure ? { status: "fatal", failure } : { status: "skipped" };
    }

    const { requestId } = event;
    this.logger.info(`Received invocation with requestId: ${requestId}`);

    try {
      if (event.traceId) {
        this.logger.debug(`Lambda-Runtime-Trace-Id: ${event.traceId}`);
        this.propagateTraceId(event.traceId);
      }

      const handle = resolver.locate(event);
      const input = this.options.codec.decode(event, handle);
      this.logger.debug(`Executing function ${handle.definition}`, input);

      const output = await handle.invoke(input);
      this.logger.debug(`Reply from function ${handle.definition}`, output);

      const body = this.options.codec.encode(input, output, handle);
      await transport.respond(requestId, body);

      this.logger.info(`Function "${handle.definition}" completed for ${requestId}`);
      return { status: "responded", requestId, definition: handle.definition };
    } catch (error: unknown) {
      const failure: InvocationFailure = {
        scope: "invocation",
        requestId,
        cause: error,
      };

      try {
        await reporter.report(requestId, error);
      } catch (reportingError: unknown) {
        const cause =
          reportingError instanceof ErrorReportingFailedError
            ? reportingError
            : new ErrorReportingFailedError(requestId, { cause: reportingError });
        return {
          status: "fatal",
          failure: { scope: "reporting", requestId, cause },
        };
      }
      return { status: "reported", failure };
    }
  }

  private propagateTraceId(traceId: string): void {
    try {
      this.traceSink(traceId);
    } catch (error: unknown) {
      this.logger.warn("Failed to propagate trace id", error);
    }
  }

  private async pauseAfterSkip(signal: AbortSignal): Promise<void> {
    const delayMs = this.options.environment.pollRetryDelayMs;
    if (delayMs <= 0 || signal.aborted) {
      return;
    }

    try {
      await sleep(delayMs, undefined, { signal });
    } catch (error: unknown) {
      this.logger.debug("Poll retry delay cancelled", error);
    }
  }
}
