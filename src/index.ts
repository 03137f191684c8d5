import {
  RuntimeEventLoop,
  type RuntimeEventLoopOptions,
} from "./runtime/loop.js";
import { FunctionRegistry } from "./runtime/registry.js";
import { jsonCodec } from "./runtime/codec.js";
import { EnvironmentManager } from "./utils/env.js";
import { Logger } from "./utils/logger.js";
import type { FatalRuntimeFailure } from "./utils/errors.js";

export { defineFn } from "./define/index.js";
export * from "./runtime/index.js";
export * from "./utils/errors.js";
export { EnvironmentManager } from "./utils/env.js";
export type { IEnvironmentManager } from "./utils/env.js";
export { Logger } from "./utils/logger.js";
export type { ILogger, LogLevel } from "./utils/logger.js";
export { ErrorReport } from "./schemas/events.js";
export type * from "./types/runtime.js";
export type * from "./types/handler.js";
export type * from "./types/definition.js";

export const environmentManager = new EnvironmentManager(process.env);
export const functionsRegistry = new FunctionRegistry();

function handleEventLoopFailure(failure: FatalRuntimeFailure): void {
  console.error(
    `Received fatal ${failure.scope} error from event loop`,
    failure.cause,
  );
  process.exit(1);
}

/**
 * Starts polling the runtime API for invocations of the functions registered
 * with `defineFn`. SIGTERM and SIGINT stop the loop.
 */
export function startRuntime(
  options: Partial<RuntimeEventLoopOptions> = {},
): RuntimeEventLoop {
  const eventLoop = new RuntimeEventLoop({
    registry: functionsRegistry,
    codec: jsonCodec,
    environment: environmentManager,
    logger: new Logger("runtime", environmentManager.logLevel),
    onFatalError: handleEventLoopFailure,
    ...options,
  });

  const shutdown = () => eventLoop.stop();
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);

  eventLoop.start();
  return eventLoop;
}
