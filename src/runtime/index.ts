export { RuntimeEventLoop, LoopState, xrayTraceSink } from "./loop.js";
export type {
  IterationResult,
  InvocationFailure,
  LoopComponents,
  RuntimeEventLoopOptions,
} from "./loop.js";
export { InvocationTransport } from "./transport.js";
export type { FetchFn, IInvocationTransport, LoopControl } from "./transport.js";
export { FunctionResolver } from "./resolver.js";
export type { IFunctionResolver, ResolverEnvironment } from "./resolver.js";
export { ErrorReporter, formatErrorReport } from "./reporter.js";
export type { IErrorReporter } from "./reporter.js";
export { FunctionRegistry } from "./registry.js";
export { jsonCodec } from "./codec.js";
export {
  RUNTIME_API_VERSION,
  buildUserAgent,
  createRuntimeEndpoint,
} from "./endpoint.js";
export type { RuntimeEndpoint } from "./endpoint.js";
