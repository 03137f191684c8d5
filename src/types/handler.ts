import type { InferSchema, SchemaInput } from "./schema.js";

export interface FunctionInvocationContext {
  requestId: string;
  traceId?: string;
  contentType: string;
  /// Control headers of the invocation, keys lower-cased.
  headers: Record<string, string>;
}

export type FunctionHandler<S extends SchemaInput> = (
  input: InferSchema<S>,
  context: FunctionInvocationContext,
) =>
  | Promise<FunctionHandlerCallbackReturnValue>
  | FunctionHandlerCallbackReturnValue;

export type FunctionHandlerCallbackReturnValue =
  | JSONValue
  | Uint8Array
  | void;

/// Anything the JSON codec can write back as the invocation result.
export type JSONValue =
  | string
  | number
  | boolean
  | null
  | JSONValue[]
  | { [key: string]: JSONValue };
