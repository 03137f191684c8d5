import type { z } from "zod";

/**
 * One event handed out by `GET /runtime/invocation/next`.
 */
export interface InvocationEvent {
  requestId: string;
  traceId: string | undefined;
  contentType: string;
  body: Uint8Array;
  headers: Headers;
}

export interface Message<T = unknown> {
  payload: T;
  headers: Record<string, string>;
}

/**
 * A resolved reference to exactly one registered function. Held for a single
 * iteration; the registry keeps ownership.
 */
export interface FunctionHandle {
  readonly definition: string;
  readonly inputSchema: z.ZodType | undefined;
  readonly outputSchema: z.ZodType | undefined;
  readonly isProducer: boolean;
  invoke(message: Message): Promise<Message>;
}

export interface IFunctionRegistry {
  /// An `undefined` identifier asks the registry for its default function.
  lookup(identifier: string | undefined, contentType: string): FunctionHandle | null;
  names(): ReadonlySet<string>;
}

export interface IMessageCodec {
  decode(event: InvocationEvent, handle: FunctionHandle): Message;
  encode(input: Message, output: Message, handle: FunctionHandle): Uint8Array;
}

/// Receives the trace id of each invocation. Best effort, never awaited.
export type TraceSink = (traceId: string) => void;
