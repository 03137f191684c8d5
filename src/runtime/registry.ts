import { DEFAULT_CONTENT_TYPE, REQUEST_ID_HEADER, TRACE_ID_HEADER } from "./transport.js";

import type { FunctionManifest } from "../types/definition.js";
import type { FunctionInvocationContext } from "../types/handler.js";
import type { SchemaInput } from "../types/schema.js";
import type {
  FunctionHandle,
  IFunctionRegistry,
  Message,
} from "../types/runtime.js";

export interface IWritableFunctionRegistry extends IFunctionRegistry {
  register<S extends SchemaInput>(
    name: FunctionManifest<S>["name"],
    handler: FunctionManifest<S>["handler"],
    config: FunctionManifest<S>["config"],
  ): void;

  // eslint-disable-next-line @typescript-eslint/no-explicit-any -- this would need to be generic based on the `register` call
  getByName(name: string): FunctionManifest<any> | null;

  get size(): number;
}

/**
 * Minimal in-memory registry: exact-name lookup, and the only registered
 * function as the default when no identifier is given.
 */
export class FunctionRegistry implements IWritableFunctionRegistry {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any -- this would need to be generic based on the `register` call
  private _functions = new Map<string, FunctionManifest<any>>();

  register<S extends SchemaInput>(
    name: FunctionManifest<S>["name"],
    handler: FunctionManifest<S>["handler"],
    config: FunctionManifest<S>["config"],
  ) {
    this._functions.set(name, {
      name,
      handler,
      config,
    });
  }

  // eslint-disable-next-line @typescript-eslint/no-explicit-any -- see `_functions`
  public getByName(name: string): FunctionManifest<any> | null {
    return this._functions.get(name) ?? null;
  }

  // Content types aren't negotiated here; every function takes any of them
  public lookup(
    identifier: string | undefined,
    _contentType: string,
  ): FunctionHandle | null {
    if (identifier === undefined) {
      if (this._functions.size !== 1) {
        return null;
      }
      const [only] = this._functions.values();
      return only ? toHandle(only) : null;
    }

    const manifest = this._functions.get(identifier);
    return manifest ? toHandle(manifest) : null;
  }

  public names(): ReadonlySet<string> {
    return new Set(this._functions.keys());
  }

  get size() {
    return this._functions.size;
  }
}

// eslint-disable-next-line @typescript-eslint/no-explicit-any -- see `_functions`
function toHandle(manifest: FunctionManifest<any>): FunctionHandle {
  return {
    definition: manifest.name,
    inputSchema: manifest.config.inputSchema,
    outputSchema: manifest.config.outputSchema,
    isProducer: manifest.config.producer ?? false,
    async invoke(message: Message): Promise<Message> {
      const context = toInvocationContext(message.headers);
      const payload = await manifest.handler(message.payload, context);
      return { payload, headers: { "content-type": context.contentType } };
    },
  };
}

export function toInvocationContext(
  headers: Record<string, string>,
): FunctionInvocationContext {
  return {
    requestId: headers[REQUEST_ID_HEADER.toLowerCase()] ?? "",
    traceId: headers[TRACE_ID_HEADER.toLowerCase()],
    contentType: headers["content-type"] ?? DEFAULT_CONTENT_TYPE,
    headers,
  };
}
