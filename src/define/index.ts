import type { FunctionConfiguration } from "../types/definition.js";
import type { FunctionHandler } from "../types/handler.js";
import type { SchemaInput } from "../types/schema.js";

// Singleton imports
import { functionsRegistry } from "../index.js";

/**
 * Registers a function with the process-wide registry that `startRuntime`
 * serves.
 *
 * @example
 * defineFn("greet", ({ name }) => ({ greeting: `Hello ${name}` }), {
 *   inputSchema: z.object({ name: z.string() }),
 * });
 */
export function defineFn<S extends SchemaInput = undefined>(
  name: string,
  handler: FunctionHandler<S>,
  config: FunctionConfiguration<S> = {},
): void {
  functionsRegistry.register(name, handler, config);
}
