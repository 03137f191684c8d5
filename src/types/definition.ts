import type { FunctionHandler } from "./handler.js";
import type { SchemaInput } from "./schema.js";

export interface FunctionManifest<S extends SchemaInput> {
  name: string;
  handler: FunctionHandler<S>;
  config: FunctionConfiguration<S>;
}

export interface FunctionConfiguration<S extends SchemaInput> {
  /// Validates the decoded payload before the handler sees it.
  inputSchema?: S;
  /// Validates whatever the handler returns before it is encoded.
  outputSchema?: SchemaInput;
  /// A producer takes no input; the event body is ignored.
  producer?: boolean;
}
