import type { z } from "zod";

/// Shape descriptor for a function's input or output. `undefined` means the
/// payload is passed through unchecked.
export type SchemaInput = z.ZodType | undefined;

export type InferSchema<S extends SchemaInput> = S extends z.ZodType
  ? z.infer<S>
  : unknown;
