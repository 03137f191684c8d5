import { z } from "zod";

/// Body of `POST /runtime/invocation/{requestId}/error`. All three keys are
/// always present; the message may be empty.
export const ErrorReport = z.object({
  errorMessage: z.string(),
  errorType: z.string().min(1),
  stackTrace: z.string(),
});

export type ErrorReport = z.infer<typeof ErrorReport>;
