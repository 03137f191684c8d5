import { type ILogger, silentLogger } from "../utils/logger.js";
import {
  FunctionResolutionError,
  type ResolutionAttempt,
  type ResolutionSource,
} from "../utils/errors.js";
import type { IEnvironmentManager } from "../utils/env.js";
import type {
  FunctionHandle,
  IFunctionRegistry,
  InvocationEvent,
} from "../types/runtime.js";

export const FUNCTION_DEFINITION_HEADER = "function.definition";

export type ResolverEnvironment = Pick<
  IEnvironmentManager,
  "defaultHandler" | "handler" | "functionDefinition"
>;

export interface IFunctionResolver {
  locate(event: InvocationEvent): FunctionHandle;
}

/**
 * Picks the function for an event by trying, in order: `DEFAULT_HANDLER`,
 * `_HANDLER`, the registry's default function, the configured
 * `function.definition` and finally the event's `function.definition` header.
 */
export class FunctionResolver implements IFunctionResolver {
  constructor(
    private readonly registry: IFunctionRegistry,
    private readonly environment: ResolverEnvironment,
    private readonly logger: ILogger = silentLogger,
  ) {}

  public locate(event: InvocationEvent): FunctionHandle {
    const candidates: ResolutionAttempt[] = [
      { source: "DEFAULT_HANDLER", identifier: this.environment.defaultHandler },
      { source: "_HANDLER", identifier: this.environment.handler },
      { source: "default", identifier: undefined },
      {
        source: "function.definition",
        identifier: this.environment.functionDefinition,
      },
      {
        source: "function.definition header",
        identifier: event.headers.get(FUNCTION_DEFINITION_HEADER) || undefined,
      },
    ];

    const attempts: ResolutionAttempt[] = [];
    for (const candidate of candidates) {
      attempts.push(candidate);
      this.logger.debug(
        `Looking up function by ${describe(candidate.source)}: ${candidate.identifier ?? "<unset>"}`,
      );

      const handle = this.lookup(candidate, event.contentType);
      if (handle) {
        this.logger.info(
          `Located function ${handle.definition} for ${event.requestId}`,
        );
        return handle;
      }
    }

    throw new FunctionResolutionError(attempts, [...this.registry.names()]);
  }

  private lookup(
    { source, identifier }: ResolutionAttempt,
    contentType: string,
  ): FunctionHandle | null {
    // Only the "default" step asks the registry without an identifier
    if (identifier === undefined && source !== "default") {
      return null;
    }
    return this.registry.lookup(identifier, contentType);
  }
}

function describe(source: ResolutionSource): string {
  switch (source) {
    case "default":
      return "registry default";
    case "function.definition header":
      return "'function.definition' header";
    default:
      return `'${source}'`;
  }
}
