import { z } from "zod";

import { isLogLevel, type LogLevel } from "./logger.js";

export const DEFAULT_RUNTIME_API = "127.0.0.1:14113";

export interface IEnvironmentManager {
  get environment(): string;
  get runtimeApi(): string;
  get defaultHandler(): string | undefined;
  get handler(): string | undefined;
  get functionDefinition(): string | undefined;
  get logLevel(): LogLevel;
  get pollRetryDelayMs(): number;
}

const RetryDelay = z.coerce.number().int().nonnegative();

export class EnvironmentManager implements IEnvironmentManager {
  /// Whether we're running locally or deployed ("production").
  private _environment: string;

  /// host:port of the runtime control API. Locally this points at the dev
  /// server, when deployed at the platform's internal endpoint.
  private _runtimeApi: string;

  /// Handler identifiers, in the order the resolver tries them.
  private _defaultHandler: string | undefined;
  private _handler: string | undefined;
  private _functionDefinition: string | undefined;

  private _logLevel: LogLevel;

  /// Pause after a transient poll failure before polling again.
  private _pollRetryDelayMs: number;

  constructor(processEnv: NodeJS.ProcessEnv) {
    this._environment = getOrDefault(processEnv, "NODE_ENV", "local");
    this._runtimeApi = getOrDefault(
      processEnv,
      "AWS_LAMBDA_RUNTIME_API",
      DEFAULT_RUNTIME_API,
    );

    this._defaultHandler = getOptional(processEnv, "DEFAULT_HANDLER");
    this._handler = getOptional(processEnv, "_HANDLER");
    // Shells can't export dotted names, so accept the conventional spelling too
    this._functionDefinition =
      getOptional(processEnv, "function.definition") ??
      getOptional(processEnv, "FUNCTION_DEFINITION");

    const logLevel = getOrDefault(processEnv, "RUNTIME_LOG_LEVEL", "info");
    this._logLevel = isLogLevel(logLevel) ? logLevel : "info";

    const retryDelay = RetryDelay.safeParse(
      getOrDefault(processEnv, "RUNTIME_POLL_RETRY_DELAY_MS", "0"),
    );
    this._pollRetryDelayMs = retryDelay.success ? retryDelay.data : 0;
  }

  get environment() {
    return this._environment;
  }

  get runtimeApi() {
    return this._runtimeApi;
  }

  get defaultHandler() {
    return this._defaultHandler;
  }

  get handler() {
    return this._handler;
  }

  get functionDefinition() {
    return this._functionDefinition;
  }

  get logLevel() {
    return this._logLevel;
  }

  get pollRetryDelayMs() {
    return this._pollRetryDelayMs;
  }
}

function getOrDefault(env: NodeJS.ProcessEnv, key: string, dflt: string): string {
  return getOptional(env, key) ?? dflt;
}

function getOptional(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const val = env[key];
  if (!val) {
    return undefined;
  }
  return val;
}
