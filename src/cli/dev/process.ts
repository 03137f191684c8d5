import { spawn, type SpawnOptions } from "node:child_process";
import type { Readable } from "node:stream";
import { dirname } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import chalk from "chalk";

import type { LogLevel } from "../../utils/logger.js";

/// The parts of a spawned child the dev server relies on.
export interface RuntimeChild {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(
    event: "exit",
    listener: (code: number | null, signal: NodeJS.Signals | null) => void,
  ): this;
  on(event: "error", listener: (error: NodeJS.ErrnoException) => void): this;
}

export type SpawnRuntime = (
  command: string,
  args: string[],
  options: SpawnOptions,
) => RuntimeChild;

export interface RuntimeProcessOptions {
  entrypoint: string;
  /// host:port of the emulated runtime API
  runtimeApi: string;
  verbose: boolean;
  /// Becomes DEFAULT_HANDLER in the child
  handler?: string;
  logLevel?: LogLevel;
  baseEnv?: NodeJS.ProcessEnv;
  spawn?: SpawnRuntime;
  startupGraceMs?: number;
  killTimeoutMs?: number;
}

export const WATCH_COMMAND = "tsx";

export function watchArgs(entrypoint: string): string[] {
  return ["watch", "--clear-screen=false", entrypoint];
}

/**
 * Environment of the runtime child: the parent's, pointed at the emulator.
 */
export function buildRuntimeEnv(
  options: Pick<RuntimeProcessOptions, "runtimeApi" | "handler" | "logLevel" | "baseEnv">,
): NodeJS.ProcessEnv {
  return {
    ...(options.baseEnv ?? process.env),
    ...(options.handler ? { DEFAULT_HANDLER: options.handler } : {}),
    AWS_LAMBDA_RUNTIME_API: options.runtimeApi,
    NODE_ENV: "local",
    RUNTIME_LOG_LEVEL: options.logLevel ?? "info",
  };
}

type WatchLine = "watching" | "restarting" | "output";

/// tsx watch reports its own state on stderr, mixed with the child's errors.
export function classifyWatchLine(line: string): WatchLine {
  if (line.includes("Watching for file changes")) {
    return "watching";
  }
  if (line.includes("Restarting")) {
    return "restarting";
  }
  return "output";
}

function forEachLine(data: Buffer, callback: (line: string) => void): void {
  for (const line of data.toString().trim().split("\n")) {
    if (line.trim()) {
      callback(line);
    }
  }
}

/**
 * Runs the user's entrypoint under `tsx watch` against the emulated runtime
 * API, restarting it on file changes.
 */
export class RuntimeProcess {
  private child: RuntimeChild | null = null;
  private spawnError: NodeJS.ErrnoException | null = null;
  private isShuttingDown = false;
  private readonly spawnRuntime: SpawnRuntime;
  private readonly startupGraceMs: number;
  private readonly killTimeoutMs: number;

  constructor(private readonly options: RuntimeProcessOptions) {
    this.spawnRuntime = options.spawn ?? spawn;
    this.startupGraceMs = options.startupGraceMs ?? 100;
    this.killTimeoutMs = options.killTimeoutMs ?? 5000;
  }

  public async start(): Promise<void> {
    if (this.child) {
      throw new Error("Runtime process is already running");
    }

    const { entrypoint, verbose } = this.options;
    const args = watchArgs(entrypoint);
    const cwd = dirname(entrypoint);

    if (verbose) {
      console.log(chalk.gray(`  Command: ${WATCH_COMMAND} ${args.join(" ")}`));
      console.log(chalk.gray(`  Working directory: ${cwd}`));
      console.log(chalk.gray(`  Runtime API: ${this.options.runtimeApi}`));
    }

    this.spawnError = null;
    this.isShuttingDown = false;
    const child = this.spawnRuntime(WATCH_COMMAND, args, {
      cwd,
      env: buildRuntimeEnv(this.options),
      stdio: ["ignore", "pipe", "pipe"],
    });
    this.child = child;

    child.stdout?.on("data", (data: Buffer) => {
      forEachLine(data, (line) => console.log(chalk.blue("[Runtime]"), line));
    });

    child.stderr?.on("data", (data: Buffer) => {
      forEachLine(data, (line) => {
        switch (classifyWatchLine(line)) {
          case "watching":
            console.log(chalk.green("✓ Runtime watching for file changes"));
            break;
          case "restarting":
            console.log(chalk.yellow("↻ Runtime restarting due to file change..."));
            break;
          default:
            console.error(chalk.red("[Runtime Error]"), line);
        }
      });
    });

    child.on("exit", (code, signal) => {
      if (this.child === child) {
        this.child = null;
      }
      if (this.isShuttingDown) {
        return;
      }
      if (code === 0) {
        console.log(chalk.gray("Runtime process exited"));
        return;
      }
      console.error(
        chalk.red(
          `✗ Runtime process exited unexpectedly (code ${code}, signal ${signal})`,
        ),
      );
    });

    child.on("error", (error) => {
      this.spawnError = error;
      if (this.child === child) {
        this.child = null;
      }
      if (error.code === "ENOENT") {
        console.error(
          chalk.red(`✗ Failed to start runtime: ${WATCH_COMMAND} not found`),
          chalk.yellow("\n  Make sure tsx is installed: npm install --save-dev tsx"),
        );
      } else {
        console.error(chalk.red("✗ Failed to start runtime process:"), error);
      }
    });

    await sleep(this.startupGraceMs);

    if (this.spawnError) {
      throw new Error(
        this.spawnError.code === "ENOENT"
          ? `Failed to start runtime process: ${WATCH_COMMAND} not found`
          : "Failed to start runtime process",
        { cause: this.spawnError },
      );
    }
    if (!this.child || this.child.exitCode !== null) {
      throw new Error("Failed to start runtime process");
    }

    console.log(chalk.green("✓ Runtime process started"));
  }

  /// SIGTERM first, SIGKILL once `killTimeoutMs` has passed without an exit.
  public stop(): Promise<void> {
    const child = this.child;
    if (!child) {
      return Promise.resolve();
    }

    this.isShuttingDown = true;
    if (this.options.verbose) {
      console.log(chalk.gray("Stopping runtime process..."));
    }

    return new Promise((resolve) => {
      const killTimeout = setTimeout(() => {
        console.log(chalk.yellow("⚠️  Force killing runtime process"));
        child.kill("SIGKILL");
      }, this.killTimeoutMs);

      child.on("exit", () => {
        clearTimeout(killTimeout);
        console.log(chalk.green("✓ Runtime process stopped"));
        resolve();
      });

      child.kill("SIGTERM");
    });
  }

  public isRunning(): boolean {
    return this.child !== null && this.child.exitCode === null;
  }
}
