import chalk from "chalk";
import "dotenv/config";
import type { Server } from "node:http";

import { startServer } from "./server.js";
import { InvocationBridge } from "./bridge.js";
import { RuntimeProcess } from "./process.js";
import { DevServerHandlers } from "./handlers/index.js";

export interface DevServerOptions {
  entrypoint: string;
  port: number;
  host: string;
  verbose: boolean;
  /// Handler name passed to the runtime as DEFAULT_HANDLER
  handler?: string;
}

export async function startDevServer(options: DevServerOptions): Promise<void> {
  const { entrypoint, port, host, verbose, handler } = options;

  if (process.env["NODE_ENV"] === "production") {
    console.warn(
      chalk.yellow(
        "⚠️  Warning: Running dev server in production mode. This is not recommended.",
      ),
    );
  }

  const runtimeApi = `${host}:${port}`;

  if (verbose) {
    console.log(chalk.gray(`Runtime API URL: ${runtimeApi}`));
  }

  const bridge = new InvocationBridge(verbose);
  const handlers = new DevServerHandlers({ bridge });

  const runtimeProcess = new RuntimeProcess({
    entrypoint,
    runtimeApi,
    verbose,
    handler,
    logLevel: verbose ? "debug" : "info",
  });

  let server: Server | null = null;

  try {
    server = await startServer({ port, host, handlers, verbose });

    console.log(
      chalk.green(`✓ Development server listening on http://${host}:${port}`),
    );
    console.log(
      chalk.gray(
        `  Invoke with: curl -X POST http://${host}:${port}/v1/functions/<name>/invoke -d '{}'`,
      ),
    );

    console.log(chalk.cyan("Starting runtime process..."));
    await runtimeProcess.start();

    // Wait a moment for the runtime to connect
    await new Promise((resolve) => setTimeout(resolve, 500));

    if (bridge.isRuntimeConnected()) {
      console.log(chalk.green("✓ Runtime connected and ready"));
    } else {
      console.log(chalk.yellow("⚠️  Waiting for runtime to connect..."));
    }

    const shutdown = async () => {
      console.log(chalk.cyan("\n📦 Shutting down..."));

      await runtimeProcess.stop();

      return new Promise<void>((resolve) => {
        server?.close(() => {
          console.log(chalk.green("✓ Server closed"));
          resolve();
        });
        server?.closeAllConnections();
      });
    };

    const exitAfterShutdown = () => {
      shutdown().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error(chalk.red("Shutdown failed:"), error);
          process.exit(1);
        },
      );
    };

    process.once("SIGINT", exitAfterShutdown);
    process.once("SIGTERM", exitAfterShutdown);
  } catch (error: unknown) {
    console.error(chalk.red("Failed to start:"), error);

    if (runtimeProcess.isRunning()) {
      await runtimeProcess.stop();
    }
    server?.close();

    throw error;
  }
}
