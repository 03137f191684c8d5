#!/usr/bin/env node
import { existsSync } from "node:fs";
import { extname, resolve } from "node:path";
import { Command } from "commander";
import chalk from "chalk";

import { readPackageVersion } from "../runtime/endpoint.js";
import { startDevServer } from "./dev/index.js";

const program = new Command();

program
  .name("function-runtime")
  .description("Custom runtime for serving functions over the Lambda Runtime API")
  .version(readPackageVersion());

program
  .command("dev")
  .description(
    "Start a local runtime API emulator and run your functions against it",
  )
  .argument(
    "<entrypoint>",
    "Path to the TypeScript/JavaScript file that defines your functions and calls startRuntime()",
  )
  .option("-p, --port <number>", "Port to listen on", "14113")
  .option("-H, --host <string>", "Host to bind to", "127.0.0.1")
  .option("--handler <name>", "Function to run for every invocation (DEFAULT_HANDLER)")
  .option("-v, --verbose", "Log every request and runtime debug output", false)
  .action(
    async (
      entrypoint: string,
      options: { port: string; host: string; handler?: string; verbose: boolean },
    ) => {
      try {
        const entrypointPath = resolve(entrypoint);
        if (!existsSync(entrypointPath)) {
          console.error(
            chalk.red(`Error: Entrypoint file not found: ${entrypointPath}`),
          );
          process.exit(1);
        }

        const ext = extname(entrypointPath);
        if (![".ts", ".tsx", ".js", ".jsx", ".mjs", ".cjs"].includes(ext)) {
          console.error(
            chalk.red(
              `Error: Invalid file extension. Expected .ts, .tsx, .js, .jsx, .mjs, or .cjs`,
            ),
          );
          process.exit(1);
        }

        const port = parseInt(options.port, 10);
        if (isNaN(port) || port < 1 || port > 65535) {
          console.error(
            chalk.red("Error: Invalid port number. Must be between 1 and 65535."),
          );
          process.exit(1);
        }

        console.log(chalk.cyan("Starting function runtime development server..."));
        console.log(chalk.gray(`Entrypoint: ${entrypointPath}`));

        await startDevServer({
          entrypoint: entrypointPath,
          port,
          host: options.host,
          verbose: options.verbose,
          handler: options.handler,
        });
      } catch (error: unknown) {
        console.error(chalk.red("Failed to start development server:"), error);
        process.exit(1);
      }
    },
  );

program.parse();
