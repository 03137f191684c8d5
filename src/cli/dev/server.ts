import { createServer, Server, IncomingMessage, ServerResponse } from "node:http";
import chalk from "chalk";

import { RUNTIME_API_VERSION } from "../../runtime/endpoint.js";
import { type IRequestHandlers } from "./handlers/index.js";
import { responseBuilder } from "./handlers/response-builder.js";

export interface ServerOptions {
  port: number;
  host: string;
  handlers: IRequestHandlers;
  verbose?: boolean;
}

export interface RequestHandlerDeps {
  handlers: IRequestHandlers;
  verbose?: boolean;
}

const INVOCATION_PREFIX = `/${RUNTIME_API_VERSION}/runtime/invocation`;

/**
 * Main request handler for the dev server
 * Extracted for testability
 */
export async function handleRequest(
  req: IncomingMessage,
  res: ServerResponse,
  deps: RequestHandlerDeps,
): Promise<void> {
  const { handlers } = deps;
  const url = new URL(req.url || "", `http://${req.headers.host}`);
  const method = req.method || "GET";
  const path = url.pathname;

  if (deps.verbose) {
    console.log(chalk.gray(`[${method}] ${path}`));
  }

  // Set CORS headers for local development
  res.setHeader("Access-Control-Allow-Origin", "*");
  res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type");

  if (method === "OPTIONS") {
    res.writeHead(200);
    res.end();
    return;
  }

  try {
    if (method === "GET" && path === `${INVOCATION_PREFIX}/next`) {
      await handlers.handleInvocationNext(req, res);
      return;
    }

    const invokeMatch = path.match(/^\/v1\/functions\/([^/]+)\/invoke$/);
    if (method === "POST" && invokeMatch && invokeMatch[1]) {
      await handlers.handleFunctionInvoke(
        req,
        res,
        decodeURIComponent(invokeMatch[1]),
      );
      return;
    }

    const completionMatch = path.match(
      /^\/[^/]+\/runtime\/invocation\/([^/]+)\/(response|error)$/,
    );
    if (
      method === "POST" &&
      path.startsWith(INVOCATION_PREFIX) &&
      completionMatch &&
      completionMatch[1]
    ) {
      const requestId = decodeURIComponent(completionMatch[1]);
      if (completionMatch[2] === "response") {
        await handlers.handleInvocationResponse(req, res, requestId);
      } else {
        await handlers.handleInvocationError(req, res, requestId);
      }
      return;
    }

    responseBuilder.sendRouteNotFound(res, method, path);
  } catch (error: unknown) {
    console.error(chalk.red("Server error:"), error);
    responseBuilder.sendInternalError(res);
  }
}

export async function startServer(options: ServerOptions): Promise<Server> {
  const { port, host, handlers, verbose } = options;

  const server = createServer((req: IncomingMessage, res: ServerResponse) => {
    void handleRequest(req, res, { handlers, verbose });
  });

  return new Promise((resolve, reject) => {
    server.listen(port, host, () => {
      resolve(server);
    });

    server.on("error", (error: NodeJS.ErrnoException) => {
      if (error.code === "EADDRINUSE") {
        reject(new Error(`Port ${port} is already in use`));
      } else if (error.code === "EACCES") {
        reject(new Error(`Permission denied to bind to port ${port}`));
      } else {
        reject(error);
      }
    });
  });
}
