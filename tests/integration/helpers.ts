import { createServer, request, type Server } from "node:http";
import { setTimeout as sleep } from "node:timers/promises";

import { handleRequest } from "../../src/cli/dev/server.js";
import { DevServerHandlers } from "../../src/cli/dev/handlers/index.js";
import { InvocationBridge } from "../../src/cli/dev/bridge.js";

// ── Emulated runtime API ─────────────────────────────────────────────

export interface EmulatedRuntimeApi {
  server: Server;
  bridge: InvocationBridge;
  /** host:port, the form AWS_LAMBDA_RUNTIME_API takes */
  address: string;
  close(): Promise<void>;
}

/**
 * Starts the dev server's request handling on an ephemeral local port.
 */
export function startRuntimeApi(): Promise<EmulatedRuntimeApi> {
  const bridge = new InvocationBridge();
  const handlers = new DevServerHandlers({ bridge });
  const server = createServer((req, res) => {
    void handleRequest(req, res, { handlers });
  });

  return new Promise((resolve, reject) => {
    server.on("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const addr = server.address();
      if (!addr || typeof addr === "string") {
        server.close();
        reject(new Error("Could not determine port"));
        return;
      }

      resolve({
        server,
        bridge,
        address: `127.0.0.1:${addr.port}`,
        close: () =>
          new Promise<void>((done) => {
            server.closeAllConnections();
            server.close(() => done());
          }),
      });
    });
  });
}

// ── HTTP helpers ─────────────────────────────────────────────────────

export interface HttpResponse {
  statusCode: number;
  body: string;
}

export function httpPost(
  url: string,
  body: string,
  headers: Record<string, string> = { "Content-Type": "application/json" },
): Promise<HttpResponse> {
  return new Promise((resolve, reject) => {
    const req = request(url, { method: "POST", headers }, (res) => {
      let data = "";
      res.on("data", (chunk: Buffer) => {
        data += chunk.toString();
      });
      res.on("end", () => {
        resolve({ statusCode: res.statusCode ?? 0, body: data });
      });
    });
    req.on("error", reject);
    req.end(body);
  });
}

// ── Polling helpers ──────────────────────────────────────────────────

export async function waitFor(
  condition: () => boolean,
  description: string,
  timeoutMs: number = 5_000,
): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (condition()) {
      return;
    }
    await sleep(10);
  }
  throw new Error(`Timed out after ${timeoutMs}ms waiting for ${description}`);
}
