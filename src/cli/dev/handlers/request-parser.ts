import { IncomingMessage } from "node:http";
import { z } from "zod";

/// Largest payload the platform accepts for a synchronous invocation.
export const MAX_PAYLOAD_BYTES = 6 * 1024 * 1024;

export class PayloadTooLargeError extends Error {
  constructor(readonly limitBytes: number) {
    super(`Request body exceeds ${limitBytes} bytes`);
    this.name = "PayloadTooLargeError";
  }
}

export class InvalidJsonBodyError extends Error {
  constructor(options?: ErrorOptions) {
    super("Invalid JSON body", options);
    this.name = "InvalidJsonBodyError";
  }
}

export interface IRequestParser {
  /**
   * Collects the raw body. Rejects with `PayloadTooLargeError` once more than
   * `limitBytes` have arrived.
   */
  readBody(req: IncomingMessage, limitBytes?: number): Promise<Buffer>;

  /**
   * Reads a JSON body and validates it. An empty body parses as `{}`.
   */
  parseAndValidate<T>(req: IncomingMessage, schema: z.ZodType<T>): Promise<T>;
}

export const requestParser: IRequestParser = {
  readBody(
    req: IncomingMessage,
    limitBytes: number = MAX_PAYLOAD_BYTES,
  ): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let received = 0;

      req.on("data", (chunk: Buffer | string) => {
        const buffer = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
        received += buffer.byteLength;
        if (received > limitBytes) {
          req.removeAllListeners("data");
          req.resume();
          reject(new PayloadTooLargeError(limitBytes));
          return;
        }
        chunks.push(buffer);
      });

      req.on("end", () => resolve(Buffer.concat(chunks)));

      req.on("error", reject);
    });
  },

  async parseAndValidate<T>(
    req: IncomingMessage,
    schema: z.ZodType<T>,
  ): Promise<T> {
    const text = (await this.readBody(req)).toString("utf-8");
    let body: unknown;
    try {
      body = text ? JSON.parse(text) : {};
    } catch (error: unknown) {
      throw new InvalidJsonBodyError({ cause: error });
    }
    return schema.parse(body);
  },
};
