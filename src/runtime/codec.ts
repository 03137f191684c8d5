import type {
  FunctionHandle,
  IMessageCodec,
  InvocationEvent,
  Message,
} from "../types/runtime.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function isJsonContentType(contentType: string | undefined): boolean {
  if (!contentType) {
    return false;
  }
  const mediaType = contentType.split(";")[0]?.trim().toLowerCase() ?? "";
  return mediaType.endsWith("/json") || mediaType.endsWith("+json");
}

/**
 * Plain JSON codec. Bodies with a JSON content type are parsed and checked
 * against the function's input schema; anything else reaches the function as
 * text.
 */
export const jsonCodec: IMessageCodec = {
  decode(event: InvocationEvent, handle: FunctionHandle): Message {
    const headers = Object.fromEntries(event.headers);

    if (handle.isProducer) {
      return { payload: undefined, headers };
    }

    const text = decoder.decode(event.body);
    if (!isJsonContentType(event.contentType)) {
      return { payload: text, headers };
    }

    const parsed: unknown = text.trim() ? JSON.parse(text) : undefined;
    return {
      payload: handle.inputSchema ? handle.inputSchema.parse(parsed) : parsed,
      headers,
    };
  },

  encode(input: Message, output: Message, handle: FunctionHandle): Uint8Array {
    const { payload } = output;
    if (payload instanceof Uint8Array) {
      return payload;
    }
    if (payload === undefined) {
      return new Uint8Array();
    }

    const checked = handle.outputSchema
      ? handle.outputSchema.parse(payload)
      : payload;

    // Text in, text out
    if (typeof checked === "string" && !isJsonContentType(input.headers["content-type"])) {
      return encoder.encode(checked);
    }
    return encoder.encode(JSON.stringify(checked));
  },
};
