/**
 * Best-effort reversal of Content-Encoding.
 *
 * Exports should show what the client meant to send, not the compressed
 * bytes, but a body that fails to decode must still export as captured.
 */

import * as zlib from "node:zlib";
import type { Headers } from "../shared/headers.js";

type Decoder = (data: Buffer) => Buffer;

const DECODERS: Readonly<Record<string, Decoder>> = {
  identity: (data) => data,
  gzip: (data) => zlib.gunzipSync(data),
  "x-gzip": (data) => zlib.gunzipSync(data),
  br: (data) => zlib.brotliDecompressSync(data),
  deflate: (data) => {
    // Some servers send raw deflate despite RFC 9110 asking for zlib framing
    try {
      return zlib.inflateSync(data);
    } catch {
      return zlib.inflateRawSync(data);
    }
  },
};

export interface DecodedBody {
  body: Buffer | undefined;
  decoded: boolean;
}

/**
 * Parse a Content-Encoding value into codings in the order they must be
 * undone (last applied first).
 */
export function parseContentEncoding(value: string): string[] {
  return value
    .split(",")
    .map((c) => c.trim().toLowerCase())
    .filter((c) => c.length > 0)
    .reverse();
}

/**
 * Decode `body` according to the Content-Encoding in `headers`.
 *
 * On success the header is removed and any Content-Length is updated to the
 * decoded size. On failure, or for a coding we don't know, both headers and
 * body are left untouched. Never throws.
 */
export function decodeBodyLenient(headers: Headers, body: Buffer | undefined): DecodedBody {
  // Repeated Content-Encoding fields form one list, in field order
  const fields = headers.getAll("content-encoding");
  if (fields.length === 0 || !body || body.length === 0) {
    return { body, decoded: false };
  }

  let current = body;
  for (const coding of parseContentEncoding(fields.join(","))) {
    const decoder = DECODERS[coding];
    if (!decoder) {
      return { body, decoded: false };
    }
    try {
      current = decoder(current);
    } catch {
      return { body, decoded: false };
    }
  }

  headers.delete("content-encoding");
  if (headers.has("content-length")) {
    headers.set("content-length", String(current.length));
  }
  return { body: current, decoded: true };
}
