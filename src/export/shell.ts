/**
 * Render a sanitised request as a curl or HTTPie command line.
 *
 * Output is one line. Every header is kept in captured order, including
 * Host and Content-Length, so the command reproduces the exchange rather
 * than letting the client fill in its own defaults.
 */

import type { HttpRequest } from "../shared/types.js";
import { bytesToEscapedString, shellQuote } from "./escape.js";

function headerToken(name: string, value: string): string {
  return shellQuote(`${name}:${value}`);
}

function bodyToken(body: Buffer): string {
  return shellQuote(bytesToEscapedString(body));
}

function hasBody(request: HttpRequest): request is HttpRequest & { body: Buffer } {
  return request.body !== undefined && request.body.length > 0;
}

/**
 * Generate a curl command from a sanitised request.
 *
 * `--compressed` is added when the request advertised Accept-Encoding, so
 * curl negotiates the same codings and decodes the response for display.
 */
export function curlCommand(request: HttpRequest): string {
  let data = "curl ";

  if (request.headers.has("accept-encoding")) {
    data += "--compressed ";
  }

  for (const [name, value] of request.headers) {
    data += `-H ${headerToken(name, value)} `;
  }

  if (request.method !== "GET") {
    data += `-X ${request.method} `;
  }

  data += shellQuote(request.url);

  if (hasBody(request)) {
    data += ` --data-binary ${bodyToken(request.body)}`;
  }

  return data;
}

/**
 * Generate an HTTPie command from a sanitised request.
 * The URL goes out unquoted; the body is fed on stdin with a here-string.
 */
export function httpieCommand(request: HttpRequest): string {
  let data = `http ${request.method} ${request.url}`;

  for (const [name, value] of request.headers) {
    data += ` ${headerToken(name, value)}`;
  }

  if (hasBody(request)) {
    data += ` <<< ${bodyToken(request.body)}`;
  }

  return data;
}
