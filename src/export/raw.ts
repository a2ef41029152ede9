/**
 * Assemble messages into HTTP/1.x wire bytes.
 *
 * Output is the literal message: start line, every header line in captured
 * order (duplicates included), a blank line, then the body bytes unchanged.
 */

import { STATUS_CODES } from "node:http";
import type { Flow, HttpRequest, HttpResponse } from "../shared/types.js";
import type { Headers } from "../shared/headers.js";
import { sanitizeRequest, sanitizeResponse } from "./sanitize.js";
import { err, ok, NoContentError, type FlowError, type Result } from "./errors.js";

const CRLF = "\r\n";

/** Separator between the request and response in a combined export. */
export const RAW_SEPARATOR = Buffer.from("\r\n\r\n", "latin1");

const DEFAULT_PORTS: Readonly<Record<string, string>> = {
  "http:": "80",
  "https:": "443",
  "ws:": "80",
  "wss:": "443",
};

/**
 * The request-target as it appears on the request line.
 */
export function requestTarget(request: HttpRequest): string {
  if (request.firstLineFormat === "absolute") {
    return request.url;
  }
  if (request.firstLineFormat === "relative") {
    return originForm(request.url);
  }

  let url: URL;
  try {
    url = new URL(request.url);
  } catch {
    // Already a bare target (e.g. "*" for OPTIONS, or host:port for CONNECT)
    return request.url;
  }

  const port = url.port || DEFAULT_PORTS[url.protocol] || "";
  return port ? `${url.hostname}:${port}` : url.hostname;
}

const SCHEME_AND_AUTHORITY = /^[a-z][a-z0-9+.-]*:\/\/[^/?#]*/i;

/**
 * Path and query exactly as captured. The URL parser would normalise dot
 * segments and percent-encoding, so the target is sliced from the string.
 */
function originForm(url: string): string {
  const prefix = SCHEME_AND_AUTHORITY.exec(url);
  if (!prefix) {
    // Already a bare target (e.g. "*" for OPTIONS, or a path)
    return url;
  }

  let rest = url.slice(prefix[0].length);
  const fragment = rest.indexOf("#");
  if (fragment !== -1) {
    rest = rest.slice(0, fragment);
  }
  return rest.startsWith("/") ? rest : `/${rest}`;
}

function assembleHead(startLine: string, headers: Headers): Buffer {
  let head = startLine + CRLF;
  for (const [name, value] of headers) {
    head += `${name}: ${value}${CRLF}`;
  }
  head += CRLF;
  // Header text holds one code point per wire byte
  return Buffer.from(head, "latin1");
}

function withBody(head: Buffer, body: Buffer | undefined): Buffer {
  return body && body.length > 0 ? Buffer.concat([head, body]) : head;
}

export function assembleRequest(request: HttpRequest): Buffer {
  const startLine = `${request.method} ${requestTarget(request)} ${request.httpVersion}`;
  return withBody(assembleHead(startLine, request.headers), request.body);
}

export function assembleResponse(response: HttpResponse): Buffer {
  const reason = response.reason || STATUS_CODES[response.statusCode] || "";
  const startLine = `${response.httpVersion} ${response.statusCode} ${reason}`;
  return withBody(assembleHead(startLine, response.headers), response.body);
}

/**
 * Sanitise and assemble the request side of a flow.
 */
export function rawRequest(flow: Flow): Result<Buffer, FlowError> {
  const request = sanitizeRequest(flow);
  return request.ok ? ok(assembleRequest(request.value)) : request;
}

/**
 * Sanitise and assemble the response side of a flow.
 */
export function rawResponse(flow: Flow): Result<Buffer, FlowError> {
  const response = sanitizeResponse(flow);
  return response.ok ? ok(assembleResponse(response.value)) : response;
}

/**
 * Both sides joined by {@link RAW_SEPARATOR}, or whichever side exists.
 */
export function assembleCombined(flow: Flow): Result<Buffer, FlowError> {
  if (!flow.request && !flow.response) {
    return err(new NoContentError());
  }
  if (!flow.response) {
    return rawRequest(flow);
  }
  if (!flow.request) {
    return rawResponse(flow);
  }

  const request = rawRequest(flow);
  if (!request.ok) return request;
  const response = rawResponse(flow);
  if (!response.ok) return response;

  return ok(Buffer.concat([request.value, RAW_SEPARATOR, response.value]));
}
