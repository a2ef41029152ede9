/**
 * Core types for flowport
 */

import type { Headers } from "./headers.js";

/**
 * How the request target is written on the request line.
 * - relative: `/path?query` (origin form, what a client sends to a server)
 * - absolute: the full URL (what a client sends to a forward proxy)
 * - authority: `host:port` (CONNECT)
 */
export type FirstLineFormat = "relative" | "absolute" | "authority";

export interface HttpRequest {
  method: string;
  url: string;
  httpVersion: string;
  firstLineFormat: FirstLineFormat;
  headers: Headers;
  body?: Buffer;
}

export interface HttpResponse {
  httpVersion: string;
  statusCode: number;
  /** Reason phrase as captured. May be empty (HTTP/2 has none). */
  reason: string;
  headers: Headers;
  body?: Buffer;
}

/**
 * A captured exchange. Either side may be missing: a request that never got
 * an answer, or a response loaded on its own.
 */
export interface Flow {
  readonly request?: HttpRequest;
  readonly response?: HttpResponse;
}

export const DEFAULT_HTTP_VERSION = "HTTP/1.1";

/** Pseudo-header some transports carry for the request authority. */
export const AUTHORITY_PSEUDO_HEADER = ":authority";
