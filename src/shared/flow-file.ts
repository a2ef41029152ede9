/**
 * Load flows from disk.
 *
 * Two document shapes are accepted:
 *
 * - a flowport flow document: `{ "request": {...}, "response": {...} }`
 *   with headers as an ordered list so duplicates survive
 * - a HAR 1.2 archive, from which one entry is taken
 */

import * as fs from "node:fs";
import { z } from "zod";
import { Headers, type HeaderEntry } from "./headers.js";
import {
  DEFAULT_HTTP_VERSION,
  type Flow,
  type HttpRequest,
  type HttpResponse,
} from "./types.js";
import { err, ok, type Result } from "./result.js";

export class FlowFileError extends Error {
  constructor(
    message: string,
    readonly source?: string
  ) {
    super(source ? `${source}: ${message}` : message);
    this.name = "FlowFileError";
  }
}

export interface FlowDocumentOptions {
  /** HAR entry index. Ignored for flowport documents. */
  entry?: number;
  /** File name used in error messages. */
  source?: string;
}

// --- flowport flow documents ---

// Header lines go on the wire latin1-encoded, one byte per code point
const HEADER_TEXT = z.string().regex(/^[\x00-\xff]*$/, "Header text must be latin1 (code points 0-255)");

const HEADER_SCHEMA = z.union([
  z.tuple([HEADER_TEXT, HEADER_TEXT]),
  z.object({ name: HEADER_TEXT, value: HEADER_TEXT }),
]);

const BODY_SCHEMA = z.union([
  z.string(),
  z.object({
    encoding: z.enum(["utf8", "base64"]),
    data: z.string(),
  }),
]);

const REQUEST_SCHEMA = z.object({
  method: z.string().min(1),
  url: z.string().min(1),
  httpVersion: z.string().min(1).optional(),
  firstLineFormat: z.enum(["relative", "absolute", "authority"]).optional(),
  headers: z.array(HEADER_SCHEMA).default([]),
  body: BODY_SCHEMA.optional(),
});

const RESPONSE_SCHEMA = z.object({
  httpVersion: z.string().min(1).optional(),
  statusCode: z.number().int().min(100).max(999),
  reason: z.string().optional(),
  headers: z.array(HEADER_SCHEMA).default([]),
  body: BODY_SCHEMA.optional(),
});

const FLOW_SCHEMA = z
  .object({
    request: REQUEST_SCHEMA.optional(),
    response: RESPONSE_SCHEMA.optional(),
  })
  .strict();

// --- HAR 1.2 (only the fields we read) ---

const HAR_NAME_VALUE = z.object({ name: HEADER_TEXT, value: HEADER_TEXT });

const HAR_ENTRY_SCHEMA = z.object({
  request: z.object({
    method: z.string().min(1),
    url: z.string().min(1),
    httpVersion: z.string().optional(),
    headers: z.array(HAR_NAME_VALUE).default([]),
    postData: z.object({ text: z.string().optional() }).optional(),
  }),
  response: z
    .object({
      status: z.number().int(),
      statusText: z.string().optional(),
      httpVersion: z.string().optional(),
      headers: z.array(HAR_NAME_VALUE).default([]),
      content: z
        .object({
          text: z.string().optional(),
          encoding: z.string().optional(),
        })
        .optional(),
    })
    .optional(),
});

const HAR_SCHEMA = z.object({
  log: z.object({
    entries: z.array(z.unknown()),
  }),
});

type FlowDocument = z.infer<typeof FLOW_SCHEMA>;
type HarEntry = z.infer<typeof HAR_ENTRY_SCHEMA>;

function toHeaders(entries: z.infer<typeof HEADER_SCHEMA>[]): Headers {
  const pairs: HeaderEntry[] = entries.map((h) =>
    Array.isArray(h) ? ([h[0], h[1]] as const) : ([h.name, h.value] as const)
  );
  return new Headers(pairs);
}

function toBody(body: z.infer<typeof BODY_SCHEMA> | undefined): Buffer | undefined {
  if (body === undefined) return undefined;
  if (typeof body === "string") return Buffer.from(body, "utf-8");
  return Buffer.from(body.data, body.encoding === "base64" ? "base64" : "utf-8");
}

/**
 * HAR writers disagree on version strings ("HTTP/1.1", "http/2.0", "h2", "").
 */
function normaliseHttpVersion(version: string | undefined): string {
  if (!version) return DEFAULT_HTTP_VERSION;
  const trimmed = version.trim();
  if (/^h2$/i.test(trimmed)) return "HTTP/2.0";
  if (/^h3$/i.test(trimmed)) return "HTTP/3.0";
  return /^http\//i.test(trimmed) ? trimmed.toUpperCase() : DEFAULT_HTTP_VERSION;
}

function flowFromDocument(doc: FlowDocument): Flow {
  const request: HttpRequest | undefined = doc.request && {
    method: doc.request.method,
    url: doc.request.url,
    httpVersion: doc.request.httpVersion ?? DEFAULT_HTTP_VERSION,
    firstLineFormat: doc.request.firstLineFormat ?? "relative",
    headers: toHeaders(doc.request.headers),
    body: toBody(doc.request.body),
  };

  const response: HttpResponse | undefined = doc.response && {
    httpVersion: doc.response.httpVersion ?? DEFAULT_HTTP_VERSION,
    statusCode: doc.response.statusCode,
    reason: doc.response.reason ?? "",
    headers: toHeaders(doc.response.headers),
    body: toBody(doc.response.body),
  };

  return { request, response };
}

function flowFromHarEntry(entry: HarEntry): Flow {
  const postData = entry.request.postData?.text;
  const request: HttpRequest = {
    method: entry.request.method,
    url: entry.request.url,
    httpVersion: normaliseHttpVersion(entry.request.httpVersion),
    firstLineFormat: "relative",
    headers: new Headers(entry.request.headers.map((h) => [h.name, h.value] as const)),
    body: postData ? Buffer.from(postData, "utf-8") : undefined,
  };

  // Browsers record status 0 for requests that never got an answer
  const harResponse = entry.response;
  if (!harResponse || harResponse.status === 0) {
    return { request };
  }

  const text = harResponse.content?.text;
  const response: HttpResponse = {
    httpVersion: normaliseHttpVersion(harResponse.httpVersion),
    statusCode: harResponse.status,
    reason: harResponse.statusText ?? "",
    headers: new Headers(harResponse.headers.map((h) => [h.name, h.value] as const)),
    body:
      text === undefined
        ? undefined
        : Buffer.from(text, harResponse.content?.encoding === "base64" ? "base64" : "utf-8"),
  };

  return { request, response };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Build a flow from an already-parsed JSON document.
 */
export function parseFlowDocument(
  json: unknown,
  options: FlowDocumentOptions = {}
): Result<Flow, FlowFileError> {
  const har = HAR_SCHEMA.safeParse(json);
  if (har.success) {
    const index = options.entry ?? 0;
    const entries = har.data.log.entries;
    if (!Number.isInteger(index) || index < 0 || index >= entries.length) {
      return err(
        new FlowFileError(
          `HAR entry ${index} out of range (archive has ${entries.length} entries)`,
          options.source
        )
      );
    }
    const entry = HAR_ENTRY_SCHEMA.safeParse(entries[index]);
    if (!entry.success) {
      return err(
        new FlowFileError(`Invalid HAR entry ${index}: ${formatIssues(entry.error)}`, options.source)
      );
    }
    return ok(flowFromHarEntry(entry.data));
  }

  const doc = FLOW_SCHEMA.safeParse(json);
  if (!doc.success) {
    return err(new FlowFileError(`Invalid flow document: ${formatIssues(doc.error)}`, options.source));
  }
  return ok(flowFromDocument(doc.data));
}

/**
 * Read and parse a flow file.
 */
export function loadFlowFile(
  filePath: string,
  options: Omit<FlowDocumentOptions, "source"> = {}
): Result<Flow, FlowFileError> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (e) {
    return err(new FlowFileError(e instanceof Error ? e.message : "Unreadable file", filePath));
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (e) {
    return err(
      new FlowFileError(`Invalid JSON: ${e instanceof Error ? e.message : "parse error"}`, filePath)
    );
  }

  return parseFlowDocument(json, { ...options, source: filePath });
}
