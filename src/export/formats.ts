/**
 * The closed set of export formats.
 *
 * Built once at module load and frozen; lookups are safe from any caller.
 */

import type { Flow } from "../shared/types.js";
import { sanitizeRequest } from "./sanitize.js";
import { curlCommand, httpieCommand } from "./shell.js";
import { assembleCombined, rawRequest, rawResponse } from "./raw.js";
import { err, ok, UnknownFormatError, type FlowError, type Result } from "./errors.js";

export type ExportOutput = { kind: "text"; text: string } | { kind: "binary"; data: Buffer };

export type OutputKind = ExportOutput["kind"];

export type FormatName = "curl" | "httpie" | "raw" | "raw_request" | "raw_response";

export interface ExportFormat {
  name: FormatName;
  kind: OutputKind;
  description: string;
  render: (flow: Flow) => Result<ExportOutput, FlowError>;
}

function textFormat(
  name: FormatName,
  description: string,
  generate: (flow: Flow) => Result<string, FlowError>
): ExportFormat {
  return Object.freeze({
    name,
    kind: "text" as const,
    description,
    render: (flow: Flow) => {
      const result = generate(flow);
      return result.ok ? ok({ kind: "text" as const, text: result.value }) : result;
    },
  });
}

function binaryFormat(
  name: FormatName,
  description: string,
  generate: (flow: Flow) => Result<Buffer, FlowError>
): ExportFormat {
  return Object.freeze({
    name,
    kind: "binary" as const,
    description,
    render: (flow: Flow) => {
      const result = generate(flow);
      return result.ok ? ok({ kind: "binary" as const, data: result.value }) : result;
    },
  });
}

/** Maps each format to its generator. */
const FORMATS: Readonly<Record<FormatName, ExportFormat>> = Object.freeze({
  curl: textFormat("curl", "curl command line for the request", (flow) => {
    const request = sanitizeRequest(flow);
    return request.ok ? ok(curlCommand(request.value)) : request;
  }),
  httpie: textFormat("httpie", "HTTPie command line for the request", (flow) => {
    const request = sanitizeRequest(flow);
    return request.ok ? ok(httpieCommand(request.value)) : request;
  }),
  raw: binaryFormat("raw", "HTTP/1.x bytes of the request and response", assembleCombined),
  raw_request: binaryFormat("raw_request", "HTTP/1.x bytes of the request", rawRequest),
  raw_response: binaryFormat("raw_response", "HTTP/1.x bytes of the response", rawResponse),
});

const FORMAT_NAMES: readonly FormatName[] = Object.freeze(
  Object.values(FORMATS)
    .map((format) => format.name)
    .sort()
);

export function isFormatName(name: string): name is FormatName {
  return Object.prototype.hasOwnProperty.call(FORMATS, name);
}

export function lookup(name: string): Result<ExportFormat, UnknownFormatError> {
  return isFormatName(name) ? ok(FORMATS[name]) : err(new UnknownFormatError(name));
}

/**
 * All format names in lexicographic order.
 */
export function listFormats(): FormatName[] {
  return [...FORMAT_NAMES];
}
