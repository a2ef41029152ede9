/**
 * Build exportable copies of captured messages.
 *
 * The captured flow is never touched: every export works on a fresh copy
 * whose body has been decoded and whose transport-only headers are gone.
 */

import type { Flow, HttpRequest, HttpResponse } from "../shared/types.js";
import { AUTHORITY_PSEUDO_HEADER } from "../shared/types.js";
import { decodeBodyLenient } from "./decode.js";
import { err, ok, NoRequestError, NoResponseError, type Result } from "./errors.js";

function copyBody(body: Buffer | undefined): Buffer | undefined {
  return body === undefined ? undefined : Buffer.from(body);
}

export function copyRequest(request: HttpRequest): HttpRequest {
  return {
    ...request,
    headers: request.headers.clone(),
    body: copyBody(request.body),
  };
}

export function copyResponse(response: HttpResponse): HttpResponse {
  return {
    ...response,
    headers: response.headers.clone(),
    body: copyBody(response.body),
  };
}

export function sanitizeRequest(flow: Flow): Result<HttpRequest, NoRequestError> {
  if (!flow.request) {
    return err(new NoRequestError());
  }

  const request = copyRequest(flow.request);
  const { body } = decodeBodyLenient(request.headers, request.body);
  request.body = body;

  // A GET with an explicit zero length is an artefact of the capturing client
  if (request.method === "GET" && request.headers.get("content-length") === "0") {
    request.headers.delete("content-length");
  }
  request.headers.delete(AUTHORITY_PSEUDO_HEADER);

  return ok(request);
}

export function sanitizeResponse(flow: Flow): Result<HttpResponse, NoResponseError> {
  if (!flow.response) {
    return err(new NoResponseError());
  }

  const response = copyResponse(flow.response);
  const { body } = decodeBodyLenient(response.headers, response.body);
  response.body = body;
  response.headers.delete(AUTHORITY_PSEUDO_HEADER);

  return ok(response);
}
