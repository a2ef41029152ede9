import { describe, it, expect } from "vitest";
import { Headers } from "../shared/headers.js";
import type { Flow, HttpRequest, HttpResponse } from "../shared/types.js";
import {
  assembleCombined,
  assembleRequest,
  assembleResponse,
  rawRequest,
  rawResponse,
  requestTarget,
  RAW_SEPARATOR,
} from "./raw.js";
import { NoContentError, NoRequestError, NoResponseError } from "./errors.js";

function createRequest(overrides: Partial<HttpRequest> = {}): HttpRequest {
  return {
    method: "GET",
    url: "https://example.com/api/test?page=2",
    httpVersion: "HTTP/1.1",
    firstLineFormat: "relative",
    headers: new Headers([["Host", "example.com"]]),
    ...overrides,
  };
}

function createResponse(overrides: Partial<HttpResponse> = {}): HttpResponse {
  return {
    httpVersion: "HTTP/1.1",
    statusCode: 200,
    reason: "OK",
    headers: new Headers([["Content-Type", "text/plain"]]),
    body: Buffer.from("hello"),
    ...overrides,
  };
}

interface ParsedMessage {
  startLine: string;
  headers: [string, string][];
  body: Buffer;
}

/**
 * Minimal HTTP/1.x reader for checking assembled output.
 */
function parseMessage(data: Buffer): ParsedMessage {
  const headEnd = data.indexOf("\r\n\r\n");
  const head = data.subarray(0, headEnd).toString("latin1").split("\r\n");
  const [startLine = "", ...lines] = head;
  const headers = lines.map((line): [string, string] => {
    const colon = line.indexOf(": ");
    return [line.slice(0, colon), line.slice(colon + 2)];
  });
  return { startLine, headers, body: data.subarray(headEnd + 4) };
}

describe("requestTarget", () => {
  it("uses path and query for relative requests", () => {
    expect(requestTarget(createRequest())).toBe("/api/test?page=2");
  });

  it("uses the full URL for absolute requests", () => {
    expect(requestTarget(createRequest({ firstLineFormat: "absolute" }))).toBe(
      "https://example.com/api/test?page=2"
    );
  });

  it("uses host and port for authority requests", () => {
    const request = createRequest({
      method: "CONNECT",
      url: "https://example.com/",
      firstLineFormat: "authority",
    });
    expect(requestTarget(request)).toBe("example.com:443");
  });

  it("keeps an explicit port in authority form", () => {
    const request = createRequest({ url: "http://example.com:8080/", firstLineFormat: "authority" });
    expect(requestTarget(request)).toBe("example.com:8080");
  });

  it("keeps dot segments, percent-encoding and an empty query as captured", () => {
    const request = createRequest({ url: "http://example.com/a/../b%7e?" });
    expect(requestTarget(request)).toBe("/a/../b%7e?");
  });

  it("keeps characters the URL parser would encode", () => {
    const request = createRequest({ url: "http://example.com/search?q=a b|c" });
    expect(requestTarget(request)).toBe("/search?q=a b|c");
  });

  it("uses / when the URL has no path", () => {
    expect(requestTarget(createRequest({ url: "http://example.com" }))).toBe("/");
    expect(requestTarget(createRequest({ url: "http://example.com:8080?x=1" }))).toBe("/?x=1");
  });

  it("drops the fragment", () => {
    expect(requestTarget(createRequest({ url: "https://example.com/docs#intro" }))).toBe("/docs");
  });

  it("passes a target that isn't a URL through", () => {
    expect(requestTarget(createRequest({ method: "OPTIONS", url: "*" }))).toBe("*");
  });
});

describe("assembleRequest", () => {
  it("writes request line, headers in order with duplicates, and a blank line", () => {
    const request = createRequest({
      headers: new Headers([
        ["Host", "example.com"],
        ["Accept", "*/*"],
        ["Accept", "text/html"],
      ]),
    });

    expect(assembleRequest(request).toString("latin1")).toBe(
      "GET /api/test?page=2 HTTP/1.1\r\n" +
        "Host: example.com\r\n" +
        "Accept: */*\r\n" +
        "Accept: text/html\r\n" +
        "\r\n"
    );
  });

  it("writes the captured path on the request line", () => {
    const request = createRequest({ url: "http://example.com/a/../b%7e?", headers: new Headers() });

    expect(assembleRequest(request).toString("latin1")).toBe("GET /a/../b%7e? HTTP/1.1\r\n\r\n");
  });

  it("appends the body bytes verbatim", () => {
    const body = Buffer.from([0x00, 0xff, 0x0d, 0x0a, 0x41]);
    const request = createRequest({ method: "POST", body });

    const assembled = assembleRequest(request);

    expect(assembled.subarray(assembled.length - body.length).equals(body)).toBe(true);
    expect(assembled.subarray(0, assembled.length - body.length).toString("latin1")).toBe(
      "POST /api/test?page=2 HTTP/1.1\r\nHost: example.com\r\n\r\n"
    );
  });

  it("round-trips through an HTTP/1.x reader", () => {
    const request = createRequest({
      method: "PUT",
      headers: new Headers([
        ["Host", "example.com"],
        ["X-Trace", "1"],
        ["x-trace", "2"],
        ["Content-Type", "application/json"],
      ]),
      body: Buffer.from('{"a":1}'),
    });

    const parsed = parseMessage(assembleRequest(request));

    expect(parsed.startLine).toBe("PUT /api/test?page=2 HTTP/1.1");
    expect(parsed.headers).toEqual(request.headers.entries());
    expect(parsed.body.toString("utf-8")).toBe('{"a":1}');
  });

  it("encodes header values byte for byte", () => {
    const request = createRequest({ headers: new Headers([["X-Name", "café"]]) });

    const assembled = assembleRequest(request);

    expect(assembled.includes(Buffer.from([0x63, 0x61, 0x66, 0xe9]))).toBe(true);
  });
});

describe("assembleResponse", () => {
  it("writes status line, headers, blank line and body", () => {
    expect(assembleResponse(createResponse()).toString("latin1")).toBe(
      "HTTP/1.1 200 OK\r\nContent-Type: text/plain\r\n\r\nhello"
    );
  });

  it("fills an empty reason from the status code", () => {
    const response = createResponse({ statusCode: 404, reason: "", body: undefined });

    expect(assembleResponse(response).toString("latin1")).toBe(
      "HTTP/1.1 404 Not Found\r\nContent-Type: text/plain\r\n\r\n"
    );
  });

  it("leaves the reason empty for codes without a standard text", () => {
    const response = createResponse({
      statusCode: 599,
      reason: "",
      headers: new Headers(),
      body: undefined,
    });

    expect(assembleResponse(response).toString("latin1")).toBe("HTTP/1.1 599 \r\n\r\n");
  });

  it("keeps repeated Set-Cookie lines", () => {
    const response = createResponse({
      headers: new Headers([
        ["Set-Cookie", "a=1"],
        ["Set-Cookie", "b=2"],
      ]),
      body: undefined,
    });

    expect(parseMessage(assembleResponse(response)).headers).toEqual([
      ["Set-Cookie", "a=1"],
      ["Set-Cookie", "b=2"],
    ]);
  });
});

describe("rawRequest / rawResponse", () => {
  it("sanitises before assembling", () => {
    const flow: Flow = {
      request: createRequest({
        headers: new Headers([
          [":authority", "example.com"],
          ["Host", "example.com"],
          ["Content-Length", "0"],
        ]),
      }),
    };

    const result = rawRequest(flow);

    expect(result.ok && result.value.toString("latin1")).toBe(
      "GET /api/test?page=2 HTTP/1.1\r\nHost: example.com\r\n\r\n"
    );
  });

  it("fails on the missing side", () => {
    const request = rawRequest({ response: createResponse() });
    const response = rawResponse({ request: createRequest() });

    expect(!request.ok && request.error).toBeInstanceOf(NoRequestError);
    expect(!response.ok && response.error).toBeInstanceOf(NoResponseError);
  });
});

describe("assembleCombined", () => {
  it("joins request and response with a CRLF CRLF separator", () => {
    const request = createRequest({ method: "POST", body: Buffer.from("q=1") });
    const response = createResponse();
    const flow: Flow = { request, response };

    const result = assembleCombined(flow);

    const expected = Buffer.concat([
      assembleRequest(request),
      Buffer.from("\r\n\r\n"),
      assembleResponse(response),
    ]);
    expect(result.ok && result.value.equals(expected)).toBe(true);
    expect(RAW_SEPARATOR.length).toBe(4);
  });

  it("returns the request alone when there is no response", () => {
    const request = createRequest();

    const result = assembleCombined({ request });

    expect(result.ok && result.value.equals(assembleRequest(request))).toBe(true);
  });

  it("returns the response alone when there is no request", () => {
    const response = createResponse();

    const result = assembleCombined({ response });

    expect(result.ok && result.value.equals(assembleResponse(response))).toBe(true);
  });

  it("fails with NoContentError for an empty flow", () => {
    const result = assembleCombined({});

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(NoContentError);
      expect(result.error.message).toBe("Can't export flow with no request or response.");
    }
  });
});
