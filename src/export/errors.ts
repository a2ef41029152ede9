/**
 * Export error taxonomy.
 *
 * Lookup and missing-message errors abort an export. Sink errors are
 * reported by the service and never abort it.
 */

export { err, ok, type Result } from "../shared/result.js";

export type ExportErrorCode =
  | "no_request"
  | "no_response"
  | "no_content"
  | "unknown_format"
  | "sink";

export abstract class ExportError extends Error {
  abstract readonly code: ExportErrorCode;
}

export class NoRequestError extends ExportError {
  readonly code = "no_request";

  constructor() {
    super("Can't export flow with no request.");
    this.name = "NoRequestError";
  }
}

export class NoResponseError extends ExportError {
  readonly code = "no_response";

  constructor() {
    super("Can't export flow with no response.");
    this.name = "NoResponseError";
  }
}

export class NoContentError extends ExportError {
  readonly code = "no_content";

  constructor() {
    super("Can't export flow with no request or response.");
    this.name = "NoContentError";
  }
}

export class UnknownFormatError extends ExportError {
  readonly code = "unknown_format";

  constructor(readonly format: string) {
    super(`No such export format: ${format}`);
    this.name = "UnknownFormatError";
  }
}

export type SinkKind = "file" | "clipboard";

export class SinkError extends ExportError {
  readonly code = "sink";

  constructor(
    readonly sink: SinkKind,
    readonly target: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "SinkError";
  }
}

/** Errors a formatter can produce from the shape of the flow. */
export type FlowError = NoRequestError | NoResponseError | NoContentError;

/** Errors that abort an export call. */
export type AbortingExportError = FlowError | UnknownFormatError;
