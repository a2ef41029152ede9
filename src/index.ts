/**
 * Library entry point.
 */

export { Headers, type HeaderEntry } from "./shared/headers.js";
export type { Flow, FirstLineFormat, HttpRequest, HttpResponse } from "./shared/types.js";
export { ok, err, type Result } from "./shared/result.js";
export { loadFlowFile, parseFlowDocument, FlowFileError } from "./shared/flow-file.js";
export { Logger, createLogger, type LogLevel } from "./shared/logger.js";
export {
  ExportError,
  NoRequestError,
  NoResponseError,
  NoContentError,
  UnknownFormatError,
  SinkError,
  type AbortingExportError,
  type FlowError,
  type SinkKind,
} from "./export/errors.js";
export { sanitizeRequest, sanitizeResponse } from "./export/sanitize.js";
export { decodeBodyLenient } from "./export/decode.js";
export {
  assembleRequest,
  assembleResponse,
  assembleCombined,
  RAW_SEPARATOR,
} from "./export/raw.js";
export { curlCommand, httpieCommand } from "./export/shell.js";
export { bytesToEscapedString, shellQuote, toClipboardText } from "./export/escape.js";
export {
  lookup,
  listFormats,
  type ExportFormat,
  type ExportOutput,
  type FormatName,
} from "./export/formats.js";
export { writeFileSink } from "./export/sinks.js";
export { createClipboard, type Clipboard } from "./export/clipboard.js";
export { ExportService, type ExportOutcome } from "./export/service.js";
