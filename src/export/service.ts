/**
 * Export orchestration: resolve a format, render a flow, deliver it to a sink.
 *
 * Lookup and missing-message errors come back as failed results and abort
 * the call. Sink errors are logged and reported in the outcome; the call
 * itself still succeeds.
 */

import type { Flow } from "../shared/types.js";
import type { Logger } from "../shared/logger.js";
import { lookup, listFormats, type ExportOutput, type FormatName } from "./formats.js";
import { toClipboardText } from "./escape.js";
import { writeFileSink } from "./sinks.js";
import { createClipboard, type Clipboard } from "./clipboard.js";
import {
  ok,
  type AbortingExportError,
  type Result,
  type SinkError,
  type SinkKind,
} from "./errors.js";

export type ExportOutcome =
  | { status: "exported"; sink: SinkKind; target: string; bytes: number; message: string }
  | { status: "sink-failed"; sink: SinkKind; target: string; error: SinkError; message: string };

export interface ExportServiceOptions {
  logger: Logger;
  clipboard?: Clipboard;
}

export class ExportService {
  private readonly logger: Logger;
  private readonly clipboard: Clipboard;

  constructor(options: ExportServiceOptions) {
    this.logger = options.logger;
    this.clipboard = options.clipboard ?? createClipboard();
  }

  /**
   * Supported format names, sorted.
   */
  listFormats(): FormatName[] {
    return listFormats();
  }

  /**
   * Look up `formatName` and render `flow` with it.
   */
  render(formatName: string, flow: Flow): Result<ExportOutput, AbortingExportError> {
    const format = lookup(formatName);
    if (!format.ok) {
      this.logger.debug("Unknown export format", { format: formatName });
      return format;
    }

    const output = format.value.render(flow);
    if (!output.ok) {
      this.logger.debug("Flow cannot be exported", {
        format: formatName,
        reason: output.error.code,
      });
    }
    return output;
  }

  exportToFile(
    formatName: string,
    flow: Flow,
    filePath: string
  ): Result<ExportOutcome, AbortingExportError> {
    const output = this.render(formatName, flow);
    if (!output.ok) return output;

    const written = writeFileSink(filePath, output.value);
    if (!written.ok) {
      return ok(this.sinkFailed(formatName, written.error));
    }

    this.logger.info("Exported flow to file", {
      format: formatName,
      path: filePath,
      bytes: written.value.bytes,
    });
    const outcome: ExportOutcome = {
      status: "exported",
      sink: "file",
      target: filePath,
      bytes: written.value.bytes,
      message: `Exported ${formatName} to ${filePath}`,
    };
    return ok(outcome);
  }

  exportToClipboard(formatName: string, flow: Flow): Result<ExportOutcome, AbortingExportError> {
    const output = this.render(formatName, flow);
    if (!output.ok) return output;

    const text = toClipboardText(output.value);
    const copied = this.clipboard.copy(text);
    if (!copied.ok) {
      return ok(this.sinkFailed(formatName, copied.error));
    }

    const bytes = Buffer.byteLength(text, "utf-8");
    this.logger.info("Copied flow to clipboard", { format: formatName, bytes });
    const outcome: ExportOutcome = {
      status: "exported",
      sink: "clipboard",
      target: "clipboard",
      bytes,
      message: `${formatName} copied to clipboard`,
    };
    return ok(outcome);
  }

  private sinkFailed(formatName: string, error: SinkError): ExportOutcome {
    this.logger.error("Export sink failed", {
      format: formatName,
      sink: error.sink,
      target: error.target,
      error: error.message,
    });
    return {
      status: "sink-failed",
      sink: error.sink,
      target: error.target,
      error,
      message: `Failed to export ${formatName} to ${error.target}: ${error.message}`,
    };
  }
}
