/**
 * flowport MCP server. Exposes flow export tools to MCP clients
 * (AI agents, IDE integrations, etc.).
 *
 * Flows are read from flow files on disk (flowport JSON or HAR), the same
 * inputs the CLI takes.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { getFlowportVersion } from "../shared/version.js";
import { loadConfig } from "../shared/config.js";
import { createLogger, type LogLevel } from "../shared/logger.js";
import { loadFlowFile } from "../shared/flow-file.js";
import { ExportService } from "../export/service.js";
import { createClipboard, type Clipboard } from "../export/clipboard.js";
import { listFormats } from "../export/formats.js";
import type { ExportOutcome } from "../export/service.js";
import type { AbortingExportError, Result } from "../export/errors.js";

function textResult(text: string, isError?: boolean) {
  return {
    content: [{ type: "text" as const, text }],
    ...(isError ? { isError: true as const } : {}),
  };
}

const FLOW_PATH_SCHEMA = z
  .string()
  .min(1)
  .describe("Path to a flow file: a flowport flow JSON document or a HAR archive.");

const ENTRY_SCHEMA = z
  .number()
  .int()
  .min(0)
  .optional()
  .describe("HAR entry index (default 0). Ignored for flowport flow documents.");

const FORMAT_NAME_SCHEMA = z
  .string()
  .describe(`Export format: one of ${listFormats().join(", ")}.`);

/**
 * Render a service result as tool output. Sink failures are not tool
 * errors: the export ran, the destination refused it.
 */
export function outcomeResult(result: Result<ExportOutcome, AbortingExportError>) {
  if (!result.ok) {
    return textResult(result.error.message, true);
  }
  const outcome = result.value;
  if (outcome.status === "sink-failed") {
    return textResult(`Warning: ${outcome.message}`);
  }
  return textResult(`${outcome.message} (${outcome.bytes} bytes)`);
}

export interface McpServerOptions {
  projectRoot: string;
  logLevel?: LogLevel;
  /** Clipboard override, mainly for tests. Defaults to the configured clipboard. */
  clipboard?: Clipboard;
}

/**
 * Create and configure the flowport MCP server.
 * Returns the server instance (call `start()` to connect transport).
 */
export function createFlowportMcpServer(options: McpServerOptions) {
  const { projectRoot } = options;
  const config = loadConfig(projectRoot, options.logLevel);
  const logger = createLogger("mcp", projectRoot, options.logLevel, {
    maxLogSize: config.maxLogSize,
  });
  const exportLogger = logger.child("export");
  const service = new ExportService({
    logger: exportLogger,
    clipboard:
      options.clipboard ??
      createClipboard({ command: config.clipboardCommand, timeoutMs: config.clipboardTimeoutMs }),
  });

  const server = new McpServer({
    name: "flowport",
    version: getFlowportVersion(),
  });

  // --- flowport_export_formats ---
  server.tool(
    "flowport_export_formats",
    "List the supported export formats: curl and httpie render the request as a shell command; raw, raw_request and raw_response produce HTTP/1.x wire bytes.",
    {},
    async () => textResult(service.listFormats().join("\n"))
  );

  // --- flowport_export_file ---
  server.tool(
    "flowport_export_file",
    "Export a flow to a file. Raw formats are written byte for byte; command formats as UTF-8 text.",
    {
      format: FORMAT_NAME_SCHEMA,
      flow_path: FLOW_PATH_SCHEMA,
      path: z.string().min(1).describe("Destination file path."),
      entry: ENTRY_SCHEMA,
    },
    async (params) => {
      const flow = loadFlowFile(params.flow_path, { entry: params.entry });
      if (!flow.ok) {
        return textResult(flow.error.message, true);
      }
      return outcomeResult(service.exportToFile(params.format, flow.value, params.path));
    }
  );

  // --- flowport_export_clip ---
  server.tool(
    "flowport_export_clip",
    "Copy a flow export to the system clipboard. Binary output that is not valid UTF-8 is copied in escaped form.",
    {
      format: FORMAT_NAME_SCHEMA,
      flow_path: FLOW_PATH_SCHEMA,
      entry: ENTRY_SCHEMA,
    },
    async (params) => {
      const flow = loadFlowFile(params.flow_path, { entry: params.entry });
      if (!flow.ok) {
        return textResult(flow.error.message, true);
      }
      return outcomeResult(service.exportToClipboard(params.format, flow.value));
    }
  );

  return {
    server,
    service,
    /**
     * Start the MCP server with stdio transport.
     */
    async start(): Promise<void> {
      const transport = new StdioServerTransport();
      await server.connect(transport);
      logger.info("MCP server started", { projectRoot });
    },
    /**
     * Shut down cleanly.
     */
    async close(): Promise<void> {
      await server.close();
      exportLogger.close();
      logger.close();
    },
  };
}
