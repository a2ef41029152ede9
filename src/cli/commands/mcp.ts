import { Command } from "commander";
import { createFlowportMcpServer } from "../../mcp/server.js";
import { findProjectRoot } from "../../shared/project.js";
import { parseVerbosity } from "../../shared/logger.js";
import { getErrorMessage, getGlobalOptions } from "./helpers.js";

export const mcpCommand = new Command("mcp")
  .description("Start the flowport MCP server (stdio transport for AI tool integration)")
  .action(async (_, command: Command) => {
    const globalOpts = getGlobalOptions(command);
    const projectRoot = findProjectRoot(undefined, globalOpts.dir);

    const mcp = createFlowportMcpServer({
      projectRoot,
      logLevel: parseVerbosity(globalOpts.verbose),
    });

    let closing = false;
    const shutdown = async () => {
      if (closing) return;
      closing = true;
      try {
        await mcp.close();
      } finally {
        process.exit(0);
      }
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);

    try {
      await mcp.start();
    } catch (err) {
      console.error(`Failed to start MCP server: ${getErrorMessage(err)}`);
      await mcp.close();
      process.exit(1);
    }

    // Log to stderr (stdout is reserved for MCP JSON-RPC protocol)
    process.stderr.write(`flowport MCP server running (project: ${projectRoot})\n`);
  });
