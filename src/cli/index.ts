#!/usr/bin/env node

import { program } from "commander";
import { exportCommand } from "./commands/export.js";
import { mcpCommand } from "./commands/mcp.js";
import { getFlowportVersion } from "../shared/version.js";

program
  .name("flowport")
  .description("Export captured HTTP flows as curl, HTTPie or raw HTTP/1.x")
  .version(getFlowportVersion())
  .option(
    "-v, --verbose",
    "increase verbosity (use -vv or -vvv for more)",
    (_, prev: number) => prev + 1,
    0
  )
  .option("-d, --dir <path>", "override project root directory");

program.addCommand(exportCommand);
program.addCommand(mcpCommand);

program.addHelpText(
  "after",
  `
Quick start:
  flowport export formats                       List export formats
  flowport export show curl flow.json           Print a curl command
  flowport export file raw flow.json out.http   Write raw HTTP/1.x bytes
  flowport export clip httpie capture.har -e 3  Copy HAR entry 3 as HTTPie`
);

program.parse();
