/**
 * `flowport export`: list formats, or export a flow to a file, the
 * clipboard or stdout.
 */

import { Command } from "commander";
import { listFormats } from "../../export/formats.js";
import type { ExportOutcome } from "../../export/service.js";
import type { AbortingExportError, Result } from "../../export/errors.js";
import {
  createExportContext,
  parseEntryIndex,
  requireFlow,
  type ExportContext,
} from "./helpers.js";

const FORMATS_HELP = `export format (${listFormats().join(", ")})`;

/**
 * Print the outcome of a sink export.
 *
 * Aborting errors exit 1. A failed sink is a warning: the export itself was
 * produced, the destination just didn't take it.
 */
function report(ctx: ExportContext, result: Result<ExportOutcome, AbortingExportError>): void {
  if (!result.ok) {
    console.error(`Error: ${result.error.message}`);
    ctx.close();
    process.exit(1);
  }

  const outcome = result.value;
  if (outcome.status === "sink-failed") {
    console.error(`Warning: ${outcome.message}`);
  } else {
    console.log(`  ${outcome.message}`);
  }
}

const formatsSubcommand = new Command("formats")
  .description("List supported export formats")
  .action(() => {
    for (const name of listFormats()) {
      console.log(name);
    }
  });

const fileSubcommand = new Command("file")
  .description("Export a flow to a file (raw formats are written byte for byte)")
  .argument("<format>", FORMATS_HELP)
  .argument("<flow>", "flow file (flowport JSON or HAR)")
  .argument("<path>", "destination file")
  .option("-e, --entry <n>", "HAR entry index", parseEntryIndex)
  .action(
    (format: string, flowPath: string, outPath: string, opts: { entry?: number }, command: Command) => {
      const ctx = createExportContext(command);
      try {
        const flow = requireFlow(ctx, flowPath, opts.entry);
        report(ctx, ctx.service.exportToFile(format, flow, outPath));
      } finally {
        ctx.close();
      }
    }
  );

const clipSubcommand = new Command("clip")
  .description("Copy a flow export to the system clipboard")
  .argument("<format>", FORMATS_HELP)
  .argument("<flow>", "flow file (flowport JSON or HAR)")
  .option("-e, --entry <n>", "HAR entry index", parseEntryIndex)
  .action((format: string, flowPath: string, opts: { entry?: number }, command: Command) => {
    const ctx = createExportContext(command);
    try {
      const flow = requireFlow(ctx, flowPath, opts.entry);
      report(ctx, ctx.service.exportToClipboard(format, flow));
    } finally {
      ctx.close();
    }
  });

const showSubcommand = new Command("show")
  .description("Write a flow export to stdout (raw, pipeable)")
  .argument("<format>", FORMATS_HELP)
  .argument("<flow>", "flow file (flowport JSON or HAR)")
  .option("-e, --entry <n>", "HAR entry index", parseEntryIndex)
  .action((format: string, flowPath: string, opts: { entry?: number }, command: Command) => {
    const ctx = createExportContext(command);
    try {
      const flow = requireFlow(ctx, flowPath, opts.entry);
      const output = ctx.service.render(format, flow);
      if (!output.ok) {
        console.error(`Error: ${output.error.message}`);
        ctx.close();
        process.exit(1);
      }

      if (output.value.kind === "binary") {
        process.stdout.write(output.value.data);
      } else {
        console.log(output.value.text);
      }
    } finally {
      ctx.close();
    }
  });

export const exportCommand = new Command("export")
  .description("Export captured flows as curl, HTTPie or raw HTTP")
  .addCommand(formatsSubcommand)
  .addCommand(fileSubcommand)
  .addCommand(clipSubcommand)
  .addCommand(showSubcommand);
