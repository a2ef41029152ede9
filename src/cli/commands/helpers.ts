import { Command, InvalidArgumentError } from "commander";
import { findProjectRoot } from "../../shared/project.js";
import { loadConfig, type FlowportConfig } from "../../shared/config.js";
import { createLogger, parseVerbosity, type Logger } from "../../shared/logger.js";
import { loadFlowFile } from "../../shared/flow-file.js";
import type { Flow } from "../../shared/types.js";
import { ExportService } from "../../export/service.js";
import { createClipboard } from "../../export/clipboard.js";

export interface GlobalOptions {
  verbose: number;
  dir?: string;
}

/**
 * Validate and extract global CLI options from a Commander command.
 */
export function getGlobalOptions(command: Command): GlobalOptions {
  const raw = command.optsWithGlobals() as Record<string, unknown>;
  return {
    verbose: typeof raw["verbose"] === "number" ? raw["verbose"] : 0,
    dir: typeof raw["dir"] === "string" ? raw["dir"] : undefined,
  };
}

/**
 * Extract a human-readable message from an unknown error value.
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : "Unknown error";
}

/**
 * Commander argument parser for `--entry <n>`.
 */
export function parseEntryIndex(value: string): number {
  const index = Number(value);
  if (!Number.isInteger(index) || index < 0) {
    throw new InvalidArgumentError("expected a non-negative integer");
  }
  return index;
}

export interface ExportContext {
  projectRoot: string;
  config: FlowportConfig;
  logger: Logger;
  service: ExportService;
  /** Flush logs. Call on every exit path. */
  close(): void;
}

/**
 * Build the export service for a command run from the project's config.
 */
export function createExportContext(command: Command): ExportContext {
  const globalOpts = getGlobalOptions(command);
  const projectRoot = findProjectRoot(undefined, globalOpts.dir);
  const level = parseVerbosity(globalOpts.verbose);
  const config = loadConfig(projectRoot, level);

  const logger = createLogger("cli", projectRoot, level, { maxLogSize: config.maxLogSize });
  const exportLogger = logger.child("export");
  const service = new ExportService({
    logger: exportLogger,
    clipboard: createClipboard({
      command: config.clipboardCommand,
      timeoutMs: config.clipboardTimeoutMs,
    }),
  });

  return {
    projectRoot,
    config,
    logger,
    service,
    close() {
      exportLogger.close();
      logger.close();
    },
  };
}

/**
 * Load a flow file or exit with a friendly error message.
 */
export function requireFlow(ctx: ExportContext, flowPath: string, entry?: number): Flow {
  const flow = loadFlowFile(flowPath, { entry });
  if (!flow.ok) {
    ctx.logger.warn("Failed to load flow file", { path: flowPath, error: flow.error.message });
    console.error(`Error: ${flow.error.message}`);
    ctx.close();
    process.exit(1);
  }
  return flow.value;
}
