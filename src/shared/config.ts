import * as fs from "node:fs";
import { createLogger, DEFAULT_MAX_LOG_SIZE, type LogLevel } from "./logger.js";
import { getFlowportPaths } from "./project.js";
import { DEFAULT_CLIPBOARD_TIMEOUT_MS } from "../export/clipboard.js";

export interface FlowportConfig {
  /** Max log file size in bytes before rotation */
  maxLogSize: number;
  /** Clipboard command and arguments, overriding platform detection */
  clipboardCommand?: string[];
  /** How long a clipboard command may run before it is killed */
  clipboardTimeoutMs: number;
}

export const DEFAULT_CONFIG: FlowportConfig = {
  maxLogSize: DEFAULT_MAX_LOG_SIZE,
  clipboardTimeoutMs: DEFAULT_CLIPBOARD_TIMEOUT_MS,
};

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function isCommandLine(value: unknown): value is string[] {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((part) => typeof part === "string" && part.length > 0)
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Merge valid fields over the defaults. Invalid fields are dropped one by
 * one rather than rejecting the whole file.
 */
function validateConfig(raw: Record<string, unknown>): FlowportConfig {
  const config: FlowportConfig = { ...DEFAULT_CONFIG };

  if (isPositiveInteger(raw["maxLogSize"])) {
    config.maxLogSize = raw["maxLogSize"];
  }

  if (isCommandLine(raw["clipboardCommand"])) {
    config.clipboardCommand = [...raw["clipboardCommand"]];
  }

  if (isPositiveInteger(raw["clipboardTimeoutMs"])) {
    config.clipboardTimeoutMs = raw["clipboardTimeoutMs"];
  }

  return config;
}

/**
 * Load the project configuration from `.flowport/config.json`.
 *
 * Returns defaults if the file is missing. Logs a warning and returns defaults
 * if the JSON is malformed or isn't an object.
 */
export function loadConfig(projectRoot: string, logLevel?: LogLevel): FlowportConfig {
  const { configFile } = getFlowportPaths(projectRoot);

  if (!fs.existsSync(configFile)) {
    return { ...DEFAULT_CONFIG };
  }

  let raw: string;
  try {
    raw = fs.readFileSync(configFile, "utf-8");
  } catch {
    return { ...DEFAULT_CONFIG };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    const logger = createLogger("config", projectRoot, logLevel);
    logger.warn("Malformed config.json, using defaults", { path: configFile });
    logger.close();
    return { ...DEFAULT_CONFIG };
  }

  if (!isRecord(parsed)) {
    const logger = createLogger("config", projectRoot, logLevel);
    logger.warn("config.json must be an object, using defaults", { path: configFile });
    logger.close();
    return { ...DEFAULT_CONFIG };
  }

  return validateConfig(parsed);
}
