import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

const FLOWPORT_DIR = ".flowport";
const HOME_DIR_PREFIX = "~";

export interface FlowportPaths {
  flowportDir: string;
  configFile: string;
  logFile: string;
}

/**
 * Resolve a user-supplied directory, expanding a leading `~`.
 */
export function resolveUserPath(input: string): string {
  if (input === HOME_DIR_PREFIX) {
    return os.homedir();
  }
  if (input.startsWith(HOME_DIR_PREFIX + "/") || input.startsWith(HOME_DIR_PREFIX + path.sep)) {
    return path.join(os.homedir(), input.slice(HOME_DIR_PREFIX.length + 1));
  }
  return path.resolve(input);
}

/**
 * Find the project root by walking up from `startDir` to the nearest
 * directory holding `.flowport` or `.git`. A `.flowport` directory wins
 * over a `.git` one further down.
 *
 * Falls back to `startDir` itself, so the CLI always has somewhere to keep
 * its config and log.
 *
 * @param override - Used verbatim (after `~` expansion) when given.
 */
export function findProjectRoot(startDir: string = process.cwd(), override?: string): string {
  if (override !== undefined) {
    return resolveUserPath(override);
  }

  const start = path.resolve(startDir);
  let currentDir = start;
  const root = path.parse(currentDir).root;
  let gitRoot: string | undefined;

  while (currentDir !== root) {
    if (fs.existsSync(path.join(currentDir, FLOWPORT_DIR))) {
      return currentDir;
    }
    if (!gitRoot && fs.existsSync(path.join(currentDir, ".git"))) {
      gitRoot = currentDir;
    }
    currentDir = path.dirname(currentDir);
  }

  return gitRoot ?? start;
}

export function getFlowportPaths(projectRoot: string): FlowportPaths {
  const flowportDir = path.join(projectRoot, FLOWPORT_DIR);
  return {
    flowportDir,
    configFile: path.join(flowportDir, "config.json"),
    logFile: path.join(flowportDir, "flowport.log"),
  };
}
