/**
 * Copy text to the system clipboard through the platform's clipboard tool.
 */

import { spawnSync } from "node:child_process";
import { err, ok, SinkError, type Result } from "./errors.js";

export const DEFAULT_CLIPBOARD_TIMEOUT_MS = 5000;

export interface ClipboardCommand {
  command: string;
  args: string[];
}

export interface ClipboardOptions {
  /** Explicit command (first element) and arguments; skips platform detection. */
  command?: readonly string[];
  timeoutMs?: number;
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
}

export interface Clipboard {
  copy(text: string): Result<void, SinkError>;
}

/**
 * Candidate commands for the platform, in the order they are tried.
 */
export function getClipboardCommands(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env
): ClipboardCommand[] {
  if (platform === "darwin") {
    return [{ command: "pbcopy", args: [] }];
  }
  if (platform === "win32") {
    return [{ command: "clip", args: [] }];
  }

  const candidates: ClipboardCommand[] = [];
  if (env["WAYLAND_DISPLAY"]) {
    candidates.push({ command: "wl-copy", args: [] });
  }
  candidates.push(
    { command: "xclip", args: ["-selection", "clipboard"] },
    { command: "xsel", args: ["--clipboard", "--input"] }
  );
  return candidates;
}

function commandLine(candidate: ClipboardCommand): string {
  return [candidate.command, ...candidate.args].join(" ");
}

/**
 * Run one clipboard command. Returns the reason it failed, or undefined.
 */
function runClipboardCommand(
  candidate: ClipboardCommand,
  text: string,
  timeoutMs: number
): { missing: boolean; message: string; cause?: unknown } | undefined {
  const result = spawnSync(candidate.command, candidate.args, {
    input: text,
    timeout: timeoutMs,
    stdio: ["pipe", "ignore", "pipe"],
  });

  if (result.error) {
    const code = "code" in result.error ? result.error.code : undefined;
    return {
      missing: code === "ENOENT",
      message: `${commandLine(candidate)}: ${result.error.message}`,
      cause: result.error,
    };
  }
  if (result.signal) {
    return { missing: false, message: `${commandLine(candidate)} killed by ${result.signal}` };
  }
  if (result.status !== 0) {
    const stderr = result.stderr?.toString("utf-8").trim();
    return {
      missing: false,
      message: `${commandLine(candidate)} exited with code ${result.status}${stderr ? `: ${stderr}` : ""}`,
    };
  }
  return undefined;
}

/**
 * Create a clipboard writer.
 *
 * Tries each candidate command in turn, moving on only when a command is
 * not installed. Any other failure is returned straight away.
 */
export function createClipboard(options: ClipboardOptions = {}): Clipboard {
  const timeoutMs = options.timeoutMs ?? DEFAULT_CLIPBOARD_TIMEOUT_MS;
  const [configured, ...configuredArgs] = options.command ?? [];
  const candidates =
    configured !== undefined
      ? [{ command: configured, args: configuredArgs }]
      : getClipboardCommands(options.platform, options.env);

  return {
    copy(text: string): Result<void, SinkError> {
      const missing: string[] = [];

      for (const candidate of candidates) {
        const failure = runClipboardCommand(candidate, text, timeoutMs);
        if (!failure) {
          return ok(undefined);
        }
        if (!failure.missing) {
          return err(
            new SinkError("clipboard", candidate.command, failure.message, {
              cause: failure.cause,
            })
          );
        }
        missing.push(candidate.command);
      }

      return err(
        new SinkError(
          "clipboard",
          "system clipboard",
          `No clipboard tool available (tried ${missing.join(", ")})`
        )
      );
    },
  };
}
