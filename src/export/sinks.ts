/**
 * File sink for rendered exports.
 */

import * as fs from "node:fs";
import type { ExportOutput } from "./formats.js";
import { err, ok, SinkError, type Result } from "./errors.js";

export interface WrittenFile {
  path: string;
  bytes: number;
}

/**
 * Bytes that go on disk: binary output as is, text as UTF-8.
 */
export function outputBytes(output: ExportOutput): Buffer {
  return output.kind === "binary" ? output.data : Buffer.from(output.text, "utf-8");
}

/**
 * Write an export to `filePath`, truncating any existing file.
 * Failures (permissions, missing directory, full disk) come back as a SinkError.
 */
export function writeFileSink(filePath: string, output: ExportOutput): Result<WrittenFile, SinkError> {
  const data = outputBytes(output);
  try {
    fs.writeFileSync(filePath, data);
    return ok({ path: filePath, bytes: data.length });
  } catch (e) {
    const message = e instanceof Error ? e.message : `Failed to write ${filePath}`;
    return err(new SinkError("file", filePath, message, { cause: e }));
  }
}
