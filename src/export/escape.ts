/**
 * Escaping helpers shared by the shell formatters and the clipboard sink.
 */

import type { ExportOutput } from "./formats.js";

export interface EscapeOptions {
  /** Leave tab, LF and CR as literal characters instead of `\t`, `\n`, `\r`. */
  keepSpacing?: boolean;
}

const SPACING_ESCAPES: Readonly<Record<number, string>> = {
  0x09: "\\t",
  0x0a: "\\n",
  0x0d: "\\r",
};

function isContinuation(byte: number | undefined, min = 0x80, max = 0xbf): boolean {
  return byte !== undefined && byte >= min && byte <= max;
}

/**
 * Length of the well-formed UTF-8 sequence starting at `i`, or 0 when the
 * bytes there are not valid UTF-8 (overlongs and surrogates included).
 */
function utf8SequenceLength(bytes: Uint8Array, i: number): number {
  const lead = bytes[i];
  if (lead === undefined) return 0;
  if (lead < 0x80) return 1;

  if (lead >= 0xc2 && lead <= 0xdf) {
    return isContinuation(bytes[i + 1]) ? 2 : 0;
  }

  if (lead >= 0xe0 && lead <= 0xef) {
    const min = lead === 0xe0 ? 0xa0 : 0x80;
    const max = lead === 0xed ? 0x9f : 0xbf;
    return isContinuation(bytes[i + 1], min, max) && isContinuation(bytes[i + 2]) ? 3 : 0;
  }

  if (lead >= 0xf0 && lead <= 0xf4) {
    const min = lead === 0xf0 ? 0x90 : 0x80;
    const max = lead === 0xf4 ? 0x8f : 0xbf;
    return isContinuation(bytes[i + 1], min, max) &&
      isContinuation(bytes[i + 2]) &&
      isContinuation(bytes[i + 3])
      ? 4
      : 0;
  }

  return 0;
}

function hexEscape(byte: number): string {
  return "\\x" + byte.toString(16).padStart(2, "0");
}

/**
 * Render bytes as a printable string that maps back to exactly those bytes.
 *
 * Printable ASCII and well-formed non-control UTF-8 pass through. A
 * backslash is doubled so it can't be mistaken for an escape. Everything
 * else becomes `\xNN`.
 */
export function bytesToEscapedString(bytes: Uint8Array, options: EscapeOptions = {}): string {
  let out = "";
  let i = 0;

  while (i < bytes.length) {
    const byte = bytes[i] ?? 0;
    const length = utf8SequenceLength(bytes, i);

    if (length === 1) {
      const spacing = SPACING_ESCAPES[byte];
      if (byte === 0x5c) {
        out += "\\\\";
      } else if (spacing !== undefined) {
        out += options.keepSpacing ? String.fromCharCode(byte) : spacing;
      } else if (byte < 0x20 || byte === 0x7f) {
        out += hexEscape(byte);
      } else {
        out += String.fromCharCode(byte);
      }
      i += 1;
      continue;
    }

    if (length > 1) {
      const char = Buffer.from(bytes.subarray(i, i + length)).toString("utf-8");
      const codePoint = char.codePointAt(0) ?? 0;
      // C1 controls are valid UTF-8 but not printable
      if (codePoint >= 0x80 && codePoint <= 0x9f) {
        for (let j = i; j < i + length; j++) {
          out += hexEscape(bytes[j] ?? 0);
        }
      } else {
        out += char;
      }
      i += length;
      continue;
    }

    out += hexEscape(byte);
    i += 1;
  }

  return out;
}

/**
 * Quote a string as one POSIX shell word.
 *
 * Nothing is special inside single quotes except the quote itself, so each
 * `'` closes the quote, emits a double-quoted `'` and reopens.
 */
export function shellQuote(str: string): string {
  return `'${str.replace(/'/g, "'\"'\"'")}'`;
}

/**
 * Whether `bytes` is entirely well-formed UTF-8.
 */
export function isValidUtf8(bytes: Uint8Array): boolean {
  let i = 0;
  while (i < bytes.length) {
    const length = utf8SequenceLength(bytes, i);
    if (length === 0) return false;
    i += length;
  }
  return true;
}

/**
 * Text form of an export for sinks that only take strings.
 *
 * Valid UTF-8 is decoded as is. Anything else falls back to the escaped
 * display form with line breaks kept, which is lossless but not byte-equal.
 */
export function toClipboardText(output: ExportOutput): string {
  if (output.kind === "text") {
    return output.text;
  }
  if (isValidUtf8(output.data)) {
    return output.data.toString("utf-8");
  }
  return bytesToEscapedString(output.data, { keepSpacing: true });
}
