import type { TokenizerOptions } from "../types/index.js";

const WHITESPACE_RUN = /\s+/u;

/**
 * Split one input line into fields.
 *
 * Collapse mode splits on whitespace runs and never yields leading or
 * trailing empty fields. Literal mode splits on the exact separator text.
 * Both return [""] for an empty line.
 */
export function splitLine(line: string, options: TokenizerOptions): string[] {
  if (options.collapse) {
    const trimmed = line.trim();
    return trimmed === "" ? [""] : trimmed.split(WHITESPACE_RUN);
  }

  return line.split(options.separator);
}
