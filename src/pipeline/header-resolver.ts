import type { HeaderOptions, TokenizerOptions } from "../types/index.js";
import { splitLine } from "./tokenizer.js";

export interface ResolvedLines {
  // Header taken from the input; empty for explicit and "none" sources
  headers: string[];
  rows: string[][];
  // Tokenized explicit header, applied after projection
  explicitHeader?: string[];
}

/**
 * Decide what the first surviving line is.
 *
 * Removing the first line and promoting a header compose: with
 * `removeFirstLine` the discarded line is skipped and the next one is
 * still promoted when the source is `firstLine`.
 */
export function resolveHeader(
  lines: readonly string[],
  header: HeaderOptions,
  tokenizer: TokenizerOptions,
): ResolvedLines {
  let index = header.removeFirstLine && lines.length > 0 ? 1 : 0;
  let headers: string[] = [];
  let explicitHeader: string[] | undefined;

  switch (header.source.kind) {
    case "explicit":
      explicitHeader = splitLine(header.source.text, tokenizer);
      break;
    case "none":
      break;
    case "firstLine": {
      const first = lines[index];
      if (first !== undefined) {
        headers = splitLine(first, tokenizer);
        index++;
      }
      break;
    }
  }

  const rows = lines.slice(index).map((line) => splitLine(line, tokenizer));
  return explicitHeader ? { headers, rows, explicitHeader } : { headers, rows };
}
