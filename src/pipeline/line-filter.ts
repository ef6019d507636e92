import { FilterPatternError } from "../errors.js";

export function compileFilter(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new FilterPatternError(pattern, error);
  }
}

/**
 * Keep the lines matching `pattern` anywhere. Runs before header
 * resolution, so a header line that does not match is dropped too.
 */
export function filterLines(lines: readonly string[], pattern?: string): string[] {
  if (pattern === undefined) {
    return [...lines];
  }

  const regex = compileFilter(pattern);
  return lines.filter((line) => regex.test(line));
}
