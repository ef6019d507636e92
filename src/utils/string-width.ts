/**
 * Visible width of terminal text
 * Escape sequences are removed first, then string-width measures the rest
 */

import stringWidth from "string-width";

// CSI: ESC [ params letter
// OSC: ESC ] ... terminated by BEL or ESC \
const ESCAPE_SEQUENCE = /\u001b\[[0-9;?]*[a-zA-Z]|\u001b\].*?(?:\u0007|\u001b\\)/g;

export function stripAnsi(str: string): string {
  return str.replace(ESCAPE_SEQUENCE, "");
}

export function visibleWidth(str: string): number {
  if (!str || str.length === 0) return 0;
  return stringWidth(stripAnsi(str));
}

export default visibleWidth;
