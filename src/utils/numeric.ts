/**
 * Strict floating point detection
 *
 * `Number()` accepts "", " 1 " and "0x10", and `parseFloat()` accepts "12abc".
 * A value counts as numeric only when the whole string is a decimal float
 * or one of the special words inf / infinity / nan.
 */

const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL = /^([+-]?)(inf|infinity|nan)$/i;

export function parseNumber(value: string): number | undefined {
  if (DECIMAL.test(value)) {
    return Number(value);
  }

  const special = SPECIAL.exec(value);
  if (special) {
    const word = (special[2] ?? "").toLowerCase();
    if (word === "nan") return Number.NaN;
    return special[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }

  return undefined;
}

export function isNumeric(value: string): boolean {
  return parseNumber(value) !== undefined;
}
