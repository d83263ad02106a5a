import type { U64 } from "../model/types.js";

/**
 * Number of ASCII digits in the decimal rendering of an unsigned integer
 * (no sign, no leading zeros). Callers guarantee `value` is a u64.
 */
export function decimalDigitCount(value: U64): number {
  if (typeof value === "bigint") {
    return value.toString().length;
  }
  let digits = 1;
  let rest = value;
  while (rest >= 10) {
    rest = Math.floor(rest / 10);
    digits++;
  }
  return digits;
}
