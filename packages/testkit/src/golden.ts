import { AssertionError } from "node:assert";

const HEXDUMP_WIDTH = 16;

function printable(byte: number): string {
  return byte >= 0x20 && byte < 0x7f ? String.fromCharCode(byte) : ".";
}

/**
 * Classic offset/hex/ascii dump, 16 bytes per line.
 * `start`/`end` select a window; offsets stay absolute.
 */
export function hexdump(bytes: Uint8Array, start = 0, end = bytes.byteLength): string {
  const s = Math.max(0, Math.min(start, bytes.byteLength));
  const e = Math.max(s, Math.min(end, bytes.byteLength));
  const lines: string[] = [];
  for (let off = s; off < e; off += HEXDUMP_WIDTH) {
    const lineEnd = Math.min(off + HEXDUMP_WIDTH, e);
    let hex = "";
    let ascii = "";
    for (let i = off; i < off + HEXDUMP_WIDTH; i++) {
      if (i < lineEnd) {
        const b = bytes[i] ?? 0;
        hex += `${b.toString(16).padStart(2, "0")} `;
        ascii += printable(b);
      } else {
        hex += "   ";
      }
    }
    lines.push(`${off.toString(16).padStart(8, "0")}  ${hex} |${ascii}|`);
  }
  return lines.join("\n");
}

function firstMismatch(actual: Uint8Array, expected: Uint8Array): number {
  const n = Math.min(actual.byteLength, expected.byteLength);
  for (let i = 0; i < n; i++) {
    if (actual[i] !== expected[i]) return i;
  }
  return actual.byteLength === expected.byteLength ? -1 : n;
}

/**
 * Byte-exact comparison with a windowed hexdump of both sides around the first
 * differing offset.
 */
export function assertBytesEqual(actual: Uint8Array, expected: Uint8Array, label = "bytes"): void {
  const at = firstMismatch(actual, expected);
  if (at < 0) return;

  const windowStart = Math.max(0, (at & ~(HEXDUMP_WIDTH - 1)) - HEXDUMP_WIDTH);
  const windowEnd = windowStart + HEXDUMP_WIDTH * 4;
  throw new AssertionError({
    message: [
      `${label}: mismatch at offset ${String(at)} (actual=${String(actual.byteLength)} bytes, expected=${String(expected.byteLength)} bytes)`,
      "actual:",
      hexdump(actual, windowStart, windowEnd),
      "expected:",
      hexdump(expected, windowStart, windowEnd),
    ].join("\n"),
  });
}
