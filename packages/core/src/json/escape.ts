/**
 * packages/core/src/json/escape.ts — JSON string escaping and UTF-8 sizing.
 *
 * Why: Every free-text member is sized before it is written. The size function
 * and the escape function walk the same replacement table so an escaped string
 * always encodes to exactly `jsonEscapedSizeInBytes()` UTF-8 bytes.
 *
 * Rules:
 *   - `"` and `\` get a backslash
 *   - U+0008, U+0009, U+000A, U+000C, U+000D use their short forms
 *   - other code units below U+0020 become `\u00XX`
 *   - U+2028 and U+2029 become `\u2028` and `\u2029`
 *   - lone surrogates are left in place; the UTF-8 writer emits U+FFFD (3 bytes)
 */

const HEX = "0123456789abcdef";

const CONTROL_REPLACEMENTS: readonly string[] = (() => {
  const out: string[] = [];
  for (let c = 0; c < 0x20; c++) {
    out.push(`\\u00${HEX[c >> 4] ?? "0"}${HEX[c & 0xf] ?? "0"}`);
  }
  out[0x08] = "\\b";
  out[0x09] = "\\t";
  out[0x0a] = "\\n";
  out[0x0c] = "\\f";
  out[0x0d] = "\\r";
  return Object.freeze(out);
})();

const QUOTE = 0x22;
const BACKSLASH = 0x5c;
const LINE_SEPARATOR = 0x2028;
const PARAGRAPH_SEPARATOR = 0x2029;

function isHighSurrogate(c: number): boolean {
  return c >= 0xd800 && c <= 0xdbff;
}

function isLowSurrogate(c: number): boolean {
  return c >= 0xdc00 && c <= 0xdfff;
}

/** Replacement for a code unit, or null when it is written as-is. */
function replacementFor(c: number): string | null {
  if (c < 0x20) return CONTROL_REPLACEMENTS[c] ?? null;
  if (c === QUOTE) return '\\"';
  if (c === BACKSLASH) return "\\\\";
  if (c === LINE_SEPARATOR) return "\\u2028";
  if (c === PARAGRAPH_SEPARATOR) return "\\u2029";
  return null;
}

/**
 * UTF-8 byte length of a JS string, counting each lone surrogate as the
 * 3-byte U+FFFD that TextEncoder substitutes for it.
 */
export function utf8SizeInBytes(text: string): number {
  let size = 0;
  for (let i = 0; i < text.length; i++) {
    const c = text.charCodeAt(i);
    if (c < 0x80) {
      size += 1;
    } else if (c < 0x800) {
      size += 2;
    } else if (isHighSurrogate(c) && isLowSurrogate(text.charCodeAt(i + 1))) {
      size += 4;
      i++;
    } else {
      size += 3;
    }
  }
  return size;
}

/** Bytes the string occupies once escaped, excluding the surrounding quotes. */
export function jsonEscapedSizeInBytes(text: string): number {
  let size = 0;
  for (let i = 0; i < text.length; i++) {
    const c = text.charCodeAt(i);
    const replacement = replacementFor(c);
    if (replacement !== null) {
      size += replacement.length;
    } else if (c < 0x80) {
      size += 1;
    } else if (c < 0x800) {
      size += 2;
    } else if (isHighSurrogate(c) && isLowSurrogate(text.charCodeAt(i + 1))) {
      size += 4;
      i++;
    } else {
      size += 3;
    }
  }
  return size;
}

/**
 * Escape a string for embedding between JSON quotes.
 * Returns the input unchanged (no allocation) when nothing needs escaping.
 */
export function jsonEscape(text: string): string {
  let out: string | null = null;
  let last = 0;
  for (let i = 0; i < text.length; i++) {
    const replacement = replacementFor(text.charCodeAt(i));
    if (replacement === null) continue;
    out = (out ?? "") + text.slice(last, i) + replacement;
    last = i + 1;
  }
  if (out === null) return text;
  return last < text.length ? out + text.slice(last) : out;
}
