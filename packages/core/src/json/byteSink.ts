/**
 * packages/core/src/json/byteSink.ts — Write primitives over a caller buffer.
 *
 * Why: Writers emit straight into the exact-size output. The sink never grows,
 * and it counts every byte it was asked to write, including writes that fell
 * past the end of the buffer; callers compare `position` against the size they
 * computed to detect a size/write disagreement.
 */

import type { U64 } from "../model/types.js";
import { decimalDigitCount } from "./ascii.js";
import { utf8SizeInBytes } from "./escape.js";

export type Utf8EncoderInto = Readonly<{
  encodeInto(input: string, destination: Uint8Array): Readonly<{ read?: number; written?: number }>;
}>;

export interface ByteSink {
  /** Absolute offset of the next byte in the underlying buffer. */
  readonly position: number;
  writeByte(byte: number): void;
  /** Pre-validated ASCII; no escaping, one byte per code unit. */
  writeAscii(text: string): void;
  /** Already-escaped text, encoded as UTF-8. */
  writeUtf8(text: string): void;
  /** Unsigned integer as decimal ASCII digits. */
  writeDecimal(value: U64): void;
}

const DIGIT_0 = 0x30;

const defaultEncoder: Utf8EncoderInto = new TextEncoder();

export class ArrayByteSink implements ByteSink {
  private pos: number;

  constructor(
    private readonly buf: Uint8Array,
    offset = 0,
    private readonly encoder: Utf8EncoderInto = defaultEncoder,
  ) {
    this.pos = offset;
  }

  get position(): number {
    return this.pos;
  }

  writeByte(byte: number): void {
    this.buf[this.pos] = byte;
    this.pos++;
  }

  writeAscii(text: string): void {
    const buf = this.buf;
    let pos = this.pos;
    for (let i = 0; i < text.length; i++) {
      buf[pos++] = text.charCodeAt(i) & 0x7f;
    }
    this.pos = pos;
  }

  writeUtf8(text: string): void {
    const buf = this.buf;
    let pos = this.pos;
    let i = 0;
    for (; i < text.length; i++) {
      const c = text.charCodeAt(i);
      if (c > 0x7f) break;
      buf[pos++] = c;
    }
    this.pos = pos;
    if (i === text.length) return;

    const rest = text.slice(i);
    const dst = pos < buf.byteLength ? buf.subarray(pos) : new Uint8Array(0);
    const result = this.encoder.encodeInto(rest, dst);
    const read = result.read ?? 0;
    const written = result.written ?? 0;
    this.pos += written;
    if (read < rest.length) {
      // Out of room: account for the bytes that did not fit.
      this.pos += utf8SizeInBytes(rest.slice(read));
    }
  }

  writeDecimal(value: U64): void {
    if (typeof value === "bigint") {
      this.writeAscii(value.toString());
      return;
    }
    const digits = decimalDigitCount(value);
    let rest = value;
    for (let i = digits - 1; i >= 0; i--) {
      this.buf[this.pos + i] = DIGIT_0 + (rest % 10);
      rest = Math.floor(rest / 10);
    }
    this.pos += digits;
  }
}
