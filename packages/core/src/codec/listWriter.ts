import type { ByteSink } from "../json/byteSink.js";
import type { ByteWriter } from "./types.js";

const LBRACKET = 0x5b;
const RBRACKET = 0x5d;
const COMMA = 0x2c;

/** `[` + elements joined by `,` + `]`; an empty list is `[]`. */
export function jsonListSizeInBytes(sizes: readonly number[]): number {
  let sizeInBytes = 2; // []
  if (sizes.length > 1) sizeInBytes += sizes.length - 1; // commas
  for (const size of sizes) sizeInBytes += size;
  return sizeInBytes;
}

/** Lifts an element writer to a JSON array writer with the same size/write duality. */
export function createJsonListWriter<T>(element: ByteWriter<T>): ByteWriter<readonly T[]> {
  return Object.freeze({
    sizeInBytes(values: readonly T[]): number {
      let sizeInBytes = 2;
      if (values.length > 1) sizeInBytes += values.length - 1;
      for (const value of values) sizeInBytes += element.sizeInBytes(value);
      return sizeInBytes;
    },

    write(values: readonly T[], b: ByteSink): void {
      b.writeByte(LBRACKET);
      let i = 0;
      for (const value of values) {
        if (i++ > 0) b.writeByte(COMMA);
        element.write(value, b);
      }
      b.writeByte(RBRACKET);
    },
  });
}
