import { decimalDigitCount } from "../json/ascii.js";
import type { ByteSink } from "../json/byteSink.js";
import { jsonEscape, jsonEscapedSizeInBytes } from "../json/escape.js";
import type { Annotation } from "../model/types.js";
import type { ByteWriter } from "./types.js";

/** Fixed shape: `{"timestamp":N,"value":".."}`. */
export const ANNOTATION_WRITER: ByteWriter<Annotation> = Object.freeze({
  sizeInBytes(value: Annotation): number {
    return (
      25 + // {"timestamp":,"value":""}
      decimalDigitCount(value.timestamp) +
      jsonEscapedSizeInBytes(value.value)
    );
  },

  write(value: Annotation, b: ByteSink): void {
    b.writeAscii('{"timestamp":');
    b.writeDecimal(value.timestamp);
    b.writeAscii(',"value":"');
    b.writeUtf8(jsonEscape(value.value));
    b.writeAscii('"}');
  },
});
