import { jsonEscape, jsonEscapedSizeInBytes } from "../json/escape.js";
import { decimalDigitCount } from "../json/ascii.js";
import type { ByteSink } from "../json/byteSink.js";
import type { Endpoint } from "../model/types.js";
import type { ByteWriter } from "./types.js";

const LBRACE = 0x7b;
const RBRACE = 0x7d;
const QUOTE = 0x22;
const COMMA = 0x2c;

/**
 * `{"serviceName":"..","ipv4":"..","ipv6":"..","port":N}` with every member
 * optional. Commas go between members actually written, so both passes track
 * whether a member came before.
 */
export const ENDPOINT_WRITER: ByteWriter<Endpoint> = Object.freeze({
  sizeInBytes(value: Endpoint): number {
    let sizeInBytes = 1; // {
    if (value.serviceName !== undefined) {
      sizeInBytes += 16; // "serviceName":""
      sizeInBytes += jsonEscapedSizeInBytes(value.serviceName);
    }
    if (value.ipv4 !== undefined) {
      if (sizeInBytes !== 1) sizeInBytes++; // ,
      sizeInBytes += 9; // "ipv4":""
      sizeInBytes += value.ipv4.length;
    }
    if (value.ipv6 !== undefined) {
      if (sizeInBytes !== 1) sizeInBytes++;
      sizeInBytes += 9; // "ipv6":""
      sizeInBytes += value.ipv6.length;
    }
    if (value.port !== undefined) {
      if (sizeInBytes !== 1) sizeInBytes++;
      sizeInBytes += 7; // "port":
      sizeInBytes += decimalDigitCount(value.port);
    }
    return sizeInBytes + 1; // }
  },

  write(value: Endpoint, b: ByteSink): void {
    b.writeByte(LBRACE);
    let wroteField = false;
    if (value.serviceName !== undefined) {
      b.writeAscii('"serviceName":"');
      b.writeUtf8(jsonEscape(value.serviceName));
      b.writeByte(QUOTE);
      wroteField = true;
    }
    if (value.ipv4 !== undefined) {
      if (wroteField) b.writeByte(COMMA);
      b.writeAscii('"ipv4":"');
      b.writeAscii(value.ipv4);
      b.writeByte(QUOTE);
      wroteField = true;
    }
    if (value.ipv6 !== undefined) {
      if (wroteField) b.writeByte(COMMA);
      b.writeAscii('"ipv6":"');
      b.writeAscii(value.ipv6);
      b.writeByte(QUOTE);
      wroteField = true;
    }
    if (value.port !== undefined) {
      if (wroteField) b.writeByte(COMMA);
      b.writeAscii('"port":');
      b.writeDecimal(value.port);
    }
    b.writeByte(RBRACE);
  },
});
