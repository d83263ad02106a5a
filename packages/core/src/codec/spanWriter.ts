/**
 * packages/core/src/codec/spanWriter.ts — Span JSON writer.
 *
 * Member order (fixed):
 *   traceId, parentId?, id, kind?, name?, timestamp?, duration?,
 *   localEndpoint?, remoteEndpoint?, annotations?, tags?, debug?, shared?
 *
 * Invariants:
 *   - traceId and id are always present, so every later member is written with
 *     a leading comma; there is no first-member bookkeeping here
 *   - annotations/tags are omitted when empty; debug/shared only when true
 *   - sizeInBytes() and write() test presence identically and iterate
 *     annotations and tags in the same order
 *   - id lengths are taken from the strings, not assumed to be 16
 */

import { decimalDigitCount } from "../json/ascii.js";
import type { ByteSink } from "../json/byteSink.js";
import { jsonEscape, jsonEscapedSizeInBytes } from "../json/escape.js";
import type { Span } from "../model/types.js";
import { ANNOTATION_WRITER } from "./annotationWriter.js";
import { ENDPOINT_WRITER } from "./endpointWriter.js";
import type { ByteWriter } from "./types.js";

const QUOTE = 0x22;
const COMMA = 0x2c;
const LBRACKET = 0x5b;
const RBRACKET = 0x5d;
const RBRACE = 0x7d;

export const SPAN_WRITER: ByteWriter<Span> = Object.freeze({
  sizeInBytes(value: Span): number {
    let sizeInBytes = 13; // {"traceId":""
    sizeInBytes += value.traceId.length;
    if (value.parentId !== undefined) {
      sizeInBytes += 14; // ,"parentId":""
      sizeInBytes += value.parentId.length;
    }
    sizeInBytes += 8; // ,"id":""
    sizeInBytes += value.id.length;
    if (value.kind !== undefined) {
      sizeInBytes += 10; // ,"kind":""
      sizeInBytes += value.kind.length;
    }
    if (value.name !== undefined) {
      sizeInBytes += 10; // ,"name":""
      sizeInBytes += jsonEscapedSizeInBytes(value.name);
    }
    if (value.timestamp !== undefined) {
      sizeInBytes += 13; // ,"timestamp":
      sizeInBytes += decimalDigitCount(value.timestamp);
    }
    if (value.duration !== undefined) {
      sizeInBytes += 12; // ,"duration":
      sizeInBytes += decimalDigitCount(value.duration);
    }
    if (value.localEndpoint !== undefined) {
      sizeInBytes += 17; // ,"localEndpoint":
      sizeInBytes += ENDPOINT_WRITER.sizeInBytes(value.localEndpoint);
    }
    if (value.remoteEndpoint !== undefined) {
      sizeInBytes += 18; // ,"remoteEndpoint":
      sizeInBytes += ENDPOINT_WRITER.sizeInBytes(value.remoteEndpoint);
    }
    const annotations = value.annotations;
    if (annotations.length > 0) {
      sizeInBytes += 17; // ,"annotations":[]
      sizeInBytes += annotations.length - 1; // commas
      for (const annotation of annotations) {
        sizeInBytes += ANNOTATION_WRITER.sizeInBytes(annotation);
      }
    }
    const tags = value.tags;
    if (tags.size > 0) {
      sizeInBytes += 10; // ,"tags":{}
      sizeInBytes += tags.size - 1; // commas
      for (const [key, tagValue] of tags) {
        sizeInBytes += 5; // "":""
        sizeInBytes += jsonEscapedSizeInBytes(key);
        sizeInBytes += jsonEscapedSizeInBytes(tagValue);
      }
    }
    if (value.debug === true) {
      sizeInBytes += 13; // ,"debug":true
    }
    if (value.shared === true) {
      sizeInBytes += 14; // ,"shared":true
    }
    return sizeInBytes + 1; // }
  },

  write(value: Span, b: ByteSink): void {
    b.writeAscii('{"traceId":"');
    b.writeAscii(value.traceId);
    b.writeByte(QUOTE);
    if (value.parentId !== undefined) {
      b.writeAscii(',"parentId":"');
      b.writeAscii(value.parentId);
      b.writeByte(QUOTE);
    }
    b.writeAscii(',"id":"');
    b.writeAscii(value.id);
    b.writeByte(QUOTE);
    if (value.kind !== undefined) {
      b.writeAscii(',"kind":"');
      b.writeAscii(value.kind);
      b.writeByte(QUOTE);
    }
    if (value.name !== undefined) {
      b.writeAscii(',"name":"');
      b.writeUtf8(jsonEscape(value.name));
      b.writeByte(QUOTE);
    }
    if (value.timestamp !== undefined) {
      b.writeAscii(',"timestamp":');
      b.writeDecimal(value.timestamp);
    }
    if (value.duration !== undefined) {
      b.writeAscii(',"duration":');
      b.writeDecimal(value.duration);
    }
    if (value.localEndpoint !== undefined) {
      b.writeAscii(',"localEndpoint":');
      ENDPOINT_WRITER.write(value.localEndpoint, b);
    }
    if (value.remoteEndpoint !== undefined) {
      b.writeAscii(',"remoteEndpoint":');
      ENDPOINT_WRITER.write(value.remoteEndpoint, b);
    }
    const annotations = value.annotations;
    if (annotations.length > 0) {
      b.writeAscii(',"annotations":');
      b.writeByte(LBRACKET);
      let i = 0;
      for (const annotation of annotations) {
        if (i++ > 0) b.writeByte(COMMA);
        ANNOTATION_WRITER.write(annotation, b);
      }
      b.writeByte(RBRACKET);
    }
    const tags = value.tags;
    if (tags.size > 0) {
      b.writeAscii(',"tags":{');
      let i = 0;
      for (const [key, tagValue] of tags) {
        if (i++ > 0) b.writeByte(COMMA);
        b.writeByte(QUOTE);
        b.writeUtf8(jsonEscape(key));
        b.writeAscii('":"');
        b.writeUtf8(jsonEscape(tagValue));
        b.writeByte(QUOTE);
      }
      b.writeByte(RBRACE);
    }
    if (value.debug === true) {
      b.writeAscii(',"debug":true');
    }
    if (value.shared === true) {
      b.writeAscii(',"shared":true');
    }
    b.writeByte(RBRACE);
  },
});
