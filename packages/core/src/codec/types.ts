/**
 * packages/core/src/codec/types.ts — Span encoder type definitions.
 *
 * Why: Every encoding unit (endpoint, annotation, span, list) implements the
 * same two-method contract: compute the exact size, then write exactly that
 * many bytes. The public encoder wraps those units behind result unions.
 */

import type { EncodingKind } from "../format.js";
import type { ByteSink } from "../json/byteSink.js";
import type { Span } from "../model/types.js";

/**
 * Size-then-write pair for one value type.
 *
 * Contract: `write(value, sink)` advances `sink.position` by exactly
 * `sizeInBytes(value)`. Writers do not validate; a value that breaks a caller
 * precondition is undefined behavior.
 */
export interface ByteWriter<T> {
  sizeInBytes(value: T): number;
  write(value: T, sink: ByteSink): void;
}

/**
 * Error codes for span encode failures.
 *
 * Error categories:
 *   - SPAN_BAD_PARAMS: A span failed boundary validation
 *   - SPAN_TOO_LARGE: Output exceeds the configured cap or the destination buffer
 *   - SPAN_INTERNAL: Written length differs from the computed size (should never occur)
 */
export type SpanEncodeErrorCode = "SPAN_BAD_PARAMS" | "SPAN_TOO_LARGE" | "SPAN_INTERNAL";

/** Structured encode error with diagnostic context. */
export type SpanEncodeError = Readonly<{ code: SpanEncodeErrorCode; detail: string }>;

/**
 * Discriminated union result type for encode operations.
 * On success, bytes is exactly the encoded message.
 */
export type SpanEncodeResult =
  | Readonly<{ ok: true; bytes: Uint8Array }>
  | Readonly<{ ok: false; error: SpanEncodeError }>;

/** Describes one encoding variant. */
export type Encoding = Readonly<{
  kind: EncodingKind;
  mediaType: string;
  /** Size of a list message whose elements encode to `sizes` bytes each. */
  listSizeInBytes(sizes: readonly number[]): number;
}>;

/**
 * Span encoder interface.
 *
 * Usage pattern:
 *   1. `sizeInBytes(span)` to learn the exact length
 *   2. `encode(span)` (allocates exactly that length) or `encodeInto(span, dst)`
 *
 * Ownership: `encode*()` output is owned by the caller. `encodeInto()` returns a
 * view of `dst`; the encoder keeps no reference to it after returning.
 */
export interface SpanBytesEncoder {
  readonly encoding: Encoding;
  /** Exact encoded length. Does not validate. */
  sizeInBytes(span: Span): number;
  /** Exact encoded length of a list message. Does not validate. */
  listSizeInBytes(spans: readonly Span[]): number;
  encode(span: Span): SpanEncodeResult;
  /** Write into `dst` starting at `offset`; fails with SPAN_TOO_LARGE when it does not fit. */
  encodeInto(span: Span, dst: Uint8Array, offset?: number): SpanEncodeResult;
  encodeList(spans: readonly Span[]): SpanEncodeResult;
  encodeListInto(spans: readonly Span[], dst: Uint8Array, offset?: number): SpanEncodeResult;
}
