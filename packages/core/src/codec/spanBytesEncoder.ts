/**
 * packages/core/src/codec/spanBytesEncoder.ts — Public span encoder.
 *
 * Why: Wraps the size/write writer pairs with boundary validation, size caps
 * and a post-write length check, and selects the writers for an encoding kind.
 *
 * Invariants:
 *   - encode() allocates exactly sizeInBytes() bytes; there is no resize path
 *   - encodeInto() writes only inside [offset, offset + size) of `dst`
 *   - A written length that differs from the computed size is reported as
 *     SPAN_INTERNAL, never returned as bytes
 *   - Failures are returned, not thrown
 */

import { type EncodingKind, SpanwireError } from "../format.js";
import { ArrayByteSink } from "../json/byteSink.js";
import type { Span } from "../model/types.js";
import { validateSpan } from "../model/validate.js";
import { ENCODINGS, isEncodingKind } from "./encoding.js";
import { createJsonListWriter } from "./listWriter.js";
import { SPAN_WRITER } from "./spanWriter.js";
import type {
  ByteWriter,
  Encoding,
  SpanBytesEncoder,
  SpanEncodeErrorCode,
  SpanEncodeResult,
} from "./types.js";

export type SpanBytesEncoderOpts = Readonly<{
  /**
   * If false, skips per-span validation.
   *
   * Safety: The writers trust their input. An unvalidated span with, say, a
   * non-ASCII id still encodes to the computed length but is not valid output.
   */
  validateParams?: boolean;
  /** Cap for a single encoded span. */
  maxSpanBytes?: number;
  /** Cap for an encoded list message. */
  maxListBytes?: number;
}>;

/* --- Default Caps --- */

export const DEFAULT_MAX_SPAN_BYTES = 4 * 1024 * 1024; /* 4 MiB */
export const DEFAULT_MAX_LIST_BYTES = 16 * 1024 * 1024; /* 16 MiB */

type EncoderVariant = Readonly<{
  encoding: Encoding;
  span: ByteWriter<Span>;
  list: ByteWriter<readonly Span[]>;
}>;

const VARIANTS: Readonly<Record<EncodingKind, EncoderVariant>> = Object.freeze({
  JSON: Object.freeze({
    encoding: ENCODINGS.JSON,
    span: SPAN_WRITER,
    list: createJsonListWriter(SPAN_WRITER),
  }),
});

function fail(code: SpanEncodeErrorCode, detail: string): SpanEncodeResult {
  return { ok: false, error: { code, detail } };
}

function requirePositiveInt(name: string, v: number): number {
  if (!Number.isFinite(v) || !Number.isInteger(v) || v <= 0) {
    throw new SpanwireError(
      "SPANWIRE_INVALID_OPTIONS",
      `createSpanBytesEncoder: ${name} must be a positive integer (got ${String(v)})`,
    );
  }
  if (v > 0x7fff_ffff) {
    throw new SpanwireError(
      "SPANWIRE_INVALID_OPTIONS",
      `createSpanBytesEncoder: ${name} must be <= 2147483647 (got ${String(v)})`,
    );
  }
  return v;
}

class WriterSpanBytesEncoder implements SpanBytesEncoder {
  readonly encoding: Encoding;

  private readonly spanWriter: ByteWriter<Span>;
  private readonly listWriter: ByteWriter<readonly Span[]>;
  private readonly validateParams: boolean;
  private readonly maxSpanBytes: number;
  private readonly maxListBytes: number;

  constructor(variant: EncoderVariant, opts: SpanBytesEncoderOpts) {
    this.encoding = variant.encoding;
    this.spanWriter = variant.span;
    this.listWriter = variant.list;
    this.validateParams = opts.validateParams !== false;
    this.maxSpanBytes = requirePositiveInt(
      "maxSpanBytes",
      opts.maxSpanBytes ?? DEFAULT_MAX_SPAN_BYTES,
    );
    this.maxListBytes = requirePositiveInt(
      "maxListBytes",
      opts.maxListBytes ?? DEFAULT_MAX_LIST_BYTES,
    );
  }

  sizeInBytes(span: Span): number {
    return this.spanWriter.sizeInBytes(span);
  }

  listSizeInBytes(spans: readonly Span[]): number {
    return this.listWriter.sizeInBytes(spans);
  }

  encode(span: Span): SpanEncodeResult {
    const checked = this.checkSpan("encode", span);
    if (checked) return checked;

    const size = this.spanWriter.sizeInBytes(span);
    if (size > this.maxSpanBytes) {
      return fail(
        "SPAN_TOO_LARGE",
        `encode: maxSpanBytes exceeded (bytes=${size}, max=${this.maxSpanBytes})`,
      );
    }
    return this.writeExact("encode", this.spanWriter, span, new Uint8Array(size), 0, size);
  }

  encodeInto(span: Span, dst: Uint8Array, offset = 0): SpanEncodeResult {
    const checked =
      this.checkSpan("encodeInto", span) ?? this.checkDestination("encodeInto", dst, offset);
    if (checked) return checked;

    const size = this.spanWriter.sizeInBytes(span);
    if (size > this.maxSpanBytes) {
      return fail(
        "SPAN_TOO_LARGE",
        `encodeInto: maxSpanBytes exceeded (bytes=${size}, max=${this.maxSpanBytes})`,
      );
    }
    return this.writeExact("encodeInto", this.spanWriter, span, dst, offset, size);
  }

  encodeList(spans: readonly Span[]): SpanEncodeResult {
    const checked = this.checkList("encodeList", spans);
    if (checked) return checked;

    const size = this.listWriter.sizeInBytes(spans);
    if (size > this.maxListBytes) {
      return fail(
        "SPAN_TOO_LARGE",
        `encodeList: maxListBytes exceeded (bytes=${size}, max=${this.maxListBytes})`,
      );
    }
    return this.writeExact("encodeList", this.listWriter, spans, new Uint8Array(size), 0, size);
  }

  encodeListInto(spans: readonly Span[], dst: Uint8Array, offset = 0): SpanEncodeResult {
    const checked =
      this.checkList("encodeListInto", spans) ??
      this.checkDestination("encodeListInto", dst, offset);
    if (checked) return checked;

    const size = this.listWriter.sizeInBytes(spans);
    if (size > this.maxListBytes) {
      return fail(
        "SPAN_TOO_LARGE",
        `encodeListInto: maxListBytes exceeded (bytes=${size}, max=${this.maxListBytes})`,
      );
    }
    return this.writeExact("encodeListInto", this.listWriter, spans, dst, offset, size);
  }

  private checkSpan(method: string, span: Span): SpanEncodeResult | null {
    if (!this.validateParams) return null;
    const detail = validateSpan(span);
    return detail === null ? null : fail("SPAN_BAD_PARAMS", `${method}: ${detail}`);
  }

  private checkList(method: string, spans: readonly Span[]): SpanEncodeResult | null {
    if (!Array.isArray(spans)) {
      return fail("SPAN_BAD_PARAMS", `${method}: spans must be an array`);
    }
    if (!this.validateParams) return null;
    for (let i = 0; i < spans.length; i++) {
      const span = spans[i];
      const detail = span === undefined ? "span must be an object" : validateSpan(span);
      if (detail !== null) return fail("SPAN_BAD_PARAMS", `${method}: spans[${i}]: ${detail}`);
    }
    return null;
  }

  private checkDestination(
    method: string,
    dst: Uint8Array,
    offset: number,
  ): SpanEncodeResult | null {
    if (!(dst instanceof Uint8Array)) {
      return fail("SPAN_BAD_PARAMS", `${method}: dst must be a Uint8Array`);
    }
    if (!Number.isInteger(offset) || offset < 0 || offset > dst.byteLength) {
      return fail(
        "SPAN_BAD_PARAMS",
        `${method}: offset out of range (offset=${String(offset)}, byteLength=${dst.byteLength})`,
      );
    }
    return null;
  }

  private writeExact<T>(
    method: string,
    writer: ByteWriter<T>,
    value: T,
    dst: Uint8Array,
    offset: number,
    size: number,
  ): SpanEncodeResult {
    const available = dst.byteLength - offset;
    if (size > available) {
      return fail(
        "SPAN_TOO_LARGE",
        `${method}: destination too small (required=${size}, available=${available})`,
      );
    }

    const out = size === dst.byteLength ? dst : dst.subarray(offset, offset + size);
    const sink = new ArrayByteSink(out);
    writer.write(value, sink);
    if (sink.position !== size) {
      return fail(
        "SPAN_INTERNAL",
        `${method}: wrote ${sink.position} bytes but computed ${size}`,
      );
    }
    return { ok: true, bytes: out };
  }
}

/**
 * Create a span encoder for an encoding kind.
 *
 * @throws SpanwireError SPANWIRE_UNKNOWN_ENCODING or SPANWIRE_INVALID_OPTIONS
 */
export function createSpanBytesEncoder(
  kind: EncodingKind = "JSON",
  opts: SpanBytesEncoderOpts = {},
): SpanBytesEncoder {
  if (!isEncodingKind(kind)) {
    throw new SpanwireError(
      "SPANWIRE_UNKNOWN_ENCODING",
      `createSpanBytesEncoder: unknown encoding ${JSON.stringify(String(kind))}`,
    );
  }
  return new WriterSpanBytesEncoder(VARIANTS[kind], opts);
}

/** Returns the bytes of a successful result, or throws SPANWIRE_ENCODE_FAILED. */
export function unwrapEncoded(result: SpanEncodeResult): Uint8Array {
  if (result.ok) return result.bytes;
  throw new SpanwireError(
    "SPANWIRE_ENCODE_FAILED",
    `${result.error.code}: ${result.error.detail}`,
  );
}
