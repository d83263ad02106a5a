/**
 * @spanwire/core
 *
 * Runtime-agnostic span encoders.
 * This package MUST NOT use Node-specific APIs (Buffer, node:* imports).
 */

// =============================================================================
// Format pins + errors
// =============================================================================

export {
  SPAN_KINDS,
  type SpanKind,
  ENCODING_KINDS,
  type EncodingKind,
  JSON_MEDIA_TYPE,
  ID_HEX_LENGTH,
  TRACE_ID_128_HEX_LENGTH,
  SpanwireError,
  type SpanwireErrorCode,
} from "./format.js";

// =============================================================================
// Model
// =============================================================================

export type { Annotation, Endpoint, Span, U64 } from "./model/types.js";
export {
  createEndpoint,
  createSpan,
  normalizeHexId,
  normalizeTraceId,
  type EndpointBuildResult,
  type SpanBuildResult,
  type SpanInput,
  type TagsInput,
} from "./model/span.js";
export { isU64, validateEndpoint, validateSpan } from "./model/validate.js";

// =============================================================================
// JSON primitives
// =============================================================================

export { jsonEscape, jsonEscapedSizeInBytes, utf8SizeInBytes } from "./json/escape.js";
export { decimalDigitCount } from "./json/ascii.js";
export { ArrayByteSink, type ByteSink, type Utf8EncoderInto } from "./json/byteSink.js";

// =============================================================================
// Encoders
// =============================================================================

export type {
  ByteWriter,
  Encoding,
  SpanBytesEncoder,
  SpanEncodeError,
  SpanEncodeErrorCode,
  SpanEncodeResult,
} from "./codec/types.js";
export { ENDPOINT_WRITER } from "./codec/endpointWriter.js";
export { ANNOTATION_WRITER } from "./codec/annotationWriter.js";
export { SPAN_WRITER } from "./codec/spanWriter.js";
export { createJsonListWriter, jsonListSizeInBytes } from "./codec/listWriter.js";
export { ENCODINGS, JSON_ENCODING, isEncodingKind } from "./codec/encoding.js";
export {
  DEFAULT_MAX_LIST_BYTES,
  DEFAULT_MAX_SPAN_BYTES,
  createSpanBytesEncoder,
  unwrapEncoded,
  type SpanBytesEncoderOpts,
} from "./codec/spanBytesEncoder.js";
