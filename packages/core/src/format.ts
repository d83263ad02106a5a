/**
 * Wire-format pins and error types for spanwire.
 */

// =============================================================================
// Format pins
// =============================================================================

/**
 * Span kinds accepted in the `kind` member.
 * Written verbatim as ASCII; the set is closed.
 */
export const SPAN_KINDS = ["CLIENT", "SERVER", "PRODUCER", "CONSUMER"] as const;

export type SpanKind = (typeof SPAN_KINDS)[number];

/** Encoding variants. Adding a binary format means adding a member here and a registry entry. */
export const ENCODING_KINDS = ["JSON"] as const;

export type EncodingKind = (typeof ENCODING_KINDS)[number];

export const JSON_MEDIA_TYPE = "application/json";

/** Width of a span/parent id, and the short width of a trace id, in hex characters. */
export const ID_HEX_LENGTH = 16;
/** 128-bit trace id width in hex characters. */
export const TRACE_ID_128_HEX_LENGTH = 32;

export const U16_MAX = 0xffff;
export const U64_MAX = 0xffff_ffff_ffff_ffffn;

// =============================================================================
// SpanwireErrorCode Union
// =============================================================================

/**
 * Codes surfaced as SpanwireError instances.
 * Encode failures are normally returned as results; these cover the throwing paths.
 */
export type SpanwireErrorCode =
  | "SPANWIRE_INVALID_OPTIONS"
  | "SPANWIRE_UNKNOWN_ENCODING"
  | "SPANWIRE_ENCODE_FAILED";

// =============================================================================
// SpanwireError Class
// =============================================================================

export class SpanwireError extends Error {
  override readonly name = "SpanwireError";
  readonly code: SpanwireErrorCode;

  constructor(code: SpanwireErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SpanwireError);
    }
  }
}
