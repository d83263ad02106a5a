/**
 * @spanwire/node
 *
 * Node host layer: environment-driven encoder options and the optional
 * encode audit log.
 */

import {
  type EncodingKind,
  type Span,
  type SpanBytesEncoder,
  type SpanBytesEncoderOpts,
  createSpanBytesEncoder,
} from "@spanwire/core";
import { type SpanwireEnv, readSpanwireEnv } from "./config.js";
import { type EncodeAudit, createEncodeAudit } from "./encodeAudit.js";

export {
  DEFAULT_ENCODE_AUDIT_LOG,
  readSpanwireEnv,
  type EncodeAuditConfig,
  type SpanwireEnv,
  type SpanwireEnvConfig,
} from "./config.js";
export {
  bytesFingerprint,
  createEncodeAudit,
  type BytesFingerprint,
  type EncodeAudit,
  type EncodeAuditOp,
  type StderrWrite,
} from "./encodeAudit.js";

export type NodeSpanEncoderOpts = SpanBytesEncoderOpts &
  Readonly<{
    kind?: EncodingKind;
    /** Defaults to process.env. */
    env?: SpanwireEnv;
    /** Replaces the audit configured by the environment. */
    audit?: EncodeAudit;
  }>;

/**
 * Create a span encoder whose options default from SPANWIRE_* variables.
 * Explicit options win over the environment.
 */
export function createNodeSpanEncoder(opts: NodeSpanEncoderOpts = {}): SpanBytesEncoder {
  const config = readSpanwireEnv(opts.env);
  const inner = createSpanBytesEncoder(opts.kind ?? "JSON", {
    validateParams: opts.validateParams ?? config.validateParams,
    maxSpanBytes: opts.maxSpanBytes ?? config.maxSpanBytes,
    maxListBytes: opts.maxListBytes ?? config.maxListBytes,
  });
  const audit = opts.audit ?? createEncodeAudit(config.audit);
  if (!audit.enabled) return inner;

  return Object.freeze({
    encoding: inner.encoding,
    sizeInBytes: (span: Span) => inner.sizeInBytes(span),
    listSizeInBytes: (spans: readonly Span[]) => inner.listSizeInBytes(spans),
    encode: (span: Span) => audit.observe("encode", 1, () => inner.encode(span)),
    encodeInto: (span: Span, dst: Uint8Array, offset?: number) =>
      audit.observe("encodeInto", 1, () => inner.encodeInto(span, dst, offset)),
    encodeList: (spans: readonly Span[]) =>
      audit.observe("encodeList", spans.length, () => inner.encodeList(spans)),
    encodeListInto: (spans: readonly Span[], dst: Uint8Array, offset?: number) =>
      audit.observe("encodeListInto", spans.length, () => inner.encodeListInto(spans, dst, offset)),
  });
}
