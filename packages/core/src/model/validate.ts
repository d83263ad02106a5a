/**
 * packages/core/src/model/validate.ts — Boundary checks for span records.
 *
 * Why: The writers trust their input (ids are written without escaping, sizes
 * are derived from string lengths). These checks run once per span before
 * encoding when `validateParams` is on, and report the first violated rule.
 */

import {
  ID_HEX_LENGTH,
  SPAN_KINDS,
  type SpanKind,
  TRACE_ID_128_HEX_LENGTH,
  U16_MAX,
  U64_MAX,
} from "../format.js";
import type { Endpoint, Span, U64 } from "./types.js";

const LOWER_HEX_RE = /^[0-9a-f]+$/;

export function isLowerHex(value: unknown, length: number): value is string {
  return typeof value === "string" && value.length === length && LOWER_HEX_RE.test(value);
}

export function isTraceId(value: unknown): value is string {
  return isLowerHex(value, ID_HEX_LENGTH) || isLowerHex(value, TRACE_ID_128_HEX_LENGTH);
}

export function isSpanKind(value: unknown): value is SpanKind {
  return SPAN_KINDS.some((kind) => kind === value);
}

export function isU64(value: unknown): value is U64 {
  if (typeof value === "bigint") return value >= 0n && value <= U64_MAX;
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

/** Printable ASCII without `"` or `\`, so the literal can be written unescaped. */
function isSafeAsciiLiteral(value: unknown): value is string {
  if (typeof value !== "string" || value.length === 0) return false;
  for (let i = 0; i < value.length; i++) {
    const c = value.charCodeAt(i);
    if (c <= 0x20 || c >= 0x7f || c === 0x22 || c === 0x5c) return false;
  }
  return true;
}

function describeValue(value: unknown): string {
  return typeof value === "string" ? JSON.stringify(value) : `${typeof value} ${String(value)}`;
}

export function validateEndpoint(endpoint: Endpoint, field: string): string | null {
  if (typeof endpoint !== "object" || endpoint === null) {
    return `${field} must be an object`;
  }
  const { serviceName, ipv4, ipv6, port } = endpoint;
  if (serviceName !== undefined && typeof serviceName !== "string") {
    return `${field}.serviceName must be a string (got ${describeValue(serviceName)})`;
  }
  if (ipv4 !== undefined && !isSafeAsciiLiteral(ipv4)) {
    return `${field}.ipv4 must be a printable ASCII literal (got ${describeValue(ipv4)})`;
  }
  if (ipv6 !== undefined && !isSafeAsciiLiteral(ipv6)) {
    return `${field}.ipv6 must be a printable ASCII literal (got ${describeValue(ipv6)})`;
  }
  if (port !== undefined && !(Number.isInteger(port) && port >= 0 && port <= U16_MAX)) {
    return `${field}.port must be a u16 (got ${describeValue(port)})`;
  }
  return null;
}

/**
 * Returns null when the span satisfies every writer precondition, otherwise a
 * detail string naming the first offending member.
 */
export function validateSpan(span: Span): string | null {
  if (typeof span !== "object" || span === null) return "span must be an object";

  if (!isTraceId(span.traceId)) {
    return `traceId must be 16 or 32 lowercase hex characters (got ${describeValue(span.traceId)})`;
  }
  if (span.parentId !== undefined && !isLowerHex(span.parentId, ID_HEX_LENGTH)) {
    return `parentId must be 16 lowercase hex characters (got ${describeValue(span.parentId)})`;
  }
  if (!isLowerHex(span.id, ID_HEX_LENGTH)) {
    return `id must be 16 lowercase hex characters (got ${describeValue(span.id)})`;
  }
  if (span.kind !== undefined && !isSpanKind(span.kind)) {
    return `kind must be one of ${SPAN_KINDS.join(", ")} (got ${describeValue(span.kind)})`;
  }
  if (span.name !== undefined && typeof span.name !== "string") {
    return `name must be a string (got ${describeValue(span.name)})`;
  }
  if (span.timestamp !== undefined && !isU64(span.timestamp)) {
    return `timestamp must be a u64 (got ${describeValue(span.timestamp)})`;
  }
  if (span.duration !== undefined && !isU64(span.duration)) {
    return `duration must be a u64 (got ${describeValue(span.duration)})`;
  }
  if (span.localEndpoint !== undefined) {
    const detail = validateEndpoint(span.localEndpoint, "localEndpoint");
    if (detail !== null) return detail;
  }
  if (span.remoteEndpoint !== undefined) {
    const detail = validateEndpoint(span.remoteEndpoint, "remoteEndpoint");
    if (detail !== null) return detail;
  }

  if (!Array.isArray(span.annotations)) return "annotations must be an array";
  for (let i = 0; i < span.annotations.length; i++) {
    const a = span.annotations[i];
    if (typeof a !== "object" || a === null) return `annotations[${i}] must be an object`;
    if (!isU64(a.timestamp)) {
      return `annotations[${i}].timestamp must be a u64 (got ${describeValue(a.timestamp)})`;
    }
    if (typeof a.value !== "string") {
      return `annotations[${i}].value must be a string (got ${describeValue(a.value)})`;
    }
  }

  if (!(span.tags instanceof Map)) return "tags must be a Map";
  for (const [key, value] of span.tags) {
    if (typeof key !== "string") return `tags keys must be strings (got ${describeValue(key)})`;
    if (typeof value !== "string") {
      return `tags[${JSON.stringify(key)}] must be a string (got ${describeValue(value)})`;
    }
  }

  if (span.debug !== undefined && typeof span.debug !== "boolean") {
    return `debug must be a boolean (got ${describeValue(span.debug)})`;
  }
  if (span.shared !== undefined && typeof span.shared !== "boolean") {
    return `shared must be a boolean (got ${describeValue(span.shared)})`;
  }
  return null;
}
