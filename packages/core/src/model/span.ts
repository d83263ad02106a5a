/**
 * packages/core/src/model/span.ts — Span and endpoint construction.
 *
 * Why: Reporters build spans from loosely-shaped instrumentation data. These
 * helpers normalize that data once (id casing and width, tag order, flags) so
 * the result is a frozen record the encoders can size and write without
 * surprises.
 *
 * Normalization:
 *   - hex ids are lowercased and left-padded with "0" (traceId to 16 or 32,
 *     id/parentId to 16)
 *   - empty or all-zero traceId/id are rejected
 *   - an all-zero parentId means "no parent" and is dropped
 *   - tags are copied into a new Map sorted by key
 *   - debug/shared are kept only when true
 */

import { ID_HEX_LENGTH, type SpanKind, TRACE_ID_128_HEX_LENGTH } from "../format.js";
import type { SpanEncodeError } from "../codec/types.js";
import type { Annotation, Endpoint, Span, U64 } from "./types.js";
import { validateEndpoint, validateSpan } from "./validate.js";

export type TagsInput = ReadonlyMap<string, string> | Readonly<Record<string, string>>;

export type SpanInput = Readonly<{
  traceId: string;
  parentId?: string;
  id: string;
  kind?: SpanKind;
  name?: string;
  timestamp?: U64;
  duration?: U64;
  localEndpoint?: Endpoint;
  remoteEndpoint?: Endpoint;
  annotations?: readonly Annotation[];
  tags?: TagsInput;
  debug?: boolean;
  shared?: boolean;
}>;

export type SpanBuildResult =
  | Readonly<{ ok: true; span: Span }>
  | Readonly<{ ok: false; error: SpanEncodeError }>;

export type EndpointBuildResult =
  | Readonly<{ ok: true; endpoint: Endpoint }>
  | Readonly<{ ok: false; error: SpanEncodeError }>;

const ALL_ZERO_RE = /^0+$/;

/** Lowercase and left-pad to `width`. Longer input is only lowercased (validation rejects it). */
export function normalizeHexId(raw: string, width: number): string {
  const lower = raw.toLowerCase();
  return lower.length < width ? lower.padStart(width, "0") : lower;
}

export function normalizeTraceId(raw: string): string {
  const width = raw.length <= ID_HEX_LENGTH ? ID_HEX_LENGTH : TRACE_ID_128_HEX_LENGTH;
  return normalizeHexId(raw, width);
}

function sortedTags(input: TagsInput | undefined): ReadonlyMap<string, string> {
  const entries: [string, string][] =
    input === undefined
      ? []
      : input instanceof Map
        ? Array.from(input.entries())
        : Object.entries(input);
  entries.sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
  return new Map(entries);
}

function copyEndpoint(input: Endpoint): Endpoint {
  return Object.freeze({
    ...(input.serviceName !== undefined ? { serviceName: input.serviceName } : {}),
    ...(input.ipv4 !== undefined ? { ipv4: input.ipv4 } : {}),
    ...(input.ipv6 !== undefined ? { ipv6: input.ipv6.toLowerCase() } : {}),
    ...(input.port !== undefined ? { port: input.port } : {}),
  });
}

function badParams(detail: string): Readonly<{ ok: false; error: SpanEncodeError }> {
  return { ok: false, error: { code: "SPAN_BAD_PARAMS", detail } };
}

export function createEndpoint(input: Endpoint): EndpointBuildResult {
  const detail = validateEndpoint(input, "endpoint");
  if (detail !== null) return badParams(detail);
  return { ok: true, endpoint: copyEndpoint(input) };
}

/** Normalize and validate a span record. */
export function createSpan(input: SpanInput): SpanBuildResult {
  if (typeof input !== "object" || input === null) return badParams("span must be an object");
  if (typeof input.traceId !== "string" || typeof input.id !== "string") {
    return badParams("traceId and id must be strings");
  }
  if (input.traceId.length === 0) return badParams("traceId must not be empty");
  if (input.id.length === 0) return badParams("id must not be empty");
  if (input.parentId !== undefined && typeof input.parentId !== "string") {
    return badParams("parentId must be a string");
  }
  if (input.tags !== undefined && (typeof input.tags !== "object" || input.tags === null)) {
    return badParams("tags must be a Map or a plain object");
  }
  if (input.annotations !== undefined && !Array.isArray(input.annotations)) {
    return badParams("annotations must be an array");
  }
  for (const field of ["localEndpoint", "remoteEndpoint"] as const) {
    const endpoint = input[field];
    if (endpoint === undefined) continue;
    const detail = validateEndpoint(endpoint, field);
    if (detail !== null) return badParams(detail);
  }

  const traceId = normalizeTraceId(input.traceId);
  const id = normalizeHexId(input.id, ID_HEX_LENGTH);
  if (ALL_ZERO_RE.test(traceId)) return badParams("traceId must not be all zeros");
  if (ALL_ZERO_RE.test(id)) return badParams("id must not be all zeros");

  const parentId =
    input.parentId === undefined ? undefined : normalizeHexId(input.parentId, ID_HEX_LENGTH);
  const annotations: Annotation[] =
    input.annotations === undefined ? [] : input.annotations.slice();

  const span: Span = Object.freeze({
    traceId,
    ...(parentId !== undefined && !ALL_ZERO_RE.test(parentId) ? { parentId } : {}),
    id,
    ...(input.kind !== undefined ? { kind: input.kind } : {}),
    ...(input.name !== undefined ? { name: input.name } : {}),
    ...(input.timestamp !== undefined ? { timestamp: input.timestamp } : {}),
    ...(input.duration !== undefined ? { duration: input.duration } : {}),
    ...(input.localEndpoint !== undefined
      ? { localEndpoint: copyEndpoint(input.localEndpoint) }
      : {}),
    ...(input.remoteEndpoint !== undefined
      ? { remoteEndpoint: copyEndpoint(input.remoteEndpoint) }
      : {}),
    annotations: Object.freeze(annotations),
    tags: sortedTags(input.tags),
    ...(input.debug === true ? { debug: true } : {}),
    ...(input.shared === true ? { shared: true } : {}),
  });

  const detail = validateSpan(span);
  if (detail !== null) return badParams(detail);
  return { ok: true, span };
}
