/**
 * packages/core/src/model/types.ts — Span record type definitions.
 *
 * Why: These read-only records are the only input the encoders see. Optional
 * members are `undefined` when absent; an absent member contributes no bytes.
 */

import type { SpanKind } from "../format.js";

/** Unsigned 64-bit microsecond value. `number` must be a non-negative safe integer. */
export type U64 = number | bigint;

export type Endpoint = Readonly<{
  serviceName?: string;
  /** Pre-formatted dotted-quad literal; written without escaping. */
  ipv4?: string;
  /** Pre-formatted IPv6 literal; written without escaping. */
  ipv6?: string;
  port?: number;
}>;

export type Annotation = Readonly<{
  timestamp: U64;
  value: string;
}>;

/**
 * A finished span.
 *
 * Notes:
 * - `annotations` keep insertion order (time order).
 * - `tags` are iterated in map order by both the size pass and the write pass;
 *   do not mutate the map between `sizeInBytes()` and the write.
 * - `debug` and `shared` are written only when `true`.
 */
export type Span = Readonly<{
  traceId: string;
  parentId?: string;
  id: string;
  kind?: SpanKind;
  name?: string;
  timestamp?: U64;
  duration?: U64;
  localEndpoint?: Endpoint;
  remoteEndpoint?: Endpoint;
  annotations: readonly Annotation[];
  tags: ReadonlyMap<string, string>;
  debug?: boolean;
  shared?: boolean;
}>;
