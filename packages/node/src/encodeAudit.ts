/**
 * packages/node/src/encodeAudit.ts — Optional NDJSON audit of encode calls.
 *
 * Each audited call appends one line:
 *   {"ts":..., "op":"encode", "ok":true, "spanCount":1, "byteLen":54,
 *    "hash32":"0x016027d7", "head16":"7b22...", "elapsedUs":12}
 * Failures carry `errorCode` and `detail` instead of the byte fingerprint.
 *
 * The first write failure disables the audit and is reported once on stderr;
 * encoding itself is never affected.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { performance } from "node:perf_hooks";
import type { SpanEncodeResult } from "@spanwire/core";
import type { EncodeAuditConfig } from "./config.js";

export type EncodeAuditOp = "encode" | "encodeInto" | "encodeList" | "encodeListInto";

export type EncodeAudit = Readonly<{
  enabled: boolean;
  /** Runs `run`, records its outcome and returns it unchanged. */
  observe: (op: EncodeAuditOp, spanCount: number, run: () => SpanEncodeResult) => SpanEncodeResult;
}>;

export type StderrWrite = (text: string) => void;

export type BytesFingerprint = Readonly<{
  byteLen: number;
  hash32: string;
  head16: string;
}>;

function toHex32(v: number): string {
  return `0x${(v >>> 0).toString(16).padStart(8, "0")}`;
}

function hashFnv1a32(bytes: Uint8Array): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < bytes.byteLength; i++) {
    h ^= bytes[i] ?? 0;
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

function sliceHex(bytes: Uint8Array, start: number, end: number): string {
  const s = Math.max(0, Math.min(start, bytes.byteLength));
  const e = Math.max(s, Math.min(end, bytes.byteLength));
  let out = "";
  for (let i = s; i < e; i++) {
    out += (bytes[i] ?? 0).toString(16).padStart(2, "0");
  }
  return out;
}

function describeErr(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}

export function bytesFingerprint(bytes: Uint8Array): BytesFingerprint {
  return Object.freeze({
    byteLen: bytes.byteLength,
    hash32: toHex32(hashFnv1a32(bytes)),
    head16: sliceHex(bytes, 0, 16),
  });
}

const DISABLED_AUDIT: EncodeAudit = Object.freeze({
  enabled: false,
  observe: (_op: EncodeAuditOp, _spanCount: number, run: () => SpanEncodeResult) => run(),
});

export function createEncodeAudit(
  config: EncodeAuditConfig,
  stderr: StderrWrite = (text) => {
    process.stderr.write(text);
  },
): EncodeAudit {
  if (!config.enabled) return DISABLED_AUDIT;

  let broken = false;
  const logPath = config.logPath;

  const writeLine = (line: string): void => {
    if (broken) return;
    try {
      if (logPath !== null) appendFileSync(logPath, `${line}\n`, "utf8");
      if (config.stderrMirror) stderr(`${line}\n`);
    } catch (err) {
      broken = true;
      stderr(`spanwire: encode audit disabled (${describeErr(err)})\n`);
    }
  };

  if (logPath !== null) {
    try {
      mkdirSync(dirname(logPath), { recursive: true });
    } catch (err) {
      broken = true;
      stderr(`spanwire: encode audit disabled (${describeErr(err)})\n`);
    }
  }

  return Object.freeze({
    enabled: true,
    observe: (op: EncodeAuditOp, spanCount: number, run: () => SpanEncodeResult) => {
      const start = performance.now();
      const result = run();
      const elapsedUs = Math.round((performance.now() - start) * 1000);
      const outcome = result.ok
        ? { ok: true, ...bytesFingerprint(result.bytes) }
        : { ok: false, errorCode: result.error.code, detail: result.error.detail };
      writeLine(
        JSON.stringify({
          ts: new Date().toISOString(),
          op,
          spanCount,
          ...outcome,
          elapsedUs,
        }),
      );
      return result;
    },
  });
}
