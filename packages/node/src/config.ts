/**
 * packages/node/src/config.ts — Environment overrides for span encoding.
 *
 * Recognized variables:
 *   SPANWIRE_VALIDATE=0                  skip per-span validation (default on)
 *   SPANWIRE_MAX_SPAN_BYTES=<bytes>      single span cap
 *   SPANWIRE_MAX_LIST_BYTES=<bytes>      list message cap
 *   SPANWIRE_ENCODE_AUDIT=1              append one NDJSON record per encode call
 *   SPANWIRE_ENCODE_AUDIT_LOG=<path>     defaults to /tmp/spanwire-encode-audit.ndjson
 *   SPANWIRE_ENCODE_AUDIT_STDERR_MIRROR=1
 *
 * Malformed values fall back to the defaults.
 */

import { DEFAULT_MAX_LIST_BYTES, DEFAULT_MAX_SPAN_BYTES } from "@spanwire/core";

export type SpanwireEnv = Readonly<Record<string, string | undefined>>;

export type EncodeAuditConfig = Readonly<{
  enabled: boolean;
  /** NDJSON target; null writes nothing to disk. */
  logPath: string | null;
  stderrMirror: boolean;
}>;

export type SpanwireEnvConfig = Readonly<{
  validateParams: boolean;
  maxSpanBytes: number;
  maxListBytes: number;
  audit: EncodeAuditConfig;
}>;

export const DEFAULT_ENCODE_AUDIT_LOG = "/tmp/spanwire-encode-audit.ndjson";

// Caps above this are rejected by the encoder.
const MAX_CAP_BYTES = 0x7fff_ffff;

function readEnv(env: SpanwireEnv, name: string): string | null {
  const raw = env[name];
  if (typeof raw !== "string") return null;
  const value = raw.trim();
  return value.length > 0 ? value : null;
}

function envFlag(env: SpanwireEnv, name: string, fallback = false): boolean {
  const value = readEnv(env, name);
  if (value === null) return fallback;
  const norm = value.toLowerCase();
  if (norm === "1" || norm === "true" || norm === "yes" || norm === "on") return true;
  if (norm === "0" || norm === "false" || norm === "no" || norm === "off") return false;
  return fallback;
}

function envPositiveInt(env: SpanwireEnv, name: string, fallback: number): number {
  const value = readEnv(env, name);
  if (value === null) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0 || parsed > MAX_CAP_BYTES) return fallback;
  return parsed;
}

export function readSpanwireEnv(env: SpanwireEnv = process.env): SpanwireEnvConfig {
  const auditEnabled = envFlag(env, "SPANWIRE_ENCODE_AUDIT", false);
  return Object.freeze({
    validateParams: envFlag(env, "SPANWIRE_VALIDATE", true),
    maxSpanBytes: envPositiveInt(env, "SPANWIRE_MAX_SPAN_BYTES", DEFAULT_MAX_SPAN_BYTES),
    maxListBytes: envPositiveInt(env, "SPANWIRE_MAX_LIST_BYTES", DEFAULT_MAX_LIST_BYTES),
    audit: Object.freeze({
      enabled: auditEnabled,
      logPath:
        readEnv(env, "SPANWIRE_ENCODE_AUDIT_LOG") ??
        (auditEnabled ? DEFAULT_ENCODE_AUDIT_LOG : null),
      stderrMirror: envFlag(env, "SPANWIRE_ENCODE_AUDIT_STDERR_MIRROR", false),
    }),
  });
}
