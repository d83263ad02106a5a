import { assert, describe, test } from "@spanwire/testkit";
import type { Span } from "../types.js";
import { isTraceId, isU64, validateEndpoint, validateSpan } from "../validate.js";

function baseSpan(): Span {
  return {
    traceId: "86154a4ba6e91385",
    id: "4d1e00c0db9010db",
    annotations: [],
    tags: new Map(),
  };
}

/** Overwrites one member with an arbitrary value, as untyped callers can. */
function withMember(member: string, value: unknown): Span {
  return Object.assign(baseSpan(), { [member]: value });
}

describe("isU64", () => {
  test("accepts safe non-negative integers and in-range bigints", () => {
    assert.equal(isU64(0), true);
    assert.equal(isU64(Number.MAX_SAFE_INTEGER), true);
    assert.equal(isU64(0n), true);
    assert.equal(isU64(18446744073709551615n), true);
  });

  test("rejects everything else", () => {
    assert.equal(isU64(-1), false);
    assert.equal(isU64(1.5), false);
    assert.equal(isU64(Number.NaN), false);
    assert.equal(isU64(2 ** 53), false);
    assert.equal(isU64(-1n), false);
    assert.equal(isU64(18446744073709551616n), false);
    assert.equal(isU64("1"), false);
  });
});

describe("isTraceId", () => {
  test("16 or 32 lowercase hex characters", () => {
    assert.equal(isTraceId("86154a4ba6e91385"), true);
    assert.equal(isTraceId("463ac35c9f6413ad48485a3953bb6124"), true);
    assert.equal(isTraceId("86154A4BA6E91385"), false);
    assert.equal(isTraceId("86154a4ba6e9138"), false);
    assert.equal(isTraceId("86154a4ba6e91385a"), false);
  });
});

describe("validateEndpoint", () => {
  test("accepts empty and fully populated endpoints", () => {
    assert.equal(validateEndpoint({}, "localEndpoint"), null);
    assert.equal(
      validateEndpoint(
        { serviceName: 'any "text"', ipv4: "10.0.0.1", ipv6: "::1", port: 65535 },
        "localEndpoint",
      ),
      null,
    );
  });

  test("names the field and the offending member", () => {
    assert.equal(
      validateEndpoint({ port: 70000 }, "localEndpoint"),
      "localEndpoint.port must be a u16 (got number 70000)",
    );
    assert.equal(
      validateEndpoint({ ipv4: 'a"b' }, "remoteEndpoint"),
      'remoteEndpoint.ipv4 must be a printable ASCII literal (got "a\\"b")',
    );
    assert.equal(
      validateEndpoint({ ipv6: "" }, "remoteEndpoint"),
      'remoteEndpoint.ipv6 must be a printable ASCII literal (got "")',
    );
  });
});

describe("validateSpan", () => {
  test("accepts a minimal span", () => {
    assert.equal(validateSpan(baseSpan()), null);
  });

  test("ids", () => {
    assert.equal(
      validateSpan(withMember("traceId", "abc")),
      'traceId must be 16 or 32 lowercase hex characters (got "abc")',
    );
    assert.equal(
      validateSpan(withMember("parentId", "abc")),
      'parentId must be 16 lowercase hex characters (got "abc")',
    );
    assert.equal(
      validateSpan(withMember("id", "ABCDEF0123456789")),
      'id must be 16 lowercase hex characters (got "ABCDEF0123456789")',
    );
    assert.equal(
      validateSpan(withMember("id", 5)),
      "id must be 16 lowercase hex characters (got number 5)",
    );
  });

  test("reports the first violated member in write order", () => {
    const span = Object.assign(baseSpan(), { traceId: "x", id: "y" });
    assert.equal(
      validateSpan(span),
      'traceId must be 16 or 32 lowercase hex characters (got "x")',
    );
  });

  test("kind", () => {
    assert.equal(
      validateSpan(withMember("kind", "INTERNAL")),
      'kind must be one of CLIENT, SERVER, PRODUCER, CONSUMER (got "INTERNAL")',
    );
  });

  test("timestamp and duration", () => {
    assert.equal(
      validateSpan(withMember("timestamp", -1)),
      "timestamp must be a u64 (got number -1)",
    );
    assert.equal(
      validateSpan(withMember("timestamp", 18446744073709551616n)),
      "timestamp must be a u64 (got bigint 18446744073709551616)",
    );
    assert.equal(
      validateSpan(withMember("duration", 1.5)),
      "duration must be a u64 (got number 1.5)",
    );
  });

  test("endpoints", () => {
    assert.equal(
      validateSpan(withMember("localEndpoint", { port: 70000 })),
      "localEndpoint.port must be a u16 (got number 70000)",
    );
    assert.equal(validateSpan(withMember("remoteEndpoint", null)), "remoteEndpoint must be an object");
  });

  test("annotations", () => {
    assert.equal(validateSpan(withMember("annotations", "x")), "annotations must be an array");
    assert.equal(
      validateSpan(
        withMember("annotations", [
          { timestamp: 1, value: "a" },
          { timestamp: -1, value: "b" },
        ]),
      ),
      "annotations[1].timestamp must be a u64 (got number -1)",
    );
    assert.equal(
      validateSpan(withMember("annotations", [{ timestamp: 1, value: 5 }])),
      "annotations[0].value must be a string (got number 5)",
    );
  });

  test("tags", () => {
    assert.equal(validateSpan(withMember("tags", {})), "tags must be a Map");
    assert.equal(
      validateSpan(withMember("tags", new Map<string, unknown>([["k", 1]]))),
      'tags["k"] must be a string (got number 1)',
    );
  });

  test("flags", () => {
    assert.equal(validateSpan(withMember("debug", "yes")), 'debug must be a boolean (got "yes")');
    assert.equal(validateSpan(withMember("shared", 1)), "shared must be a boolean (got number 1)");
    assert.equal(validateSpan(withMember("debug", false)), null);
  });
});
