import { assert, describe, test } from "@spanwire/testkit";
import { ArrayByteSink } from "../byteSink.js";

const decoder = new TextDecoder();

describe("ArrayByteSink", () => {
  test("writes bytes, ascii and decimals in order", () => {
    const buf = new Uint8Array(16);
    const sink = new ArrayByteSink(buf);
    sink.writeByte(0x7b);
    sink.writeAscii('"n":');
    sink.writeDecimal(9000);
    sink.writeByte(0x7d);
    assert.equal(sink.position, 10);
    assert.equal(decoder.decode(buf.subarray(0, sink.position)), '{"n":9000}');
  });

  test("writeDecimal renders zero, large numbers and u64 bigints", () => {
    const buf = new Uint8Array(64);
    const sink = new ArrayByteSink(buf);
    sink.writeDecimal(0);
    sink.writeByte(0x2c);
    sink.writeDecimal(1472470996199000);
    sink.writeByte(0x2c);
    sink.writeDecimal(18446744073709551615n);
    assert.equal(
      decoder.decode(buf.subarray(0, sink.position)),
      "0,1472470996199000,18446744073709551615",
    );
  });

  test("writeUtf8 matches TextEncoder for mixed text", () => {
    const text = "héllo € 😀 \ud800!";
    const expected = new TextEncoder().encode(text);
    const buf = new Uint8Array(expected.byteLength);
    const sink = new ArrayByteSink(buf);
    sink.writeUtf8(text);
    assert.equal(sink.position, expected.byteLength);
    assert.deepEqual(Array.from(buf), Array.from(expected));
  });

  test("starts at the given offset", () => {
    const buf = new Uint8Array(6).fill(0x2e);
    const sink = new ArrayByteSink(buf, 3);
    assert.equal(sink.position, 3);
    sink.writeAscii("abc");
    assert.equal(decoder.decode(buf), "...abc");
  });

  test("counts ascii bytes that did not fit", () => {
    const buf = new Uint8Array(2);
    const sink = new ArrayByteSink(buf);
    sink.writeAscii("abcd");
    assert.equal(sink.position, 4);
    assert.equal(decoder.decode(buf), "ab");
  });

  test("counts multi-byte text that did not fit", () => {
    const buf = new Uint8Array(3);
    const sink = new ArrayByteSink(buf);
    sink.writeUtf8("a€b");
    assert.equal(sink.position, 5);
    assert.equal(buf[0], 0x61);
  });
});
