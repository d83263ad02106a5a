import { assert, describe, test } from "@spanwire/testkit";
import { ArrayByteSink } from "../../json/byteSink.js";
import type { Annotation, Span } from "../../model/types.js";
import { ANNOTATION_WRITER } from "../annotationWriter.js";
import { createJsonListWriter, jsonListSizeInBytes } from "../listWriter.js";
import { SPAN_WRITER } from "../spanWriter.js";
import type { ByteWriter } from "../types.js";

const decoder = new TextDecoder();

function encodeWith<T>(writer: ByteWriter<T>, value: T): string {
  const size = writer.sizeInBytes(value);
  const out = new Uint8Array(size);
  const sink = new ArrayByteSink(out);
  writer.write(value, sink);
  assert.equal(sink.position, size);
  return decoder.decode(out);
}

describe("jsonListSizeInBytes", () => {
  test("brackets plus elements plus joining commas", () => {
    assert.equal(jsonListSizeInBytes([]), 2);
    assert.equal(jsonListSizeInBytes([5]), 7);
    assert.equal(jsonListSizeInBytes([5, 6, 7]), 22);
  });
});

describe("createJsonListWriter", () => {
  const annotations = createJsonListWriter(ANNOTATION_WRITER);
  const spans = createJsonListWriter(SPAN_WRITER);

  test("empty list is []", () => {
    assert.equal(annotations.sizeInBytes([]), 2);
    assert.equal(encodeWith(annotations, []), "[]");
  });

  test("single element has no comma", () => {
    const list: readonly Annotation[] = [{ timestamp: 1, value: "a" }];
    assert.equal(encodeWith(annotations, list), '[{"timestamp":1,"value":"a"}]');
  });

  test("elements are joined by single commas in list order", () => {
    const list: readonly Annotation[] = [
      { timestamp: 2, value: "b" },
      { timestamp: 1, value: "a" },
      { timestamp: 3, value: "c" },
    ];
    assert.equal(
      encodeWith(annotations, list),
      '[{"timestamp":2,"value":"b"},{"timestamp":1,"value":"a"},{"timestamp":3,"value":"c"}]',
    );
  });

  test("span list size equals the encoding list formula over element sizes", () => {
    const a: Span = { traceId: "0000000000000001", id: "0000000000000002", annotations: [], tags: new Map() };
    const b: Span = { ...a, id: "0000000000000003", name: "n" };
    const text = encodeWith(spans, [a, b]);
    assert.equal(
      spans.sizeInBytes([a, b]),
      jsonListSizeInBytes([SPAN_WRITER.sizeInBytes(a), SPAN_WRITER.sizeInBytes(b)]),
    );
    assert.equal(
      text,
      '[{"traceId":"0000000000000001","id":"0000000000000002"},{"traceId":"0000000000000001","id":"0000000000000003","name":"n"}]',
    );
  });
});
