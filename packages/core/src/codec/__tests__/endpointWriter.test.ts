import { assert, describe, test } from "@spanwire/testkit";
import { ArrayByteSink } from "../../json/byteSink.js";
import type { Endpoint } from "../../model/types.js";
import { ENDPOINT_WRITER } from "../endpointWriter.js";

const decoder = new TextDecoder();

function encodeEndpoint(endpoint: Endpoint): string {
  const size = ENDPOINT_WRITER.sizeInBytes(endpoint);
  const out = new Uint8Array(size);
  const sink = new ArrayByteSink(out);
  ENDPOINT_WRITER.write(endpoint, sink);
  assert.equal(sink.position, size, "written length must equal computed size");
  return decoder.decode(out);
}

describe("ENDPOINT_WRITER", () => {
  test("empty endpoint is {}", () => {
    assert.equal(ENDPOINT_WRITER.sizeInBytes({}), 2);
    assert.equal(encodeEndpoint({}), "{}");
  });

  test("service name only", () => {
    assert.equal(ENDPOINT_WRITER.sizeInBytes({ serviceName: "frontend" }), 26);
    assert.equal(encodeEndpoint({ serviceName: "frontend" }), '{"serviceName":"frontend"}');
  });

  test("first written member carries no comma when serviceName is absent", () => {
    assert.equal(
      encodeEndpoint({ ipv4: "192.168.99.101", port: 9000 }),
      '{"ipv4":"192.168.99.101","port":9000}',
    );
    assert.equal(encodeEndpoint({ port: 0 }), '{"port":0}');
    assert.equal(encodeEndpoint({ ipv6: "2001:db8::c001" }), '{"ipv6":"2001:db8::c001"}');
  });

  test("all members in fixed order with escaped service name", () => {
    assert.equal(
      encodeEndpoint({
        port: 443,
        ipv6: "2001:db8::c001",
        ipv4: "10.0.0.1",
        serviceName: 'back"end',
      }),
      '{"serviceName":"back\\"end","ipv4":"10.0.0.1","ipv6":"2001:db8::c001","port":443}',
    );
  });

  test("every presence combination agrees between size and write", () => {
    for (let mask = 0; mask < 16; mask++) {
      const endpoint: Endpoint = {
        ...((mask & 1) !== 0 ? { serviceName: "svcé" } : {}),
        ...((mask & 2) !== 0 ? { ipv4: "127.0.0.1" } : {}),
        ...((mask & 4) !== 0 ? { ipv6: "::1" } : {}),
        ...((mask & 8) !== 0 ? { port: 65535 } : {}),
      };
      const text = encodeEndpoint(endpoint);
      const parsed: unknown = JSON.parse(text);
      assert.deepEqual(parsed, endpoint, `mask=${mask}`);
    }
  });
});
