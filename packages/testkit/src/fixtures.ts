import { readFile } from "node:fs/promises";

const FIXTURES_ROOT = new URL("../fixtures/", import.meta.url);

function fixtureUrl(rel: string): URL {
  if (rel.length === 0 || rel.startsWith("/") || rel.split("/").includes("..")) {
    throw new Error(`readFixture: invalid fixture path "${rel}"`);
  }
  return new URL(rel, FIXTURES_ROOT);
}

/** Read a fixture file (relative to packages/testkit/fixtures) as raw bytes. */
export async function readFixture(rel: string): Promise<Uint8Array> {
  const buf = await readFile(fixtureUrl(rel));
  return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
}

export async function readFixtureText(rel: string): Promise<string> {
  return readFile(fixtureUrl(rel), "utf8");
}
