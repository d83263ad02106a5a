import { ENCODING_KINDS, type EncodingKind, JSON_MEDIA_TYPE } from "../format.js";
import { jsonListSizeInBytes } from "./listWriter.js";
import type { Encoding } from "./types.js";

export const JSON_ENCODING: Encoding = Object.freeze({
  kind: "JSON",
  mediaType: JSON_MEDIA_TYPE,
  listSizeInBytes: jsonListSizeInBytes,
});

export const ENCODINGS: Readonly<Record<EncodingKind, Encoding>> = Object.freeze({
  JSON: JSON_ENCODING,
});

export function isEncodingKind(value: unknown): value is EncodingKind {
  return ENCODING_KINDS.some((kind) => kind === value);
}
