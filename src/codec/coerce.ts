import { LogicalContentType, classify, canonicalMime } from './content-type.js';
import { CoercionError, toCoercionError } from './errors.js';
import { CodecRegistry, defaultRegistry } from './registry.js';
import { Decodable, Encodable, document } from './shapes.js';

export type CoercionResult<T> = { ok: true; value: T } | { ok: false; error: CoercionError };

/**
 * Decodes `input` with the codec path for `type`, then builds a `T` from the
 * document. Documents from the plain, XML and form paths go through
 * `shape.fromText` when the shape has one. Any failure throws a CoercionError.
 */
export function decode<T>(
  type: LogicalContentType,
  input: Uint8Array,
  shape: Decodable<T>,
  codecs: CodecRegistry = defaultRegistry
): T {
  try {
    const codec = codecs.get(type);
    const doc = codec.decode(input);
    return codec.textOrigin && shape.fromText ? shape.fromText(doc) : shape.fromDocument(doc);
  } catch (err) {
    throw toCoercionError(err);
  }
}

/** Encodes `value` with the codec path for `type`. The shape defaults to passing the value through. */
export function encode<T>(
  type: LogicalContentType,
  value: T,
  shape: Encodable<T> = document,
  codecs: CodecRegistry = defaultRegistry
): Uint8Array {
  try {
    return codecs.get(type).encode(shape.toDocument(value));
  } catch (err) {
    throw toCoercionError(err);
  }
}

export function tryDecode<T>(
  type: LogicalContentType,
  input: Uint8Array,
  shape: Decodable<T>,
  codecs?: CodecRegistry
): CoercionResult<T> {
  try {
    return { ok: true, value: decode(type, input, shape, codecs) };
  } catch (err) {
    return { ok: false, error: toCoercionError(err) };
  }
}

export function tryEncode<T>(
  type: LogicalContentType,
  value: T,
  shape?: Encodable<T>,
  codecs?: CodecRegistry
): CoercionResult<Uint8Array> {
  try {
    return { ok: true, value: encode(type, value, shape, codecs) };
  } catch (err) {
    return { ok: false, error: toCoercionError(err) };
  }
}

export interface CoercedRequest<T> {
  type: LogicalContentType;
  value: T;
}

export interface CoercedResponse {
  body: Uint8Array;
  contentType: string;
}

export function coerceRequest<T>(
  mime: string,
  input: Uint8Array,
  shape: Decodable<T>,
  codecs?: CodecRegistry
): CoercedRequest<T> {
  const type = classify(mime);
  return { type, value: decode(type, input, shape, codecs) };
}

/** The response content type is always the canonical MIME of `type`. */
export function coerceResponse<T>(
  type: LogicalContentType,
  value: T,
  shape?: Encodable<T>,
  codecs?: CodecRegistry
): CoercedResponse {
  return { body: encode(type, value, shape, codecs), contentType: canonicalMime(type) };
}
