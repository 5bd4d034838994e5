import { FormatCodec } from './types.js';
import { ContentType } from './content-type.js';
import { bytesToNarrowString, narrowStringToBytes } from './bytes.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formValue(key: string, value: unknown): string | undefined {
  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'bigint':
    case 'boolean':
      return String(value);
    case 'undefined':
      return undefined;
    default:
      if (value === null) return undefined;
      throw new Error(`unsupported value for field \`${key}\``);
  }
}

export const formCodec: FormatCodec = {
  name: 'urlencoded',
  contentType: ContentType.URLEncoded,
  textOrigin: true,
  encode(doc: unknown): Uint8Array {
    if (!isRecord(doc)) throw new Error('top-level serializer supports only maps and structs');
    const params = new URLSearchParams();
    for (const [key, raw] of Object.entries(doc)) {
      const value = formValue(key, raw);
      if (value !== undefined) params.append(key, value);
    }
    return narrowStringToBytes(params.toString());
  },
  decode(buf: Uint8Array): unknown {
    const fields = new Map<string, string>();
    for (const [key, value] of new URLSearchParams(bytesToNarrowString(buf))) {
      if (fields.has(key)) throw new Error(`duplicate field \`${key}\``);
      fields.set(key, value);
    }
    return Object.fromEntries(fields);
  }
};
