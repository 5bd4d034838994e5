import { FormatCodec } from './types.js';
import { ContentType } from './content-type.js';
import { bytesToNarrowString, narrowStringToBytes } from './bytes.js';

function toPlainText(doc: unknown): string {
  switch (typeof doc) {
    case 'string':
      return doc;
    case 'number':
    case 'bigint':
    case 'boolean':
      return String(doc);
    case 'undefined':
      return '';
    case 'object':
      if (doc === null) return '';
      throw new Error(`plain text cannot represent a value of type ${Array.isArray(doc) ? 'array' : 'object'}`);
    default:
      throw new Error(`plain text cannot represent a value of type ${typeof doc}`);
  }
}

export const plainCodec: FormatCodec = {
  name: 'plain',
  contentType: ContentType.Plain,
  textOrigin: true,
  encode(doc: unknown): Uint8Array {
    return narrowStringToBytes(toPlainText(doc));
  },
  // Empty input is the empty string, not an error.
  decode(buf: Uint8Array): unknown {
    return bytesToNarrowString(buf);
  }
};
