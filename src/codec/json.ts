import { FormatCodec } from './types.js';
import { ContentType } from './content-type.js';
import { utf8Text } from './bytes.js';

export const jsonCodec: FormatCodec = {
  name: 'json',
  contentType: ContentType.JSON,
  textOrigin: false,
  encode(doc: unknown): Uint8Array {
    const s: string | undefined = JSON.stringify(doc);
    if (s === undefined) throw new Error(`value of type ${typeof doc} is not representable as JSON`);
    return Buffer.from(s, 'utf8');
  },
  decode(buf: Uint8Array): unknown {
    return JSON.parse(utf8Text(buf));
  }
};
