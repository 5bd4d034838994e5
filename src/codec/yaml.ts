import * as YAML from 'yaml';
import { FormatCodec } from './types.js';
import { ContentType } from './content-type.js';
import { utf8Text } from './bytes.js';

export const yamlCodec: FormatCodec = {
  name: 'yaml',
  contentType: ContentType.YAML,
  textOrigin: false,
  encode(doc: unknown): Uint8Array {
    const s: string | undefined = YAML.stringify(doc);
    if (s === undefined) throw new Error(`value of type ${typeof doc} is not representable as YAML`);
    return Buffer.from(s, 'utf8');
  },
  decode(buf: Uint8Array): unknown {
    return YAML.parse(utf8Text(buf));
  }
};
