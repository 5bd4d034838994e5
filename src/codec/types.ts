import { LogicalContentType } from './content-type.js';

export interface FormatCodec {
  name: string; // 'json' | 'yaml' | 'xml' | 'plain' | 'urlencoded'
  contentType: LogicalContentType;
  textOrigin: boolean; // decoded leaves are all strings (plain, xml, form)
  encode(doc: unknown): Uint8Array;
  decode(buf: Uint8Array): unknown;
}
