import { Builder, ParserOptions, parseString } from 'xml2js';
import { FormatCodec } from './types.js';
import { ContentType } from './content-type.js';
import { bytesToNarrowString, narrowStringToBytes } from './bytes.js';

export interface XmlCodecOptions {
  /** Root element of encoded documents. `root` lets a single-key record name the root itself. */
  rootName?: string;
}

export const DEFAULT_XML_ROOT = 'document';

// The root element is dropped on decode, so `<document><name>Ann</name></document>`
// reads back as `{ name: 'Ann' }`.
const parserOptions: ParserOptions = {
  explicitArray: false,
  explicitRoot: false
};

export function createXmlCodec(options: XmlCodecOptions = {}): FormatCodec {
  const builder = new Builder({
    rootName: options.rootName || DEFAULT_XML_ROOT,
    headless: true,
    renderOpts: { pretty: false }
  });

  return {
    name: 'xml',
    contentType: ContentType.XML,
    textOrigin: true,
    encode(doc: unknown): Uint8Array {
      return narrowStringToBytes(builder.buildObject(doc));
    },
    decode(buf: Uint8Array): unknown {
      return parseXml(bytesToNarrowString(buf));
    }
  };
}

export const xmlCodec: FormatCodec = createXmlCodec();

// xml2js calls back synchronously unless `async` is set. Only the first
// callback counts: a recovered sax error can be followed by an `end`.
function parseXml(text: string): unknown {
  const outcome: { done: boolean; error: Error | null; result: unknown } = { done: false, error: null, result: undefined };
  parseString(text, parserOptions, (err: Error | null, result: unknown) => {
    if (outcome.done) return;
    outcome.done = true;
    outcome.error = err;
    outcome.result = result;
  });
  if (!outcome.done) throw new Error('xml parser did not complete');
  if (outcome.error) throw outcome.error;
  return outcome.result;
}
