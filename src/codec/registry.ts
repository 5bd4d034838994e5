import { FormatCodec } from './types.js';
import { LogicalContentType } from './content-type.js';
import { jsonCodec } from './json.js';
import { yamlCodec } from './yaml.js';
import { xmlCodec } from './xml.js';
import { plainCodec } from './plain.js';
import { formCodec } from './form.js';

const builtinCodecs: readonly FormatCodec[] = [jsonCodec, yamlCodec, xmlCodec, plainCodec, formCodec];

/**
 * One codec path per logical content type. Every registry starts with the
 * built-in paths; `register` swaps one out (e.g. an XML codec with another root).
 */
export class CodecRegistry {
  private codecs = new Map<LogicalContentType, FormatCodec>();

  constructor(overrides: FormatCodec[] = []) {
    for (const codec of builtinCodecs) this.register(codec);
    for (const codec of overrides) this.register(codec);
  }

  register(codec: FormatCodec) {
    this.codecs.set(codec.contentType, codec);
  }

  get(type: LogicalContentType): FormatCodec {
    const codec = this.codecs.get(type);
    if (!codec) throw new Error(`no codec registered for ${type}`);
    return codec;
  }

  list(): FormatCodec[] {
    return Array.from(this.codecs.values());
  }
}

export const defaultRegistry = new CodecRegistry();

export function getCodec(type: LogicalContentType): FormatCodec {
  return defaultRegistry.get(type);
}

export function listCodecs(): FormatCodec[] {
  return defaultRegistry.list();
}
