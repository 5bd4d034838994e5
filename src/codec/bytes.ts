import { TextDecoder } from 'util';

// Plain, XML and form payloads go through a one-byte-per-character mapping.
// Correct for ASCII only: multi-byte UTF-8 input decodes to several Latin-1
// characters, and characters above U+00FF lose their high bits on encode.

export function bytesToNarrowString(input: Uint8Array): string {
  return Buffer.from(input.buffer, input.byteOffset, input.byteLength).toString('latin1');
}

export function narrowStringToBytes(text: string): Uint8Array {
  const out = new Uint8Array(text.length);
  let n = 0;
  for (const ch of text) {
    out[n++] = (ch.codePointAt(0) ?? 0) & 0xff;
  }
  return out.subarray(0, n);
}

// ignoreBOM keeps a leading BOM in the text, where the parser rejects it.
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/** JSON and YAML read the raw buffer; invalid UTF-8 is a decode error. */
export function utf8Text(input: Uint8Array): string {
  return utf8.decode(input);
}
