import { z } from 'zod';

/** A type that can be built from a decoded document. */
export interface Decodable<T> {
  fromDocument(doc: unknown): T;
  /** Used instead of fromDocument when every leaf of the document is a string. */
  fromText?(doc: unknown): T;
}

/** A type that can be turned into a document for encoding. */
export interface Encodable<T> {
  toDocument(value: T): unknown;
}

export type Coercible<T> = Decodable<T> & Encodable<T>;

function kindOf(doc: unknown): string {
  if (doc === null) return 'null';
  if (doc === undefined) return 'unit';
  if (Array.isArray(doc)) return 'sequence';
  if (typeof doc === 'object') return 'map';
  return `${typeof doc} \`${String(doc)}\``;
}

export const text: Coercible<string> = {
  fromDocument(doc: unknown): string {
    if (typeof doc !== 'string') throw new Error(`invalid type: ${kindOf(doc)}, expected a string`);
    return doc;
  },
  toDocument: (value: string) => value
};

export const document: Coercible<unknown> = {
  fromDocument: (doc: unknown) => doc,
  toDocument: (value: unknown) => value
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numeral(doc: string): number | string {
  const n = Number(doc);
  return doc.trim() === '' || isNaN(n) ? doc : n;
}

/**
 * Rebuilds the scalars a text-only codec flattened to strings, following
 * what the schema expects at each position. Strings that do not parse are
 * left as they are so the schema reports them.
 */
function restoreLeaves(schema: z.ZodTypeAny, doc: unknown): unknown {
  if (schema instanceof z.ZodOptional) return doc === undefined ? doc : restoreLeaves(schema.unwrap(), doc);
  if (schema instanceof z.ZodNullable) {
    const inner = schema.unwrap();
    return doc === '' && !(inner instanceof z.ZodString) ? null : restoreLeaves(inner, doc);
  }
  if (schema instanceof z.ZodDefault) return restoreLeaves(schema.removeDefault(), doc);
  if (schema instanceof z.ZodEffects) return restoreLeaves(schema.innerType(), doc);
  if (typeof doc === 'string') {
    if (schema instanceof z.ZodNumber) return numeral(doc);
    if (schema instanceof z.ZodBigInt) return /^-?\d+$/.test(doc) ? BigInt(doc) : doc;
    if (schema instanceof z.ZodBoolean) return doc === 'true' ? true : doc === 'false' ? false : doc;
    if (schema instanceof z.ZodNull) return doc === '' ? null : doc;
    if (schema instanceof z.ZodLiteral) {
      const value: unknown = schema.value;
      return typeof value !== 'string' && String(value) === doc ? value : doc;
    }
  }
  if (schema instanceof z.ZodArray) {
    // xml2js yields a lone repeated element as a scalar, not a one-item list.
    if (doc === undefined) return doc;
    const items = Array.isArray(doc) ? doc : [doc];
    return items.map(item => restoreLeaves(schema.element, item));
  }
  if (schema instanceof z.ZodObject && isRecord(doc)) {
    const shape: Record<string, z.ZodTypeAny> = schema.shape;
    const out: Record<string, unknown> = { ...doc };
    for (const [key, field] of Object.entries(shape)) {
      if (key in out) out[key] = restoreLeaves(field, out[key]);
    }
    return out;
  }
  return doc;
}

/**
 * Any type described by a zod schema; a mismatch fails with zod's own message.
 * Documents from the plain, XML and form paths get their numbers, booleans
 * and nulls back before the schema sees them.
 */
export function fromSchema<S extends z.ZodTypeAny>(schema: S): Coercible<z.infer<S>> {
  return {
    fromDocument: (doc: unknown): z.infer<S> => schema.parse(doc),
    fromText: (doc: unknown): z.infer<S> => schema.parse(restoreLeaves(schema, doc)),
    toDocument: (value: z.infer<S>) => value
  };
}
