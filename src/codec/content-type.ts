export const ContentType = {
  JSON: 'json',
  YAML: 'yaml',
  XML: 'xml',
  Plain: 'plain',
  URLEncoded: 'urlencoded'
} as const;

export type LogicalContentType = typeof ContentType[keyof typeof ContentType];

interface ContentTypeEntry {
  canonical: string;
  accepted: readonly string[];
}

const entries: Readonly<Record<LogicalContentType, ContentTypeEntry>> = {
  json: { canonical: 'application/json', accepted: ['application/json'] },
  yaml: { canonical: 'text/yaml', accepted: ['text/yaml', 'application/yaml'] },
  xml: { canonical: 'application/xml', accepted: ['text/xml', 'application/xml'] },
  plain: { canonical: 'text/plain', accepted: ['text/plain'] },
  urlencoded: { canonical: 'application/x-www-form-urlencoded', accepted: ['application/x-www-form-urlencoded'] }
};

// lookupContentType walks the table in this order and returns the first match.
const order: readonly LogicalContentType[] = [
  ContentType.JSON,
  ContentType.YAML,
  ContentType.XML,
  ContentType.Plain,
  ContentType.URLEncoded
];

/**
 * Exact, case-sensitive match of an inbound MIME string. Parameters such as
 * `; charset=utf-8` are not stripped, so they do not match.
 */
export function lookupContentType(mime: string): LogicalContentType | undefined {
  return order.find(type => entries[type].accepted.includes(mime));
}

/** Unrecognized inbound types fall back to JSON; this never throws. */
export function classify(mime: string): LogicalContentType {
  return lookupContentType(mime) ?? ContentType.JSON;
}

export function canonicalMime(type: LogicalContentType): string {
  return entries[type].canonical;
}

export function acceptedMimes(type: LogicalContentType): readonly string[] {
  return entries[type].accepted;
}

export function listContentTypes(): LogicalContentType[] {
  return [...order];
}
