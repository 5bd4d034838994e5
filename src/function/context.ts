import { LogicalContentType } from '../codec/content-type.js';

export type HeaderMap = Record<string, string | string[] | undefined>;

function firstHeader(headers: HeaderMap, name: string): string | undefined {
  const v = headers[name];
  return Array.isArray(v) ? v[0] : v;
}

/**
 * Per-invocation context handed to a function alongside its decoded input.
 * Header names are expected in lower case, as node's http module delivers them.
 */
export class RuntimeContext {
  readonly callId: string;
  readonly deadline?: Date;
  readonly headers: HeaderMap;
  readonly config: Readonly<Record<string, string | undefined>>;
  readonly requestType: LogicalContentType;
  responseType: LogicalContentType;
  private responseHeaders = new Map<string, string>();

  constructor(init: {
    headers: HeaderMap;
    requestType: LogicalContentType;
    config?: Record<string, string | undefined>;
  }) {
    this.headers = init.headers;
    this.requestType = init.requestType;
    this.responseType = init.requestType;
    this.config = init.config ?? {};
    this.callId = firstHeader(init.headers, 'fn-call-id') || '';
    const deadline = firstHeader(init.headers, 'fn-deadline');
    if (deadline) {
      const d = new Date(deadline);
      if (!isNaN(d.getTime())) this.deadline = d;
    }
  }

  header(name: string): string | undefined {
    return firstHeader(this.headers, name.toLowerCase());
  }

  /** content-type is owned by the response type and cannot be set here. */
  setResponseHeader(name: string, value: string): void {
    const key = name.toLowerCase();
    if (key === 'content-type') throw new Error('set responseType to change the response content type');
    this.responseHeaders.set(key, value);
  }

  getResponseHeaders(): Record<string, string> {
    return Object.fromEntries(this.responseHeaders);
  }
}
