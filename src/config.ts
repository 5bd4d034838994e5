import { DEFAULT_XML_ROOT } from './codec/xml.js';

export type Listener =
  | { kind: 'unix'; path: string }
  | { kind: 'tcp'; host: string; port: number };

export interface FunctionConfig {
  listener: Listener;
  strictContentType: boolean;
  xmlRootName: string;
  maxBodyBytes: number;
  httpLogPath?: string;
}

const DEFAULT_HOST = '127.0.0.1';
const DEFAULT_PORT = 8080;
const DEFAULT_MAX_BODY_BYTES = 10485760;

/** Accepts `unix:/path.sock`, `host:port` or a bare port. */
export function parseListener(value?: string): Listener {
  const v = (value || '').trim();
  if (!v) return { kind: 'tcp', host: DEFAULT_HOST, port: DEFAULT_PORT };
  if (v.startsWith('unix:')) return { kind: 'unix', path: v.slice('unix:'.length) };
  const idx = v.lastIndexOf(':');
  const host = idx >= 0 ? v.slice(0, idx) || DEFAULT_HOST : DEFAULT_HOST;
  const port = parseInt(idx >= 0 ? v.slice(idx + 1) : v, 10);
  return { kind: 'tcp', host, port: isNaN(port) ? DEFAULT_PORT : port };
}

function parsePositiveInt(value: string | undefined, def: number): number {
  const n = parseInt(value || String(def), 10);
  return isNaN(n) || n <= 0 ? def : n;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): FunctionConfig {
  return {
    listener: parseListener(env.FN_LISTENER),
    strictContentType: (env.FN_STRICT_CONTENT_TYPE || '').toLowerCase() === 'true',
    xmlRootName: env.FN_XML_ROOT?.trim() || DEFAULT_XML_ROOT,
    maxBodyBytes: parsePositiveInt(env.FN_MAX_BODY_BYTES, DEFAULT_MAX_BODY_BYTES),
    httpLogPath: env.FN_HTTP_LOG?.trim() || undefined
  };
}

export function describeListener(listener: Listener): string {
  return listener.kind === 'unix' ? `unix:${listener.path}` : `${listener.host}:${listener.port}`;
}
