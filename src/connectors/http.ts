import * as http from 'http';
import * as fs from 'fs';
import * as path from 'path';
import { CodecRegistry } from '../codec/registry.js';
import { createXmlCodec } from '../codec/xml.js';
import { FunctionConfig, describeListener, loadConfig } from '../config.js';
import { CallResult, FunctionHandler, FunctionShapes, errorResult, handleCall } from '../function/invoke.js';

interface InvocationLogEntry {
  ts: string;
  event: string;
  callId?: string;
  method?: string;
  path?: string;
  contentType?: string;
  status?: number;
  bytes?: number;
  durMs?: number;
  error?: string;
}

let logStream: fs.WriteStream | null = null;

function initLogStream(logPath: string) {
  if (logStream) return;

  try {
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    logStream = fs.createWriteStream(logPath, { flags: 'a' });
    logStream.on('error', (err) => {
      console.error(`[FDK] Log stream error: ${err.message}`);
      logStream = null;
    });
    console.log(`[FDK] JSONL logging enabled: ${logPath}`);
  } catch (e: unknown) {
    console.error(`[FDK] Failed to initialize log stream: ${e instanceof Error ? e.message : String(e)}`);
  }
}

function closeLogStream(): Promise<void> {
  const stream = logStream;
  logStream = null;
  if (!stream) return Promise.resolve();
  return new Promise((resolve) => stream.end(() => resolve()));
}

function logJsonl(entry: InvocationLogEntry) {
  if (!logStream) return;
  try {
    logStream.write(JSON.stringify(entry) + '\n');
  } catch (e: unknown) {
    console.error(`[FDK] Failed to write log entry: ${e instanceof Error ? e.message : String(e)}`);
  }
}

// Resolves to null as soon as the body passes the limit; reading stops there.
function readBody(req: http.IncomingMessage, limit: number): Promise<Buffer | null> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    const onData = (c: Buffer) => {
      size += c.length;
      if (size > limit) {
        req.off('data', onData);
        req.pause();
        resolve(null);
        return;
      }
      chunks.push(c);
    };
    req.on('data', onData);
    req.on('end', () => resolve(Buffer.concat(chunks)));
    req.on('error', reject);
  });
}

// Only a leftover socket from an earlier run is removed; any other file is left alone.
function clearStaleSocket(socketPath: string) {
  const stat = fs.lstatSync(socketPath, { throwIfNoEntry: false });
  if (!stat) return;
  if (!stat.isSocket()) throw new Error(`listener path ${socketPath} exists and is not a socket`);
  fs.unlinkSync(socketPath);
}

function send(res: http.ServerResponse, result: CallResult) {
  res.writeHead(result.status, result.headers);
  res.end(result.body);
}

function withHeader(result: CallResult, name: string, value: string): CallResult {
  return { ...result, headers: { ...result.headers, [name]: value } };
}

function headerValue(v: string | string[] | undefined): string | undefined {
  return Array.isArray(v) ? v[0] : v;
}

/**
 * Serves a function over HTTP on the configured listener. Each POST /call is
 * one invocation; a failed invocation does not stop the server.
 */
export function startFunction<I, O>(
  handler: FunctionHandler<I, O>,
  shapes: FunctionShapes<I, O>,
  config: FunctionConfig = loadConfig()
): http.Server {
  if (config.listener.kind === 'unix') clearStaleSocket(config.listener.path);
  if (config.httpLogPath) initLogStream(config.httpLogPath);
  const codecs = new CodecRegistry([createXmlCodec({ rootName: config.xmlRootName })]);

  async function serve(req: http.IncomingMessage, res: http.ServerResponse) {
    const t0 = process.hrtime.bigint();
    const method = req.method || 'GET';
    const reqPath = req.url || '/';
    const body = await readBody(req, config.maxBodyBytes);

    // With connection: close node ends the socket after the 413 is written.
    const result = body === null
      ? withHeader(errorResult(413, 'payload_too_large', `request body exceeds ${config.maxBodyBytes} bytes`), 'connection', 'close')
      : await handleCall({ method, path: reqPath, headers: req.headers, body }, handler, shapes, {
          strictContentType: config.strictContentType,
          codecs,
          config: process.env
        });

    send(res, result);
    logJsonl({
      ts: new Date().toISOString(),
      event: 'invocation_complete',
      callId: headerValue(req.headers['fn-call-id']),
      method,
      path: reqPath,
      contentType: headerValue(req.headers['content-type']),
      status: result.status,
      bytes: body?.length,
      durMs: Math.round(Number(process.hrtime.bigint() - t0) / 1e6),
      error: result.error
    });
  }

  const server = http.createServer((req, res) => {
    serve(req, res).catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[FDK] Invocation failed: ${message}`);
      logJsonl({ ts: new Date().toISOString(), event: 'invocation_complete', method: req.method, path: req.url, status: 500, error: 'internal_error' });
      if (!res.headersSent) send(res, errorResult(500, 'internal_error', message));
      else res.end();
    });
  });

  server.on('listening', () => {
    console.log(`[FDK] Function listening on ${describeListener(config.listener)}`);
  });

  if (config.listener.kind === 'unix') {
    server.listen(config.listener.path);
  } else {
    server.listen(config.listener.port, config.listener.host);
  }
  return server;
}

export async function stopFunction(server: http.Server): Promise<void> {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  await closeLogStream();
}
