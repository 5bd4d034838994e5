/**
 * Invocation logging to a JSONL file when FN_HTTP_LOG is set.
 */

import { test } from 'node:test';
import { strict as assert } from 'assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as http from 'http';
import { once } from 'events';
import { text } from '../src/codec/shapes.js';
import { loadConfig } from '../src/config.js';
import { startFunction, stopFunction } from '../src/connectors/http.js';

function postPlain(port: number, body: string, callId: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const req = http.request({ hostname: '127.0.0.1', port, method: 'POST', path: '/call', headers: { 'content-type': 'text/plain', 'fn-call-id': callId } }, (res) => {
      res.resume();
      res.on('end', () => resolve(res.statusCode || 0));
    });
    req.on('error', reject);
    req.end(body);
  });
}

test('writes one JSON line per invocation', async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fn-coerce-log-'));
  const logPath = path.join(dir, 'reports', 'invocations.log.jsonl');
  const config = loadConfig({ FN_LISTENER: '127.0.0.1:0', FN_HTTP_LOG: logPath });

  const server = startFunction((_ctx, input: string) => input.toUpperCase(), { input: text, output: text }, config);
  await once(server, 'listening');
  const addr = server.address();
  const port = typeof addr === 'object' && addr ? addr.port : 0;

  try {
    assert.equal(await postPlain(port, 'hi', 'call-1'), 200);
    assert.equal(await postPlain(port, 'again', 'call-2'), 200);
  } finally {
    await stopFunction(server);
  }

  const lines = fs.readFileSync(logPath, 'utf8').trim().split('\n');
  assert.equal(lines.length, 2);
  const first: unknown = JSON.parse(lines[0]);
  assert.ok(typeof first === 'object' && first !== null);
  assert.deepEqual(
    { ...first, ts: 'ts', durMs: 0 },
    {
      ts: 'ts',
      event: 'invocation_complete',
      callId: 'call-1',
      method: 'POST',
      path: '/call',
      contentType: 'text/plain',
      status: 200,
      bytes: 2,
      durMs: 0
    }
  );

  fs.rmSync(dir, { recursive: true, force: true });
});
