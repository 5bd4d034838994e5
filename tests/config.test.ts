import { describe, test } from 'node:test';
import { strict as assert } from 'assert';
import { describeListener, loadConfig, parseListener } from '../src/config.js';

describe('loadConfig', () => {
  test('defaults', () => {
    assert.deepEqual(loadConfig({}), {
      listener: { kind: 'tcp', host: '127.0.0.1', port: 8080 },
      strictContentType: false,
      xmlRootName: 'document',
      maxBodyBytes: 10485760,
      httpLogPath: undefined
    });
  });

  test('reads every variable', () => {
    const config = loadConfig({
      FN_LISTENER: 'unix:/tmp/iofs/lsnr.sock',
      FN_STRICT_CONTENT_TYPE: 'TRUE',
      FN_XML_ROOT: 'person',
      FN_MAX_BODY_BYTES: '2048',
      FN_HTTP_LOG: 'reports/fn.log.jsonl'
    });
    assert.deepEqual(config, {
      listener: { kind: 'unix', path: '/tmp/iofs/lsnr.sock' },
      strictContentType: true,
      xmlRootName: 'person',
      maxBodyBytes: 2048,
      httpLogPath: 'reports/fn.log.jsonl'
    });
  });

  test('bad numbers fall back to the default', () => {
    assert.equal(loadConfig({ FN_MAX_BODY_BYTES: 'lots' }).maxBodyBytes, 10485760);
    assert.equal(loadConfig({ FN_MAX_BODY_BYTES: '-5' }).maxBodyBytes, 10485760);
  });
});

describe('parseListener', () => {
  test('accepts host:port, a bare port and unix sockets', () => {
    assert.deepEqual(parseListener('0.0.0.0:9000'), { kind: 'tcp', host: '0.0.0.0', port: 9000 });
    assert.deepEqual(parseListener('9000'), { kind: 'tcp', host: '127.0.0.1', port: 9000 });
    assert.deepEqual(parseListener(':9000'), { kind: 'tcp', host: '127.0.0.1', port: 9000 });
    assert.deepEqual(parseListener('unix:/tmp/fn.sock'), { kind: 'unix', path: '/tmp/fn.sock' });
  });

  test('describes listeners the way they are written', () => {
    assert.equal(describeListener(parseListener('unix:/tmp/fn.sock')), 'unix:/tmp/fn.sock');
    assert.equal(describeListener(parseListener('9000')), '127.0.0.1:9000');
  });
});
