/**
 * Content-type classification and canonical MIME strings.
 */

import { describe, test } from 'node:test';
import { strict as assert } from 'assert';
import {
  ContentType,
  acceptedMimes,
  canonicalMime,
  classify,
  listContentTypes,
  lookupContentType
} from '../src/codec/content-type.js';

describe('classify', () => {
  test('maps every accepted inbound MIME to its logical type', () => {
    assert.equal(classify('application/json'), ContentType.JSON);
    assert.equal(classify('text/yaml'), ContentType.YAML);
    assert.equal(classify('application/yaml'), ContentType.YAML);
    assert.equal(classify('text/xml'), ContentType.XML);
    assert.equal(classify('application/xml'), ContentType.XML);
    assert.equal(classify('text/plain'), ContentType.Plain);
    assert.equal(classify('application/x-www-form-urlencoded'), ContentType.URLEncoded);
  });

  test('falls back to JSON for anything it does not know', () => {
    for (const mime of ['', 'text/html', 'application/octet-stream', 'TEXT/PLAIN', 'text/plain; charset=utf-8', ' application/yaml']) {
      assert.equal(classify(mime), ContentType.JSON, `classify(${JSON.stringify(mime)})`);
    }
  });

  test('both YAML strings land on the same type', () => {
    assert.equal(classify('text/yaml'), classify('application/yaml'));
  });
});

describe('canonicalMime', () => {
  test('returns one outbound MIME per type', () => {
    assert.equal(canonicalMime(ContentType.JSON), 'application/json');
    assert.equal(canonicalMime(ContentType.YAML), 'text/yaml');
    assert.equal(canonicalMime(ContentType.XML), 'application/xml');
    assert.equal(canonicalMime(ContentType.Plain), 'text/plain');
    assert.equal(canonicalMime(ContentType.URLEncoded), 'application/x-www-form-urlencoded');
  });

  test('classify then canonicalMime is stable for every accepted MIME', () => {
    for (const type of listContentTypes()) {
      for (const mime of acceptedMimes(type)) {
        assert.equal(canonicalMime(classify(mime)), canonicalMime(type));
      }
    }
  });

  test('application/yaml is answered with text/yaml', () => {
    assert.equal(canonicalMime(classify('application/yaml')), 'text/yaml');
    assert.equal(canonicalMime(classify('text/xml')), 'application/xml');
  });
});

describe('lookupContentType', () => {
  test('is undefined for unknown strings', () => {
    assert.equal(lookupContentType('text/html'), undefined);
    assert.equal(lookupContentType(''), undefined);
  });

  test('lists types in table order', () => {
    assert.deepEqual(listContentTypes(), ['json', 'yaml', 'xml', 'plain', 'urlencoded']);
  });
});
