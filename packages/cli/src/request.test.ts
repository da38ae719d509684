/**
 * Tests for request validation and the daemon wire record.
 */

import { describe, it, expect } from 'vitest';
import {
  FIELD_SEPARATOR,
  WIRE_FIELDS,
  decodeRequest,
  encodeRequest,
  parseRequest,
  requireRoots,
} from './request.js';
import { ConfigError } from './errors.js';
import { ExtractionRequest } from './types.js';

function createRequest(overrides: Partial<ExtractionRequest> = {}): ExtractionRequest {
  return {
    cwd: '/work',
    input: ['graph.json'],
    roots: ['vfs_read'],
    rootPatterns: [],
    direction: 'forward',
    maxDepth: -1,
    ignore: [],
    ignorePatterns: [],
    show: [],
    showPatterns: [],
    trim: false,
    noExtern: false,
    allLocations: false,
    format: 'svg',
    font: 'Helvetica',
    fontSize: 10,
    rankdir: 'LR',
    keep: false,
    ...overrides,
  };
}

describe('parseRequest', () => {
  it('should accept a complete request', () => {
    expect(parseRequest(createRequest())).toEqual(createRequest());
  });

  it('should reject an unknown direction naming the field', () => {
    expect(() => parseRequest({ ...createRequest(), direction: 'sideways' })).toThrow(/^Invalid request \(direction\)/);
  });

  it('should reject a depth below the unbounded sentinel', () => {
    expect(() => parseRequest(createRequest({ maxDepth: -2 }))).toThrow(ConfigError);
  });

  it('should validate the page size', () => {
    expect(parseRequest(createRequest({ size: '7.5,10!' })).size).toBe('7.5,10!');
    expect(() => parseRequest(createRequest({ size: 'A4' }))).toThrow(/expected <width>,<height>\[!\]/);
  });
});

describe('requireRoots', () => {
  it('should accept roots or root patterns', () => {
    expect(() => requireRoots(createRequest())).not.toThrow();
    expect(() => requireRoots(createRequest({ roots: [], rootPatterns: ['^vfs_'] }))).not.toThrow();
  });

  it('should reject a request without roots', () => {
    expect(() => requireRoots(createRequest({ roots: [] }))).toThrow(ConfigError);
  });
});

describe('wire record', () => {
  it('should write every field in order', () => {
    const record = encodeRequest(createRequest({
      input: ['a.json', 'b.json'],
      roots: ['vfs_read', 'vfs_write'],
      trim: true,
      endFunction: 'submit_bio',
      status: '/tmp/status.log',
    }));
    const fields = record.split(FIELD_SEPARATOR);
    expect(fields).toHaveLength(WIRE_FIELDS.length);
    expect(fields).toEqual([
      '1', '/work', 'a.json;b.json', 'vfs_read;vfs_write', '', 'forward', '-1',
      '', '', '', '', '1', '0', '0',
      'submit_bio', '', 'svg', 'Helvetica', '10', '', 'LR', '0', '/tmp/status.log',
    ]);
  });

  it('should decode what it encodes', () => {
    const request = createRequest({
      direction: 'reverse',
      maxDepth: 3,
      ignorePatterns: ['^__', 'lock$'],
      show: ['kfree'],
      noExtern: true,
      allLocations: true,
      output: 'out/graph.png',
      format: 'png',
      fontSize: 8.5,
      size: '8,11',
      rankdir: 'TB',
      keep: true,
    });
    expect(decodeRequest(encodeRequest(request))).toEqual(request);
  });

  it('should refuse list items containing the list separator', () => {
    expect(() => encodeRequest(createRequest({ ignorePatterns: ['a;b'] }))).toThrow(ConfigError);
  });

  it('should refuse values containing a newline', () => {
    expect(() => encodeRequest(createRequest({ output: 'a\nb.svg' }))).toThrow(
      "Field 'output' contains a separator or newline and cannot be sent to the daemon",
    );
  });

  it('should reject a record with the wrong field count', () => {
    expect(() => decodeRequest(['1', '/work'].join(FIELD_SEPARATOR))).toThrow(
      `Malformed request record: expected ${WIRE_FIELDS.length} fields, got 2`,
    );
  });

  it('should reject an unknown version', () => {
    const fields = encodeRequest(createRequest()).split(FIELD_SEPARATOR);
    fields[0] = '2';
    expect(() => decodeRequest(fields.join(FIELD_SEPARATOR))).toThrow("Unsupported request record version '2'");
  });

  it('should reject invalid field values', () => {
    const fields = encodeRequest(createRequest()).split(FIELD_SEPARATOR);
    fields[WIRE_FIELDS.indexOf('trim')] = 'yes';
    expect(() => decodeRequest(fields.join(FIELD_SEPARATOR))).toThrow(/^Invalid request \(trim\)/);
  });
});
