/**
 * Tests for the call graph store: source validation, merging, lookup and
 * loading from disk.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { buildCallGraph, loadCallGraph, sourceFileOf } from './graph.js';
import { ConfigError, InputError, NotFoundError } from './errors.js';

describe('buildCallGraph', () => {
  const source = {
    nodes: [
      { name: 'vfs_read', location: 'fs/read_write.c:450', calls: ['rw_verify_area', 'fsnotify_access'],
        sites: ['rw_verify_area~fs/read_write.c:461'], attributes: { tooltip: 'stack 48' } },
      { name: 'rw_verify_area', location: 'fs/read_write.c:380', calls: [] },
      { name: 'ksys_read', location: 'fs/read_write.c:600', calls: ['vfs_read'] },
    ],
  };

  it('should create extern nodes for undeclared callees', () => {
    const graph = buildCallGraph([source]);
    expect(graph.size).toBe(4);
    expect(graph.node('fsnotify_access')).toEqual({ name: 'fsnotify_access', defined: false, attributes: {} });
  });

  it('should default defined to true when a location is present', () => {
    const graph = buildCallGraph([{ nodes: [{ name: 'a', location: 'x.c:1' }, { name: 'b' }] }]);
    expect(graph.node('a')?.defined).toBe(true);
    expect(graph.node('b')?.defined).toBe(false);
  });

  it('should keep node attributes and location', () => {
    const node = buildCallGraph([source]).node('vfs_read');
    expect(node?.location).toBe('fs/read_write.c:450');
    expect(node?.attributes).toEqual({ tooltip: 'stack 48' });
  });

  it('should list relations in input order for both directions', () => {
    const graph = buildCallGraph([source]);
    expect(graph.relations('vfs_read', 'forward')).toEqual(['rw_verify_area', 'fsnotify_access']);
    expect(graph.relations('vfs_read', 'reverse')).toEqual(['ksys_read']);
    expect(graph.relations('rw_verify_area', 'forward')).toEqual([]);
  });

  it('should record call sites per edge', () => {
    const graph = buildCallGraph([source]);
    expect(graph.sites('vfs_read', 'rw_verify_area')).toEqual(['fs/read_write.c:461']);
    expect(graph.sites('vfs_read', 'fsnotify_access')).toEqual([]);
  });

  it('should declare a call from a site tag alone', () => {
    const graph = buildCallGraph([{ nodes: [{ name: 'a', sites: ['b~a.c:3', 'b~a.c:9', 'b~a.c:3'] }] }]);
    expect(graph.relations('a', 'forward')).toEqual(['b']);
    expect(graph.sites('a', 'b')).toEqual(['a.c:3', 'a.c:9']);
  });

  it('should union calls of a function declared in several sources', () => {
    const graph = buildCallGraph([
      { nodes: [{ name: 'a', location: 'a.c:1', calls: ['b'] }] },
      { nodes: [{ name: 'a', location: 'other.c:5', calls: ['c', 'b'] }] },
    ]);
    expect(graph.relations('a', 'forward')).toEqual(['b', 'c']);
    expect(graph.node('a')?.location).toBe('a.c:1');
    expect(graph.edgeCount).toBe(2);
  });

  it('should reject a malformed source with InputError', () => {
    expect(() => buildCallGraph([{ functions: [] }], ['bad.json'])).toThrow(InputError);
    expect(() => buildCallGraph([{ nodes: [{ name: '' }] }])).toThrow(InputError);
  });

  it('should reject attribute names that are not DOT identifiers', () => {
    const source = { nodes: [{ name: 'a', attributes: { 'fill color': 'red' } }] };
    expect(() => buildCallGraph([source])).toThrow(InputError);
    expect(() => buildCallGraph([source])).toThrow(/attribute names must be DOT identifiers/);
    expect(buildCallGraph([{ nodes: [{ name: 'a', attributes: { fillcolor: 'red' } }] }]).node('a')?.attributes).toEqual({ fillcolor: 'red' });
  });

  it('should reject a call-site tag without a location', () => {
    expect(() => buildCallGraph([{ nodes: [{ name: 'a', sites: ['b~'] }] }])).toThrow(
      "Malformed call-site tag 'b~' on 'a'",
    );
  });
});

describe('CallGraph.resolve', () => {
  const graph = buildCallGraph([{
    nodes: [
      { name: 'init', calls: ['helper@fs/a.c', 'probe@drivers/x.c', 'probe@drivers/y.c'] },
    ],
  }]);

  it('should find an exact name', () => {
    expect(graph.resolve('init').name).toBe('init');
  });

  it('should fall back to a unique qualified name', () => {
    expect(graph.resolve('helper').name).toBe('helper@fs/a.c');
  });

  it('should reject an ambiguous name', () => {
    expect(() => graph.resolve('probe')).toThrow("Function 'probe' is ambiguous");
  });

  it('should reject an unknown name with NotFoundError', () => {
    expect(() => graph.resolve('missing')).toThrow(NotFoundError);
  });

  it('should match names by pattern', () => {
    expect(graph.match(/^probe@/)).toEqual(['probe@drivers/x.c', 'probe@drivers/y.c']);
  });
});

describe('sourceFileOf', () => {
  it('should strip line and column', () => {
    expect(sourceFileOf('fs/read_write.c:450')).toBe('fs/read_write.c');
    expect(sourceFileOf('mm/slab.c:12:7')).toBe('mm/slab.c');
  });

  it('should return undefined for addresses and missing locations', () => {
    expect(sourceFileOf('0xffffffff81000000')).toBeUndefined();
    expect(sourceFileOf(undefined)).toBeUndefined();
  });
});

describe('loadCallGraph', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cgsieve-graph-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const write = (name: string, content: unknown) =>
    writeFile(join(dir, name), typeof content === 'string' ? content : JSON.stringify(content), 'utf8');

  it('should load a single file relative to cwd', async () => {
    await write('g.json', { nodes: [{ name: 'a', calls: ['b'] }] });
    const graph = await loadCallGraph(['g.json'], dir);
    expect(graph.names()).toEqual(['a', 'b']);
    expect(graph.sources).toEqual([join(dir, 'g.json')]);
  });

  it('should merge every json file under a directory in sorted order', async () => {
    await mkdir(join(dir, 'parts'));
    await writeFile(join(dir, 'parts', 'b.json'), JSON.stringify({ nodes: [{ name: 'x', calls: ['z'] }] }));
    await writeFile(join(dir, 'parts', 'a.json'), JSON.stringify({ nodes: [{ name: 'x', calls: ['y'] }] }));
    const graph = await loadCallGraph([join(dir, 'parts')]);
    expect(graph.relations('x', 'forward')).toEqual(['y', 'z']);
  });

  it('should fail with InputError for a missing source', async () => {
    await expect(loadCallGraph(['nope.json'], dir)).rejects.toThrow(InputError);
  });

  it('should fail with InputError for invalid JSON', async () => {
    await write('broken.json', '{ "nodes": [');
    await expect(loadCallGraph(['broken.json'], dir)).rejects.toThrow(/is not valid JSON/);
  });

  it('should fail with InputError for a directory without graph files', async () => {
    await mkdir(join(dir, 'empty'));
    await expect(loadCallGraph(['empty'], dir)).rejects.toThrow(InputError);
  });

  it('should require at least one source', async () => {
    await expect(loadCallGraph([], dir)).rejects.toThrow(ConfigError);
  });
});
