/**
 * Tests for turning command-line options into requests and exit codes.
 */

import { describe, it, expect } from 'vitest';
import { buildRequest, failureExitCode, outcomeExitCode, parseArgs } from './args.js';
import { loadConfig } from './config.js';
import { ConfigError, EmptyResultError, NotFoundError, RenderError } from './errors.js';
import { ExtractionRequest } from './types.js';

const config = loadConfig({});

async function requestFor(args: string[], env: Record<string, string> = {}): Promise<ExtractionRequest> {
  const envConfig = loadConfig(env);
  return buildRequest(await parseArgs(args, envConfig), envConfig, '/work');
}

describe('buildRequest', () => {
  it('should fill in defaults', async () => {
    expect(await requestFor(['-i', 'kernel.json', '-r', 'vfs_read'])).toEqual({
      cwd: '/work',
      input: ['kernel.json'],
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
    });
  });

  it('should turn --no-extern into extern exclusion', async () => {
    expect((await requestFor(['-i', 'k.json', '-r', 'a', '--no-extern'])).noExtern).toBe(true);
    expect((await requestFor(['-i', 'k.json', '-r', 'a', '--extern'])).noExtern).toBe(false);
  });

  it('should split roots, ignores and shows on semicolons', async () => {
    const request = await requestFor([
      '-i', 'k.json',
      '-r', 'vfs_read;vfs_write', '-r', 'do_sys_open',
      '--ignore', 'kfree; kmalloc', '--ignore', 'mutex_lock',
      '--show', 'schedule;',
    ]);
    expect(request.roots).toEqual(['vfs_read', 'vfs_write', 'do_sys_open']);
    expect(request.ignore).toEqual(['kfree', 'kmalloc', 'mutex_lock']);
    expect(request.show).toEqual(['schedule']);
  });

  it('should keep patterns whole', async () => {
    const request = await requestFor(['-i', 'k.json', '--root-pattern', '^vfs_(read|write)$', '--ignore-pattern', '^__']);
    expect(request.rootPatterns).toEqual(['^vfs_(read|write)$']);
    expect(request.ignorePatterns).toEqual(['^__']);
  });

  it('should fall back to CGSIEVE_GRAPH for the input', async () => {
    const env = { CGSIEVE_GRAPH: 'kernel.json;drivers/' };
    expect((await requestFor(['-r', 'a'], env)).input).toEqual(['kernel.json', 'drivers/']);
    expect((await requestFor(['-r', 'a', '-i', 'mm.json'], env)).input).toEqual(['mm.json']);
  });

  it('should resolve the status file against the working directory', async () => {
    expect((await requestFor(['-i', 'k.json', '-r', 'a', '--status', 'logs/s.log'])).status).toBe('/work/logs/s.log');
  });

  it('should read layout options', async () => {
    const request = await requestFor([
      '-i', 'k.json', '-r', 'a', '-d', 'reverse', '--max-depth', '3', '-e', 'schedule',
      '-f', 'png', '--rankdir', 'TB', '--size', '8,11', '-k', '-L', '--trim',
    ]);
    expect(request).toMatchObject({
      direction: 'reverse',
      maxDepth: 3,
      endFunction: 'schedule',
      format: 'png',
      rankdir: 'TB',
      size: '8,11',
      keep: true,
      allLocations: true,
      trim: true,
    });
  });

  it('should reject an invalid page size with ConfigError', async () => {
    const argv = await parseArgs(['-i', 'k.json', '-r', 'a', '--size', 'large'], config);
    expect(() => buildRequest(argv, config, '/work')).toThrow(ConfigError);
  });
});

describe('outcomeExitCode', () => {
  it('should fail when any root failed to render', () => {
    expect(outcomeExitCode({
      roots: [
        { root: 'a', status: 'written', output: '/work/a.svg', edges: 1 },
        { root: 'b', status: 'render-failed', edges: 2, message: 'boom' },
      ],
    })).toBe(1);
  });

  it('should succeed on written and empty roots', () => {
    expect(outcomeExitCode({
      roots: [
        { root: 'a', status: 'written', output: '/work/a.svg', edges: 1 },
        { root: 'b', status: 'empty', edges: 0, message: 'nothing' },
      ],
    })).toBe(0);
  });
});

describe('failureExitCode', () => {
  it('should fail direct runs only on fatal errors', () => {
    expect(failureExitCode(new NotFoundError('x'), 'direct')).toBe(1);
    expect(failureExitCode(new Error('x'), 'direct')).toBe(1);
    expect(failureExitCode(new EmptyResultError('x'), 'direct')).toBe(0);
    expect(failureExitCode(new RenderError('x'), 'direct')).toBe(0);
  });

  it('should fail a daemon that cannot start whatever the error', () => {
    expect(failureExitCode(new EmptyResultError('x'), 'daemon')).toBe(1);
    expect(failureExitCode(new ConfigError('x'), 'daemon')).toBe(1);
  });
});
