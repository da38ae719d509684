import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError } from './errors.js';

export interface PollPolicy {
  /** Receive timeout while the server has been idle for less than `shortWindowMs`. */
  shortIntervalMs: number;
  shortWindowMs: number;
  longIntervalMs: number;
  /** Idle time after which the channel endpoint is closed and reopened. */
  maxIdleMs: number;
}

export interface Config {
  graphSources: string[];
  fifoPath: string;
  logLevel: string;
  font: string;
  fontSize: number;
  /** Graphviz binary for raster and print formats. */
  dotCommand: string;
  poll: PollPolicy;
}

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, key: string, defaultValue: string): string {
  const value = env[key];
  return value === undefined || value === '' ? defaultValue : value;
}

function getEnvVarAsNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigError(`Environment variable ${key} must be a non-negative number`, { value });
  }
  return parsed;
}

export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(';').map(s => s.trim()).filter(s => s.length > 0);
}

export function loadConfig(env: Env = process.env): Config {
  return {
    graphSources: splitList(env.CGSIEVE_GRAPH),
    fifoPath: getEnvVar(env, 'CGSIEVE_FIFO', join(tmpdir(), 'cgsieve.fifo')),
    logLevel: getEnvVar(env, 'CGSIEVE_LOG_LEVEL', 'info'),
    font: getEnvVar(env, 'CGSIEVE_FONT', 'Helvetica'),
    fontSize: getEnvVarAsNumber(env, 'CGSIEVE_FONT_SIZE', 10),
    dotCommand: getEnvVar(env, 'CGSIEVE_DOT', 'dot'),
    poll: {
      shortIntervalMs: getEnvVarAsNumber(env, 'CGSIEVE_POLL_SHORT_MS', 50),
      shortWindowMs: getEnvVarAsNumber(env, 'CGSIEVE_POLL_WINDOW_MS', 1000),
      longIntervalMs: getEnvVarAsNumber(env, 'CGSIEVE_POLL_LONG_MS', 500),
      maxIdleMs: getEnvVarAsNumber(env, 'CGSIEVE_MAX_IDLE_MS', 30000),
    },
  };
}
