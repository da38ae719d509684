import { execFile } from 'node:child_process';
import { createReadStream, Stats } from 'node:fs';
import { appendFile, stat } from 'node:fs/promises';
import type { Readable } from 'node:stream';
import { promisify } from 'node:util';
import { PollPolicy } from './config.js';
import { ResourceError, errorMessage } from './errors.js';
import { Logger } from './logger.js';

const execFileAsync = promisify(execFile);

/** Opens the read side of the request endpoint. */
export type EndpointOpener = () => Readable;

export function fifoEndpoint(path: string): EndpointOpener {
  return () => createReadStream(path, { encoding: 'utf8' });
}

async function statOrUndefined(path: string): Promise<Stats | undefined> {
  try {
    return await stat(path);
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return undefined;
    throw new ResourceError(`Cannot inspect ${path}: ${errorMessage(e)}`, { path }, { cause: e });
  }
}

export async function ensureFifo(path: string): Promise<void> {
  const info = await statOrUndefined(path);
  if (info) {
    if (!info.isFIFO()) throw new ResourceError(`${path} exists and is not a named pipe`, { path });
    return;
  }
  try {
    await execFileAsync('mkfifo', ['-m', '600', path]);
  } catch (e) {
    throw new ResourceError(`Cannot create named pipe ${path}: ${errorMessage(e)}`, { path }, { cause: e });
  }
}

/** Client side: write one record. Blocks until the daemon has the pipe open. */
export async function submitRecord(path: string, record: string): Promise<void> {
  const info = await statOrUndefined(path);
  if (!info?.isFIFO()) throw new ResourceError(`No daemon endpoint at ${path}`, { path });
  try {
    await appendFile(path, `${record}\n`, 'utf8');
  } catch (e) {
    throw new ResourceError(`Cannot write request to ${path}: ${errorMessage(e)}`, { path }, { cause: e });
  }
}

/** Receive timeout for the current idle time. */
export function pollInterval(idleMs: number, policy: PollPolicy): number {
  return idleMs < policy.shortWindowMs ? policy.shortIntervalMs : policy.longIntervalMs;
}

function isPending(stream: Readable): boolean {
  return 'pending' in stream && stream.pending === true;
}

/**
 * Newline-delimited records from a pipe-like endpoint. The endpoint is
 * reopened whenever its writer side closes, so the next writer always finds
 * a reader; buffered records are kept across reopens.
 */
export class RequestChannel {
  private stream: Readable | undefined;
  private buffer = '';
  private readonly records: string[] = [];
  private wake: (() => void) | undefined;
  private closed = false;
  reopens = 0;

  constructor(private readonly open: EndpointOpener, private readonly log: Logger) {}

  start(): void {
    this.attach();
  }

  get queued(): number { return this.records.length; }

  /** Next record, or undefined when none arrived within `timeoutMs`. */
  async receive(timeoutMs: number): Promise<string | undefined> {
    if (!this.records.length && !this.closed) {
      await new Promise<void>(resolve => {
        const timer = setTimeout(() => {
          this.wake = undefined;
          resolve();
        }, timeoutMs);
        this.wake = () => {
          clearTimeout(timer);
          this.wake = undefined;
          resolve();
        };
      });
    }
    return this.records.shift();
  }

  /**
   * Close and reopen the endpoint. Skipped while the current endpoint is
   * still waiting for a writer, since that open is already armed.
   */
  reopen(): boolean {
    if (this.closed) return false;
    const current = this.stream;
    if (current && isPending(current)) return false;
    this.stream = undefined;
    current?.destroy();
    this.flushPartial();
    this.reopens++;
    this.attach();
    return true;
  }

  close(): void {
    this.closed = true;
    const current = this.stream;
    this.stream = undefined;
    current?.destroy();
    this.wake?.();
  }

  private attach(): void {
    if (this.closed) return;
    let stream: Readable;
    try {
      stream = this.open();
    } catch (e) {
      this.log.warn(`Cannot open request endpoint: ${errorMessage(e)}`);
      return;
    }
    this.stream = stream;
    stream.on('data', (chunk: unknown) => {
      if (stream === this.stream) this.onData(chunk);
    });
    stream.on('end', () => {
      if (stream !== this.stream) return;
      this.flushPartial();
      this.attach();
    });
    stream.on('error', (e: Error) => {
      if (stream !== this.stream) return;
      this.stream = undefined;
      this.log.warn(`Request endpoint failed: ${e.message}`);
    });
  }

  private onData(chunk: unknown): void {
    this.buffer += typeof chunk === 'string' ? chunk : Buffer.isBuffer(chunk) ? chunk.toString('utf8') : String(chunk);
    let nl = this.buffer.indexOf('\n');
    while (nl >= 0) {
      this.push(this.buffer.slice(0, nl));
      this.buffer = this.buffer.slice(nl + 1);
      nl = this.buffer.indexOf('\n');
    }
  }

  // A writer that closed without a final newline still sent a record.
  private flushPartial(): void {
    const rest = this.buffer;
    this.buffer = '';
    this.push(rest);
  }

  private push(line: string): void {
    const record = line.replace(/\r$/, '');
    if (!record.trim()) return;
    this.records.push(record);
    this.wake?.();
  }
}
