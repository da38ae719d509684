import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, dirname, extname, join, resolve } from 'node:path';
import { RequestChannel, pollInterval, submitRecord } from './channel.js';
import { PollPolicy } from './config.js';
import { toDot } from './dot.js';
import { EmptyResultError, NotFoundError, RenderError, ResourceError, describeError, errorMessage } from './errors.js';
import { extractSubgraph } from './extract.js';
import { FilterRegistry, compileFilters, compilePatterns } from './filters.js';
import { CallGraph, loadCallGraph } from './graph.js';
import { FORMAT_EXTENSIONS, LayoutInvoker, keptPathFor, renderGraph } from './render.js';
import { decodeRequest, encodeRequest, requireRoots } from './request.js';
import { Logger, closeLogger, createComponentLogger, createStatusLogger } from './logger.js';
import { ExtractionRequest } from './types.js';

export type RootStatus = 'written' | 'empty' | 'render-failed';

export interface RootOutcome {
  root: string;
  status: RootStatus;
  output?: string;
  kept?: string;
  edges: number;
  message?: string;
}

export interface RequestOutcome {
  roots: RootOutcome[];
}

export interface ServerOptions {
  render?: LayoutInvoker;
  loadGraph?: (sources: string[], cwd: string) => Promise<CallGraph>;
  trimSet?: ReadonlySet<string>;
  logger?: Logger;
  dotCommand?: string;
  /** Parent of per-request work directories. */
  tmpRoot?: string;
}

interface RootRun {
  graph: CallGraph;
  request: ExtractionRequest;
  filters: FilterRegistry;
  endFunction?: string;
  workDir: string;
  multiple: boolean;
  log: Logger;
}

function safeName(name: string): string {
  return name.replace(/[^A-Za-z0-9_.-]/g, '_');
}

/** Where one root's artifact goes; several roots get the root name appended. */
export function outputPathFor(request: ExtractionRequest, root: string, multiple: boolean): string {
  if (!request.output) return resolve(request.cwd, `${safeName(root)}${FORMAT_EXTENSIONS[request.format]}`);
  const out = resolve(request.cwd, request.output);
  if (!multiple) return out;
  const ext = extname(out);
  return join(dirname(out), `${basename(out, ext)}-${safeName(root)}${ext}`);
}

/**
 * Holds one call graph and runs extraction requests against it, one at a
 * time, either once or for as long as a daemon channel delivers records.
 */
export class RequestServer {
  private resident: { key: string; graph: CallGraph } | undefined;
  private readonly log: Logger;
  private readonly render: LayoutInvoker;
  private readonly loadGraph: (sources: string[], cwd: string) => Promise<CallGraph>;

  constructor(private readonly opts: ServerOptions = {}) {
    this.log = opts.logger ?? createComponentLogger('server');
    this.render = opts.render ?? renderGraph;
    this.loadGraph = opts.loadGraph ?? loadCallGraph;
  }

  get graph(): CallGraph | undefined {
    return this.resident?.graph;
  }

  /**
   * The resident graph when the request names the same sources (or none),
   * otherwise a freshly loaded one that becomes resident.
   */
  async acquire(request: ExtractionRequest, log: Logger = this.log): Promise<CallGraph> {
    if (this.resident && !request.input.length) return this.resident.graph;
    return this.preload(request.input, request.cwd, log);
  }

  async preload(sources: string[], cwd: string, log: Logger = this.log): Promise<CallGraph> {
    const key = sources.map(s => resolve(cwd, s)).join('\n');
    if (this.resident?.key === key) return this.resident.graph;
    const started = Date.now();
    const graph = await this.loadGraph(sources, cwd);
    log.info(`Loaded call graph: ${graph.size} functions, ${graph.edgeCount} calls`, { ms: Date.now() - started });
    this.resident = { key, graph };
    return graph;
  }

  resolveRoots(graph: CallGraph, request: ExtractionRequest, log: Logger = this.log): string[] {
    const names = request.roots.map(r => graph.resolve(r).name);
    for (const pattern of compilePatterns(request.rootPatterns, 'root')) {
      const hits = graph.match(pattern);
      if (!hits.length) log.warn(`Root pattern '${pattern.source}' matches no function`);
      names.push(...hits);
    }
    const unique = [...new Set(names)];
    if (!unique.length) throw new NotFoundError('No function matches the requested roots');
    return unique;
  }

  async handle(request: ExtractionRequest, log: Logger = this.log): Promise<RequestOutcome> {
    requireRoots(request);
    const graph = await this.acquire(request, log);
    const roots = this.resolveRoots(graph, request, log);
    const endFunction = request.endFunction ? graph.resolve(request.endFunction).name : undefined;
    const filters = compileFilters(request, graph, this.opts.trimSet);

    let workDir: string;
    try {
      workDir = await mkdtemp(join(this.opts.tmpRoot ?? tmpdir(), 'cgsieve-'));
    } catch (e) {
      throw new ResourceError(`Cannot create work directory: ${errorMessage(e)}`, undefined, { cause: e });
    }
    try {
      const outcomes: RootOutcome[] = [];
      for (const root of roots) {
        outcomes.push(await this.runRoot(root, { graph, request, filters, endFunction, workDir, multiple: roots.length > 1, log }));
      }
      return { roots: outcomes };
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  private async runRoot(root: string, run: RootRun): Promise<RootOutcome> {
    const { request, log } = run;
    let extraction;
    try {
      extraction = extractSubgraph(run.graph, root, {
        direction: request.direction,
        maxDepth: request.maxDepth,
        filters: run.filters,
        endFunction: run.endFunction,
        allLocations: request.allLocations,
      });
    } catch (e) {
      if (!(e instanceof EmptyResultError)) throw e;
      log.warn(e.message, { root });
      return { root, status: 'empty', edges: 0, message: e.message };
    }
    log.debug(`Extracted '${root}'`, { ...extraction.stats, files: extraction.sourceFiles.length });

    const dot = toDot(extraction.edges, extraction.members, {
      rankdir: request.rankdir,
      font: request.font,
      fontSize: request.fontSize,
      size: request.size,
      direction: request.direction,
    });
    const output = outputPathFor(request, root, run.multiple);
    try {
      const rendered = await this.render(dot, {
        format: request.format,
        output,
        workDir: run.workDir,
        keep: request.keep,
        title: `${root} (${request.direction})`,
        dotCommand: this.opts.dotCommand,
      });
      log.info(`Wrote ${rendered.output}`, { edges: extraction.edges.length, nodes: extraction.members.length });
      const outcome: RootOutcome = { root, status: 'written', output: rendered.output, edges: extraction.edges.length };
      if (rendered.kept) outcome.kept = rendered.kept;
      return outcome;
    } catch (e) {
      if (!(e instanceof RenderError)) throw e;
      log.error(e.message, { root });
      const outcome: RootOutcome = { root, status: 'render-failed', edges: extraction.edges.length, message: e.message };
      if (request.keep && request.format !== 'dot') outcome.kept = keptPathFor(output);
      return outcome;
    }
  }

  /**
   * Decode and run one daemon record. Failures are logged, never thrown, so
   * a bad request cannot stop the daemon.
   */
  async dispatch(record: string): Promise<RequestOutcome | undefined> {
    let request: ExtractionRequest;
    try {
      request = decodeRequest(record);
    } catch (e) {
      this.log.error(describeError(e));
      return undefined;
    }
    const status = request.status ? createStatusLogger(resolve(request.cwd, request.status), this.log.level) : undefined;
    const log = status ?? this.log;
    try {
      return await this.handle(request, log);
    } catch (e) {
      log.error(describeError(e));
      return undefined;
    } finally {
      if (status) await closeLogger(status);
    }
  }

  /** Daemon loop: one request at a time until `signal` aborts. */
  async serve(channel: RequestChannel, policy: PollPolicy, signal?: AbortSignal): Promise<void> {
    let idle = 0;
    while (!signal?.aborted) {
      const wait = pollInterval(idle, policy);
      const record = await channel.receive(wait);
      if (record === undefined) {
        idle += wait;
        if (idle >= policy.maxIdleMs) {
          if (channel.reopen()) this.log.debug('Reopened request endpoint after idle period');
          idle = 0;
        }
        continue;
      }
      idle = 0;
      await this.dispatch(record);
    }
  }
}

/** Client mode: hand one request to a running daemon. */
export async function submitRequest(fifoPath: string, request: ExtractionRequest): Promise<void> {
  await submitRecord(fifoPath, encodeRequest(request));
}
