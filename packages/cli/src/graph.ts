import graphlib from 'graphlib';
import type { Graph } from 'graphlib';
import fg from 'fast-glob';
import { readFile, stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError, InputError, NotFoundError, errorMessage } from './errors.js';
import { Attributes, CallNode, Direction } from './types.js';

// Collector output, one or more files per graph.
const SourceNodeSchema = z.object({
  name: z.string().min(1),
  location: z.string().min(1).optional(),
  defined: z.boolean().optional(),
  calls: z.array(z.string().min(1)).default([]),
  /** `target~location` call-site tags. */
  sites: z.array(z.string()).default([]),
  // Keys are written unquoted into DOT attribute lists.
  attributes: z.record(z.string().regex(/^[A-Za-z_]\w*$/, 'attribute names must be DOT identifiers'), z.string()).default({}),
});

const GraphSourceSchema = z.object({ nodes: z.array(SourceNodeSchema) });

const QUALIFIER = '@';

function isCallNode(value: unknown): value is CallNode {
  return typeof value === 'object' && value !== null && 'name' in value && 'defined' in value;
}

function isSiteList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

/** `file:line` → `file`; addresses and bare names have no file. */
export function sourceFileOf(location: string | undefined): string | undefined {
  if (!location) return undefined;
  const m = /^(.+?):\d+(?::\d+)?$/.exec(location);
  return m ? m[1] : undefined;
}

/**
 * The resident call graph. Topology and node data are fixed once built;
 * extraction keeps its own attribute overlay.
 */
export class CallGraph {
  private readonly byBaseName = new Map<string, string[]>();

  constructor(private readonly graph: Graph, readonly sources: readonly string[]) {
    for (const name of graph.nodes()) {
      const at = name.indexOf(QUALIFIER);
      if (at <= 0) continue;
      const base = name.slice(0, at);
      const list = this.byBaseName.get(base);
      if (list) list.push(name); else this.byBaseName.set(base, [name]);
    }
  }

  get size(): number { return this.graph.nodeCount(); }

  get edgeCount(): number { return this.graph.edgeCount(); }

  names(): string[] { return this.graph.nodes(); }

  node(name: string): CallNode | undefined {
    const label: unknown = this.graph.node(name);
    return isCallNode(label) ? label : undefined;
  }

  /**
   * Exact lookup, falling back to a unique `name@qualifier` match.
   */
  resolve(name: string): CallNode {
    const exact = this.node(name);
    if (exact) return exact;
    const candidates = this.byBaseName.get(name) ?? [];
    if (candidates.length === 1) {
      const only = this.node(candidates[0]);
      if (only) return only;
    }
    if (candidates.length > 1) {
      throw new NotFoundError(`Function '${name}' is ambiguous`, { candidates });
    }
    throw new NotFoundError(`Function '${name}' not found in call graph`);
  }

  match(pattern: RegExp): string[] {
    return this.graph.nodes().filter(n => pattern.test(n));
  }

  /** Callees (forward) or callers (reverse), in input order. */
  relations(name: string, direction: Direction): string[] {
    const list = direction === 'forward' ? this.graph.successors(name) : this.graph.predecessors(name);
    return Array.isArray(list) ? list : [];
  }

  sites(caller: string, callee: string): readonly string[] {
    const label: unknown = this.graph.edge(caller, callee);
    return isSiteList(label) ? label : [];
  }
}

interface NodeDraft {
  name: string;
  location?: string;
  defined: boolean;
  attributes: Attributes;
  calls: Set<string>;
  sites: Map<string, string[]>;
}

function parseSite(tag: string, origin: string, node: string): [string, string] {
  const cut = tag.lastIndexOf('~');
  if (cut <= 0 || cut === tag.length - 1) {
    throw new InputError(`Malformed call-site tag '${tag}' on '${node}'`, { source: origin });
  }
  return [tag.slice(0, cut), tag.slice(cut + 1)];
}

/**
 * Merge validated sources into one graph. A function declared in several
 * sources keeps the first location; its calls and sites are unioned.
 */
export function buildCallGraph(sources: readonly unknown[], origins: readonly string[] = []): CallGraph {
  const drafts = new Map<string, NodeDraft>();
  sources.forEach((raw, i) => {
    const origin = origins[i] ?? `<source ${i}>`;
    const parsed = GraphSourceSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InputError(`Invalid graph source ${origin}: ${issue.path.join('.') || '<root>'}: ${issue.message}`, { source: origin });
    }
    for (const n of parsed.data.nodes) {
      let draft = drafts.get(n.name);
      if (!draft) {
        draft = { name: n.name, defined: false, attributes: {}, calls: new Set(), sites: new Map() };
        drafts.set(n.name, draft);
      }
      draft.location ??= n.location;
      draft.defined ||= n.defined ?? n.location !== undefined;
      Object.assign(draft.attributes, n.attributes);
      for (const c of n.calls) draft.calls.add(c);
      for (const tag of n.sites) {
        const [target, location] = parseSite(tag, origin, n.name);
        draft.calls.add(target);
        const list = draft.sites.get(target);
        if (!list) draft.sites.set(target, [location]);
        else if (!list.includes(location)) list.push(location);
      }
    }
  });

  const g = new graphlib.Graph({ directed: true });
  for (const d of drafts.values()) {
    const node: CallNode = { name: d.name, defined: d.defined, attributes: d.attributes };
    if (d.location !== undefined) node.location = d.location;
    g.setNode(d.name, node);
  }
  for (const d of drafts.values()) {
    for (const callee of d.calls) {
      if (!g.hasNode(callee)) {
        const extern: CallNode = { name: callee, defined: false, attributes: {} };
        g.setNode(callee, extern);
      }
      g.setEdge(d.name, callee, d.sites.get(callee) ?? []);
    }
  }
  return new CallGraph(g, origins);
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (e) {
    throw new InputError(`Graph source not found: ${path}`, { source: path }, { cause: e });
  }
}

async function expandSource(path: string): Promise<string[]> {
  if (!await isDirectory(path)) return [path];
  const files = await fg('**/*.json', { cwd: path, absolute: true, onlyFiles: true });
  if (!files.length) throw new InputError(`No graph files (*.json) under ${path}`, { source: path });
  return files.sort();
}

async function readSource(file: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (e) {
    throw new InputError(`Cannot read graph source ${file}: ${errorMessage(e)}`, { source: file }, { cause: e });
  }
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new InputError(`Graph source ${file} is not valid JSON: ${errorMessage(e)}`, { source: file }, { cause: e });
  }
}

/** Load and merge every graph source (files, or directories of `*.json`). */
export async function loadCallGraph(sources: string[], cwd: string = process.cwd()): Promise<CallGraph> {
  if (!sources.length) throw new ConfigError('No graph source given (use --input or CGSIEVE_GRAPH)');
  const files: string[] = [];
  for (const s of sources) files.push(...await expandSource(resolve(cwd, s)));
  const raw: unknown[] = [];
  for (const f of files) raw.push(await readSource(f));
  return buildCallGraph(raw, files);
}
