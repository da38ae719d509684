import { MemberStatement, siteLabel } from './dot.js';
import { EmptyResultError } from './errors.js';
import { FilterRegistry } from './filters.js';
import { CallGraph, sourceFileOf } from './graph.js';
import { ExtractionSession } from './session.js';
import { Direction, EdgeRecord, UNBOUNDED_DEPTH } from './types.js';

export interface ExtractOptions {
  direction: Direction;
  /** Hops from the root; `UNBOUNDED_DEPTH` disables the bound. */
  maxDepth: number;
  filters: FilterRegistry;
  /** Keep only edges on paths from the root to this function. */
  endFunction?: string;
  allLocations?: boolean;
}

export interface Extraction {
  root: string;
  edges: readonly EdgeRecord[];
  members: MemberStatement[];
  /** Files declaring a member, in order of first appearance. */
  sourceFiles: string[];
  stats: { visited: number; emitted: number; retracted: number };
}

// One node being expanded; `next` is the cursor into its relations.
interface Frame {
  node: string;
  depth: number;
  relations: string[];
  next: number;
  reached: boolean;
}

class Extractor {
  private readonly session = new ExtractionSession();
  private readonly pruning: boolean;

  constructor(private readonly graph: CallGraph, private readonly opts: ExtractOptions) {
    this.pruning = opts.endFunction !== undefined;
  }

  run(root: string): Extraction {
    const { session, opts } = this;
    if (opts.filters.excludes(root)) {
      throw new EmptyResultError(`Root '${root}' is excluded by the filters`, { root, verdict: opts.filters.verdict(root) });
    }
    session.admit(root);
    session.mark(root, 'root');
    if (root === opts.endFunction) session.mark(root, 'end');

    // Depth-first with an explicit stack; kernels have call chains deep
    // enough to exhaust the JS call stack.
    const stack: Frame[] = [];
    if (opts.filters.shows(root)) {
      session.mark(root, 'show');
    } else {
      const first = this.enter(root, 0);
      if (typeof first !== 'boolean') stack.push(first);
    }

    while (stack.length) {
      const frame = stack[stack.length - 1];
      if (frame.next >= frame.relations.length) {
        stack.pop();
        session.setReached(frame.node, frame.reached);
        if (stack.length) this.settle(stack[stack.length - 1], frame.reached);
        continue;
      }
      const target = frame.relations[frame.next++];
      if (opts.filters.excludes(target)) continue;
      this.emit(frame.node, target);
      if (opts.filters.shows(target)) {
        session.mark(target, 'show');
        this.settle(frame, target === opts.endFunction);
        continue;
      }
      const child = this.enter(target, frame.depth + 1);
      if (typeof child === 'boolean') this.settle(frame, child);
      else stack.push(child);
    }

    if (this.pruning && root !== opts.endFunction && session.edgeCount === 0) {
      throw new EmptyResultError(`No path from '${root}' to '${opts.endFunction}' survives the filters`, { root });
    }
    return this.result(root);
  }

  /**
   * Resolves to the node's reach flag when it is not expanded (visited,
   * end function, leaf or depth bound), or a frame to expand.
   */
  private enter(name: string, depth: number): Frame | boolean {
    const { session, opts } = this;
    if (!session.visit(name)) return session.reached(name);
    if (this.pruning && name === opts.endFunction) {
      session.setReached(name, true);
      return true;
    }
    const relations = this.graph.relations(name, opts.direction);
    if (!relations.length || (opts.maxDepth !== UNBOUNDED_DEPTH && depth >= opts.maxDepth)) {
      session.setReached(name, false);
      return false;
    }
    return { node: name, depth, relations, next: 0, reached: false };
  }

  // Edges are printed from the expanded node outward so the root anchors
  // the layout in both directions.
  private emit(from: string, to: string): void {
    const forward = this.opts.direction === 'forward';
    const caller = forward ? from : to;
    const callee = forward ? to : from;
    const record: EdgeRecord = { from, to, caller, callee };
    if (this.opts.allLocations) {
      const label = siteLabel(this.graph.sites(caller, callee));
      if (label !== undefined) record.label = label;
    }
    this.session.emit(record);
    if (this.graph.node(to)?.defined === false) this.session.mark(to, 'extern');
    if (to === this.opts.endFunction) this.session.mark(to, 'end');
  }

  /**
   * Called once the edge just emitted from `frame` is resolved. When pruning,
   * a branch that did not reach the end function is the most recent record
   * in the log: every record after it belonged to the branch and has
   * already been retracted.
   */
  private settle(frame: Frame, childReached: boolean): void {
    if (!this.pruning) return;
    if (childReached) frame.reached = true;
    else this.session.retract();
  }

  private result(root: string): Extraction {
    const { session, graph } = this;
    const names = session.memberNames();
    const files = new Set<string>();
    for (const n of names) {
      const file = sourceFileOf(graph.node(n)?.location);
      if (file) files.add(file);
    }
    return {
      root,
      edges: [...session.assembler.records],
      members: names.map(name => ({ name, attributes: session.attributesOf(name, graph.node(name)?.attributes) })),
      sourceFiles: [...files],
      stats: { visited: session.visitedCount, emitted: session.emitted, retracted: session.retracted },
    };
  }
}

/**
 * Filtered subgraph reachable from `root`. Each node is expanded at most
 * once; with an end function, only edges on root → end paths are kept.
 */
export function extractSubgraph(graph: CallGraph, root: string, opts: ExtractOptions): Extraction {
  return new Extractor(graph, opts).run(graph.resolve(root).name);
}
