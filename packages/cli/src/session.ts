import { GraphAssembler } from './dot.js';
import { Attributes, EdgeRecord } from './types.js';

export type NodeRole = 'extern' | 'show' | 'end' | 'root';

// Later roles win when a node has several.
const ROLE_ORDER: readonly NodeRole[] = ['extern', 'show', 'end', 'root'];

export const ROLE_ATTRIBUTES: Readonly<Record<NodeRole, Attributes>> = {
  extern: { style: 'dotted' },
  show: { style: 'dashed', color: 'gray40' },
  end: { style: 'filled', fillcolor: 'salmon' },
  root: { style: 'filled', fillcolor: 'lightblue' },
};

/**
 * Mutable state of one extraction run. Nothing here outlives the run, so
 * rendering overrides cannot leak from one request into the next.
 */
export class ExtractionSession {
  private readonly visited = new Set<string>();
  private readonly members = new Set<string>();
  private readonly reach = new Map<string, boolean>();
  private readonly roles = new Map<string, Set<NodeRole>>();
  /** Members admitted by each record still in the assembler, same order. */
  private readonly admissions: string[][] = [];
  emitted = 0;
  retracted = 0;

  constructor(readonly assembler: GraphAssembler = new GraphAssembler()) {}

  /** False when the node was already visited. */
  visit(name: string): boolean {
    if (this.visited.has(name)) return false;
    this.visited.add(name);
    return true;
  }

  get visitedCount(): number { return this.visited.size; }

  admit(name: string): boolean {
    if (this.members.has(name)) return false;
    this.members.add(name);
    return true;
  }

  memberNames(): string[] { return [...this.members]; }

  setReached(name: string, reached: boolean): void {
    this.reach.set(name, reached);
  }

  /** Unresolved nodes (still being expanded) count as not reached. */
  reached(name: string): boolean {
    return this.reach.get(name) ?? false;
  }

  mark(name: string, role: NodeRole): void {
    const set = this.roles.get(name);
    if (set) set.add(role); else this.roles.set(name, new Set([role]));
  }

  attributesOf(name: string, base: Readonly<Attributes> = {}): Attributes {
    const attrs: Attributes = { ...base };
    const set = this.roles.get(name);
    if (!set) return attrs;
    for (const role of ROLE_ORDER) {
      if (set.has(role)) Object.assign(attrs, ROLE_ATTRIBUTES[role]);
    }
    return attrs;
  }

  emit(record: EdgeRecord): void {
    const admitted = [record.from, record.to].filter(n => this.admit(n));
    this.admissions.push(admitted);
    this.assembler.emit(record);
    this.emitted++;
  }

  /** Undo the most recent emission, members it admitted included. */
  retract(): EdgeRecord {
    const record = this.assembler.undoLast();
    for (const name of this.admissions.pop() ?? []) this.members.delete(name);
    this.retracted++;
    return record;
  }

  get edgeCount(): number { return this.assembler.size; }
}
