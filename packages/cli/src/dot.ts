import { Attributes, DotHeader, EdgeRecord } from './types.js';

/**
 * Edge log for one extraction. Retraction always undoes the most recent
 * record, so the log is a stack rather than an append-only stream.
 */
export class GraphAssembler {
  private readonly log: EdgeRecord[] = [];

  emit(record: EdgeRecord): void {
    this.log.push(record);
  }

  undoLast(): EdgeRecord {
    const last = this.log.pop();
    if (!last) throw new Error('undoLast() on an empty edge log');
    return last;
  }

  get size(): number { return this.log.length; }

  get records(): readonly EdgeRecord[] { return this.log; }
}

export interface MemberStatement {
  name: string;
  attributes: Attributes;
}

function escape(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

export function quote(text: string): string {
  return `"${escape(text)}"`;
}

function attrList(attrs: Attributes): string {
  return Object.entries(attrs).map(([k, v]) => `${k}=${quote(v)}`).join(', ');
}

/** Call sites as a multi-line edge label. */
export function siteLabel(sites: readonly string[]): string | undefined {
  return sites.length ? sites.join('\n') : undefined;
}

function labelValue(label: string): string {
  return `"${label.split('\n').map(escape).join('\\n')}"`;
}

export function toDot(records: readonly EdgeRecord[], members: readonly MemberStatement[], header: DotHeader): string {
  const font = { fontname: header.font, fontsize: String(header.fontSize) };
  const graphAttrs: Attributes = { rankdir: header.rankdir, ...font };
  if (header.size) graphAttrs.size = header.size;
  const edgeAttrs: Attributes = { ...font };
  // Reverse graphs are laid out from the root but arrows keep the call direction.
  if (header.direction === 'reverse') edgeAttrs.dir = 'back';

  const out: string[] = ['digraph callgraph {'];
  out.push(`  graph [${attrList(graphAttrs)}];`);
  out.push(`  node [${attrList({ shape: 'box', ...font })}];`);
  out.push(`  edge [${attrList(edgeAttrs)}];`);
  for (const r of records) {
    const label = r.label !== undefined ? ` [label=${labelValue(r.label)}]` : '';
    out.push(`  ${quote(r.from)} -> ${quote(r.to)}${label};`);
  }
  for (const m of members) {
    const attrs = attrList(m.attributes);
    out.push(attrs ? `  ${quote(m.name)} [${attrs}];` : `  ${quote(m.name)};`);
  }
  out.push('}');
  return out.join('\n') + '\n';
}
