import { z } from 'zod';
import { ConfigError } from './errors.js';
import { ExtractionRequest, UNBOUNDED_DEPTH } from './types.js';

const name = z.string().min(1);

export const ExtractionRequestSchema = z.object({
  cwd: name,
  input: z.array(name),
  roots: z.array(name),
  rootPatterns: z.array(name),
  direction: z.enum(['forward', 'reverse']),
  maxDepth: z.number().int().min(UNBOUNDED_DEPTH),
  ignore: z.array(name),
  ignorePatterns: z.array(name),
  show: z.array(name),
  showPatterns: z.array(name),
  trim: z.boolean(),
  noExtern: z.boolean(),
  allLocations: z.boolean(),
  endFunction: name.optional(),
  output: name.optional(),
  format: z.enum(['dot', 'svg', 'html', 'json', 'xdot', 'png', 'pdf', 'ps']),
  font: name,
  fontSize: z.number().positive(),
  // Graphviz page size in inches, e.g. `8,11` or `7.5,10!`
  size: z.string().regex(/^\d+(\.\d+)?,\d+(\.\d+)?!?$/, 'expected <width>,<height>[!]').optional(),
  rankdir: z.enum(['LR', 'RL', 'TB', 'BT']),
  keep: z.boolean(),
  status: name.optional(),
});

export function parseRequest(raw: unknown): ExtractionRequest {
  const parsed = ExtractionRequestSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.join('.');
    throw new ConfigError(`Invalid request${where ? ` (${where})` : ''}: ${issue.message}`, { field: where });
  }
  return parsed.data;
}

export function requireRoots(request: ExtractionRequest): void {
  if (!request.roots.length && !request.rootPatterns.length) {
    throw new ConfigError('No root function given (use --root or --root-pattern)');
  }
}

// Daemon wire record: one line, fields in this order.
export const FIELD_SEPARATOR = '\x1f';
export const LIST_SEPARATOR = ';';
export const WIRE_VERSION = '1';

export const WIRE_FIELDS = [
  'version', 'cwd', 'input', 'root', 'rootPattern', 'direction', 'maxDepth',
  'ignore', 'ignorePattern', 'show', 'showPattern', 'trim', 'noExtern', 'allLocations',
  'end', 'output', 'format', 'font', 'fontSize', 'size', 'rankdir', 'keep', 'status',
] as const;

type WireField = typeof WIRE_FIELDS[number];

function list(field: WireField, items: string[]): string {
  for (const item of items) {
    if (item.includes(LIST_SEPARATOR)) {
      throw new ConfigError(`Cannot send '${item}' to the daemon: '${LIST_SEPARATOR}' separates ${field} entries`);
    }
  }
  return items.join(LIST_SEPARATOR);
}

const flag = (b: boolean): string => (b ? '1' : '0');

export function encodeRequest(req: ExtractionRequest): string {
  const values: Record<WireField, string> = {
    version: WIRE_VERSION,
    cwd: req.cwd,
    input: list('input', req.input),
    root: list('root', req.roots),
    rootPattern: list('rootPattern', req.rootPatterns),
    direction: req.direction,
    maxDepth: String(req.maxDepth),
    ignore: list('ignore', req.ignore),
    ignorePattern: list('ignorePattern', req.ignorePatterns),
    show: list('show', req.show),
    showPattern: list('showPattern', req.showPatterns),
    trim: flag(req.trim),
    noExtern: flag(req.noExtern),
    allLocations: flag(req.allLocations),
    end: req.endFunction ?? '',
    output: req.output ?? '',
    format: req.format,
    font: req.font,
    fontSize: String(req.fontSize),
    size: req.size ?? '',
    rankdir: req.rankdir,
    keep: flag(req.keep),
    status: req.status ?? '',
  };
  return WIRE_FIELDS.map(field => {
    const v = values[field];
    if (v.includes(FIELD_SEPARATOR) || /[\r\n]/.test(v)) {
      throw new ConfigError(`Field '${field}' contains a separator or newline and cannot be sent to the daemon`);
    }
    return v;
  }).join(FIELD_SEPARATOR);
}

function splitItems(value: string): string[] {
  return value ? value.split(LIST_SEPARATOR) : [];
}

function parseFlag(value: string): boolean | string {
  if (value === '1') return true;
  if (value === '0') return false;
  return value;
}

function optional(value: string): string | undefined {
  return value === '' ? undefined : value;
}

export function decodeRequest(record: string): ExtractionRequest {
  const parts = record.split(FIELD_SEPARATOR);
  if (parts.length !== WIRE_FIELDS.length) {
    throw new ConfigError(`Malformed request record: expected ${WIRE_FIELDS.length} fields, got ${parts.length}`);
  }
  const get = (field: WireField): string => parts[WIRE_FIELDS.indexOf(field)];
  if (get('version') !== WIRE_VERSION) {
    throw new ConfigError(`Unsupported request record version '${get('version')}'`);
  }
  return parseRequest({
    cwd: get('cwd'),
    input: splitItems(get('input')),
    roots: splitItems(get('root')),
    rootPatterns: splitItems(get('rootPattern')),
    direction: get('direction'),
    maxDepth: get('maxDepth') === '' ? Number.NaN : Number(get('maxDepth')),
    ignore: splitItems(get('ignore')),
    ignorePatterns: splitItems(get('ignorePattern')),
    show: splitItems(get('show')),
    showPatterns: splitItems(get('showPattern')),
    trim: parseFlag(get('trim')),
    noExtern: parseFlag(get('noExtern')),
    allLocations: parseFlag(get('allLocations')),
    endFunction: optional(get('end')),
    output: optional(get('output')),
    format: get('format'),
    font: get('font'),
    fontSize: get('fontSize') === '' ? Number.NaN : Number(get('fontSize')),
    size: optional(get('size')),
    rankdir: get('rankdir'),
    keep: parseFlag(get('keep')),
    status: optional(get('status')),
  });
}
