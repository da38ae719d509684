import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError, InputError, errorMessage } from './errors.js';
import type { CallGraph } from './graph.js';
import { CallNode } from './types.js';

export type Verdict = 'extern' | 'ignore' | 'ignore-pattern' | 'trim' | 'include';

export interface FilterOptions {
  ignore: string[];
  ignorePatterns: string[];
  show: string[];
  showPatterns: string[];
  trim: boolean;
  noExtern: boolean;
}

interface PrecedenceRule {
  verdict: Exclude<Verdict, 'include'>;
  applies(name: string): boolean;
}

const TrimSetSchema = z.object({ symbols: z.array(z.string().min(1)) });

const DEFAULT_TRIM_SET = new URL('../data/trim-set.json', import.meta.url);

let cachedTrimSet: ReadonlySet<string> | undefined;

/** The built-in catalog of noise symbols excluded by `--trim`. */
export function loadTrimSet(file: URL | string = DEFAULT_TRIM_SET): ReadonlySet<string> {
  const isDefault = file === DEFAULT_TRIM_SET;
  if (isDefault && cachedTrimSet) return cachedTrimSet;
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf8'));
  } catch (e) {
    throw new InputError(`Cannot load trim set: ${errorMessage(e)}`, { file: String(file) }, { cause: e });
  }
  const parsed = TrimSetSchema.safeParse(raw);
  if (!parsed.success) throw new InputError(`Malformed trim set ${String(file)}`);
  const set = new Set(parsed.data.symbols);
  if (isDefault) cachedTrimSet = set;
  return set;
}

export function compilePatterns(patterns: string[], option: string): RegExp[] {
  return patterns.map(p => {
    try {
      return new RegExp(p);
    } catch (e) {
      throw new ConfigError(`Invalid ${option} pattern '${p}': ${errorMessage(e)}`, { option, pattern: p });
    }
  });
}

/**
 * Per-request filters. Exclusion is decided by the first matching rule, in
 * this order: extern, ignore, ignore-pattern, trim. Show is independent and
 * only matters for nodes that are not excluded.
 */
export class FilterRegistry {
  private readonly ignore: ReadonlySet<string>;
  private readonly show: ReadonlySet<string>;
  private readonly ignorePatterns: RegExp[];
  private readonly showPatterns: RegExp[];
  /** Externs found during this run when extern exclusion is on. */
  private readonly dynamicIgnore = new Set<string>();
  private readonly verdicts = new Map<string, Verdict>();
  private readonly precedence: readonly PrecedenceRule[];

  constructor(
    opts: FilterOptions,
    lookup: (name: string) => CallNode | undefined,
    trimSet: ReadonlySet<string> = new Set(),
  ) {
    this.ignore = new Set(opts.ignore);
    this.show = new Set(opts.show);
    this.ignorePatterns = compilePatterns(opts.ignorePatterns, 'ignore');
    this.showPatterns = compilePatterns(opts.showPatterns, 'show');
    this.precedence = [
      { verdict: 'extern', applies: name => opts.noExtern && lookup(name)?.defined === false },
      { verdict: 'ignore', applies: name => this.ignore.has(name) || this.dynamicIgnore.has(name) },
      { verdict: 'ignore-pattern', applies: name => this.ignorePatterns.some(p => p.test(name)) },
      { verdict: 'trim', applies: name => opts.trim && trimSet.has(name) },
    ];
  }

  verdict(name: string): Verdict {
    const known = this.verdicts.get(name);
    if (known) return known;
    let verdict: Verdict = 'include';
    for (const rule of this.precedence) {
      if (!rule.applies(name)) continue;
      verdict = rule.verdict;
      break;
    }
    if (verdict === 'extern') this.dynamicIgnore.add(name);
    this.verdicts.set(name, verdict);
    return verdict;
  }

  excludes(name: string): boolean {
    return this.verdict(name) !== 'include';
  }

  /** Render but do not expand. Never true for an excluded node. */
  shows(name: string): boolean {
    if (this.excludes(name)) return false;
    return this.show.has(name) || this.showPatterns.some(p => p.test(name));
  }

  get ignoredExterns(): ReadonlySet<string> {
    return this.dynamicIgnore;
  }
}

/**
 * Builds the filters for one request against `graph`. The trim catalog is
 * only consulted, and the built-in one only loaded, when `opts.trim` is set.
 */
export function compileFilters(opts: FilterOptions, graph: CallGraph, trimSet?: ReadonlySet<string>): FilterRegistry {
  return new FilterRegistry(opts, name => graph.node(name), opts.trim ? (trimSet ?? loadTrimSet()) : undefined);
}
