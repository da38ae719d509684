export type Direction = 'forward' | 'reverse';

export type RankDir = 'LR' | 'RL' | 'TB' | 'BT';

export type OutputFormat = 'dot' | 'svg' | 'html' | 'json' | 'xdot' | 'png' | 'pdf' | 'ps';

/** `maxDepth` value that disables the depth bound. */
export const UNBOUNDED_DEPTH = -1;

export type Attributes = Record<string, string>;

export interface CallNode {
  name: string;
  /** `file:line` or an address, when the collector knows it. */
  location?: string;
  /** False for externs: functions without a known definition. */
  defined: boolean;
  /** Collector-provided rendering attributes; never mutated. */
  attributes: Readonly<Attributes>;
}

/**
 * One emitted edge. `from`/`to` are printed as is (traversal order, so the
 * root anchors the flow); `caller`/`callee` keep the call direction.
 */
export interface EdgeRecord {
  from: string;
  to: string;
  caller: string;
  callee: string;
  label?: string;
}

export interface ExtractionRequest {
  /** Directory relative paths of the request are resolved against. */
  cwd: string;
  input: string[];
  roots: string[];
  rootPatterns: string[];
  direction: Direction;
  maxDepth: number;
  ignore: string[];
  ignorePatterns: string[];
  show: string[];
  showPatterns: string[];
  trim: boolean;
  noExtern: boolean;
  allLocations: boolean;
  endFunction?: string;
  output?: string;
  format: OutputFormat;
  font: string;
  fontSize: number;
  size?: string;
  rankdir: RankDir;
  keep: boolean;
  status?: string;
}

export interface DotHeader {
  rankdir: RankDir;
  font: string;
  fontSize: number;
  size?: string;
  direction: Direction;
}
