import yargs from 'yargs';
import { resolve } from 'node:path';
import { Config, splitList } from './config.js';
import { RunMode, isFatal } from './errors.js';
import { parseRequest } from './request.js';
import { RequestOutcome } from './server.js';
import { ExtractionRequest, UNBOUNDED_DEPTH } from './types.js';

export function parseArgs(argv: string[], config: Config) {
  return yargs(argv)
    .scriptName('cgsieve')
    .usage('$0 -i <graph.json> -r <function> [options]')
    .option('input', { alias: 'i', type: 'string', array: true, describe: 'Call graph JSON file or directory (repeatable; default $CGSIEVE_GRAPH)' })
    .option('root', { alias: 'r', type: 'string', array: true, describe: 'Root function(s), ";" separated' })
    .option('root-pattern', { type: 'string', array: true, describe: 'Regular expression selecting root functions' })
    .option('direction', { alias: 'd', choices: ['forward', 'reverse'] as const, default: 'forward' as const, describe: 'forward walks callees, reverse walks callers' })
    .option('max-depth', { type: 'number', default: UNBOUNDED_DEPTH, describe: 'Hops from the root; -1 = unbounded' })
    .option('ignore', { type: 'string', array: true, describe: 'Functions excluded with their subtrees, ";" separated' })
    .option('ignore-pattern', { type: 'string', array: true, describe: 'Regular expression of excluded functions' })
    .option('show', { type: 'string', array: true, describe: 'Functions drawn but not expanded, ";" separated' })
    .option('show-pattern', { type: 'string', array: true, describe: 'Regular expression of functions drawn but not expanded' })
    .option('trim', { type: 'boolean', default: false, describe: 'Exclude the built-in list of locking, memory and logging helpers' })
    .option('extern', { type: 'boolean', default: true, describe: 'Include functions without a definition (--no-extern to drop them)' })
    .option('end', { alias: 'e', type: 'string', describe: 'Keep only paths from the root to this function' })
    .option('all-locations', { alias: 'L', type: 'boolean', default: false, describe: 'Label edges with every call site' })
    .option('output', { alias: 'o', type: 'string', describe: 'Output file (default <root>.<format>)' })
    .option('format', { alias: 'f', choices: ['dot', 'svg', 'html', 'json', 'xdot', 'png', 'pdf', 'ps'] as const, default: 'svg' as const })
    .option('font', { type: 'string', default: config.font })
    .option('font-size', { type: 'number', default: config.fontSize })
    .option('size', { type: 'string', describe: 'Graphviz page size, e.g. 8,11 or 7.5,10!' })
    .option('rankdir', { choices: ['LR', 'RL', 'TB', 'BT'] as const, default: 'LR' as const, describe: 'Graph layout direction' })
    .option('keep', { alias: 'k', type: 'boolean', default: false, describe: 'Also write the DOT description beside the output' })
    .option('daemon', { type: 'boolean', describe: 'Keep the graph loaded and serve requests from the named pipe' })
    .option('client', { type: 'boolean', describe: 'Send this request to a running daemon' })
    .option('fifo', { type: 'string', default: config.fifoPath, describe: 'Named pipe shared by daemon and clients' })
    .option('status', { type: 'string', describe: 'Write diagnostics to this file' })
    .option('quiet', { alias: 'q', type: 'boolean', default: false, describe: 'Only log errors' })
    .option('log-level', { type: 'string', default: config.logLevel, choices: ['error', 'warn', 'info', 'verbose', 'debug'] })
    .conflicts('daemon', 'client')
    .strict()
    .help()
    .parseAsync();
}

export type Args = Awaited<ReturnType<typeof parseArgs>>;

const items = (values: string[] | undefined): string[] => (values ?? []).flatMap(v => splitList(v));

/** Turns parsed options into a validated request; `--input` falls back to `CGSIEVE_GRAPH`. */
export function buildRequest(argv: Args, config: Config, cwd: string = process.cwd()): ExtractionRequest {
  const input = items(argv.input);
  return parseRequest({
    cwd,
    input: input.length ? input : config.graphSources,
    roots: items(argv.root),
    rootPatterns: argv.rootPattern ?? [],
    direction: argv.direction,
    maxDepth: argv.maxDepth,
    ignore: items(argv.ignore),
    ignorePatterns: argv.ignorePattern ?? [],
    show: items(argv.show),
    showPatterns: argv.showPattern ?? [],
    trim: argv.trim,
    noExtern: !argv.extern,
    allLocations: argv.allLocations,
    endFunction: argv.end,
    output: argv.output,
    format: argv.format,
    font: argv.font,
    fontSize: argv.fontSize,
    size: argv.size,
    rankdir: argv.rankdir,
    keep: argv.keep,
    status: argv.status === undefined ? undefined : resolve(cwd, argv.status),
  });
}

/** Direct mode fails when any root could not be rendered. */
export function outcomeExitCode(outcome: RequestOutcome): number {
  return outcome.roots.some(r => r.status === 'render-failed') ? 1 : 0;
}

/** A daemon that cannot start always fails; direct mode only on fatal errors. */
export function failureExitCode(error: unknown, mode: RunMode): number {
  return mode === 'daemon' || isFatal(error, 'direct') ? 1 : 0;
}
