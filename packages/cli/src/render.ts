import { instance as vizInstance } from '@viz-js/viz';
import he from 'he';
import { execFile } from 'node:child_process';
import { mkdir, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import { promisify } from 'node:util';
import { RenderError, ResourceError, errorMessage } from './errors.js';
import { OutputFormat } from './types.js';

const execFileAsync = promisify(execFile);

export interface RenderTarget {
  format: OutputFormat;
  output: string;
  /** Scratch directory owned by the caller; removed after the request. */
  workDir: string;
  /** Also leave the DOT description beside the output. */
  keep: boolean;
  title?: string;
  /** Graphviz binary used for raster and print formats. */
  dotCommand?: string;
}

export interface RenderResult {
  output: string;
  kept?: string;
}

export type LayoutInvoker = (dot: string, target: RenderTarget) => Promise<RenderResult>;

export const FORMAT_EXTENSIONS: Readonly<Record<OutputFormat, string>> = {
  dot: '.dot', svg: '.svg', html: '.html', json: '.json', xdot: '.xdot', png: '.png', pdf: '.pdf', ps: '.ps',
};

let viz: ReturnType<typeof vizInstance> | undefined;

/** Graphviz compiled to WebAssembly; loaded once per process. */
async function renderWithViz(dot: string, format: 'svg' | 'json' | 'xdot'): Promise<string> {
  viz ??= vizInstance();
  try {
    const engine = await viz;
    return engine.renderString(dot, { format, engine: 'dot' });
  } catch (e) {
    throw new RenderError(`Graphviz failed: ${errorMessage(e)}`, { format }, { cause: e });
  }
}

async function runDot(command: string, input: string, format: OutputFormat, output: string): Promise<void> {
  try {
    await execFileAsync(command, [`-T${format}`, '-o', output, input]);
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      throw new RenderError(`Layout engine '${command}' not found on PATH`, { format }, { cause: e });
    }
    const stderr = e instanceof Error && 'stderr' in e && typeof e.stderr === 'string' ? e.stderr.trim() : '';
    throw new RenderError(`'${command}' failed: ${stderr || errorMessage(e)}`, { format }, { cause: e });
  }
}

export function svgToHtml(svg: string, title: string): string {
  const body = svg.replace(/<\?xml[^>]*>/i, '').replace(/<!DOCTYPE[^>]*>/i, '').trim();
  return `<!doctype html>
<meta charset="utf-8">
<title>${he.encode(title)}</title>
<style>body{font-family:system-ui,Segoe UI,Roboto,Arial;margin:16px}svg{width:100%;height:auto}</style>
<h1>${he.encode(title)}</h1>
<div>${body}</div>
`;
}

export function keptPathFor(output: string): string {
  const ext = extname(output);
  return join(dirname(output), `${basename(output, ext)}.dot`);
}

async function ensureDir(dir: string): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
  } catch (e) {
    throw new ResourceError(`Cannot create ${dir}: ${errorMessage(e)}`, { path: dir }, { cause: e });
  }
}

async function write(path: string, content: string): Promise<void> {
  await ensureDir(dirname(path));
  try {
    await writeFile(path, content, 'utf8');
  } catch (e) {
    throw new ResourceError(`Cannot write ${path}: ${errorMessage(e)}`, { path }, { cause: e });
  }
}

/**
 * Lay out and write one graph description. The kept description is written
 * before rendering so it survives a render failure.
 */
export const renderGraph: LayoutInvoker = async (dot, target) => {
  const { format, output } = target;
  const result: RenderResult = { output };
  if (target.keep && format !== 'dot') {
    result.kept = keptPathFor(output);
    await write(result.kept, dot);
  }
  switch (format) {
    case 'dot':
      await write(output, dot);
      break;
    case 'svg':
    case 'json':
    case 'xdot':
      await write(output, await renderWithViz(dot, format));
      break;
    case 'html':
      await write(output, svgToHtml(await renderWithViz(dot, 'svg'), target.title ?? basename(output)));
      break;
    case 'png':
    case 'pdf':
    case 'ps': {
      const input = join(target.workDir, `${basename(output, extname(output))}.dot`);
      await write(input, dot);
      await ensureDir(dirname(output));
      await runDot(target.dotCommand ?? 'dot', input, format, output);
      break;
    }
  }
  return result;
};
