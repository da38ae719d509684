#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';
import { resolve } from 'node:path';
import { Args, buildRequest, failureExitCode, outcomeExitCode, parseArgs } from './args.js';
import { RequestChannel, ensureFifo, fifoEndpoint } from './channel.js';
import { Config, loadConfig } from './config.js';
import { ConfigError, RunMode, describeError } from './errors.js';
import { closeLogger, configureLogging, createComponentLogger, logger } from './logger.js';
import { RequestServer, submitRequest } from './server.js';
import { ExtractionRequest } from './types.js';

const log = createComponentLogger('cli');

async function runDaemon(argv: Args, config: Config, request: ExtractionRequest): Promise<number> {
  const fifo = resolve(argv.fifo);
  const server = new RequestServer({ dotCommand: config.dotCommand });
  if (request.input.length) await server.preload(request.input, request.cwd);
  await ensureFifo(fifo);

  const channel = new RequestChannel(fifoEndpoint(fifo), createComponentLogger('channel'));
  const controller = new AbortController();
  const stop = (signal: string) => {
    log.info(`${signal} received, stopping after the current request`);
    controller.abort();
    channel.close();
  };
  process.once('SIGINT', () => stop('SIGINT'));
  process.once('SIGTERM', () => stop('SIGTERM'));

  channel.start();
  log.info(`Listening on ${fifo}`);
  await server.serve(channel, config.poll, controller.signal);
  log.info('Daemon stopped');
  return 0;
}

async function runDirect(config: Config, request: ExtractionRequest): Promise<number> {
  if (!request.input.length) throw new ConfigError('No call graph given (use --input or set CGSIEVE_GRAPH)');
  const server = new RequestServer({ dotCommand: config.dotCommand });
  return outcomeExitCode(await server.handle(request));
}

async function main(): Promise<number> {
  let mode: RunMode = 'direct';
  try {
    const config = loadConfig();
    const argv = await parseArgs(hideBin(process.argv), config);
    if (argv.daemon) mode = 'daemon';
    configureLogging({
      level: argv.logLevel,
      quiet: argv.quiet,
      // A client's status file belongs to the daemon's handling of its request.
      statusFile: argv.client || argv.status === undefined ? undefined : resolve(argv.status),
    });
    const request = buildRequest(argv, config);

    if (argv.daemon) return await runDaemon(argv, config, request);
    if (argv.client) {
      await submitRequest(resolve(argv.fifo), request);
      log.info(`Request submitted to ${resolve(argv.fifo)}`);
      return 0;
    }
    return await runDirect(config, request);
  } catch (e) {
    logger.error(describeError(e));
    return failureExitCode(e, mode);
  }
}

main().then(
  async code => {
    await closeLogger(logger);
    // An open on the named pipe that never found a writer keeps the event loop alive.
    process.exit(code);
  },
  (err: unknown) => {
    console.error(err);
    process.exit(1);
  },
);
