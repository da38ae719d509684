import winston from 'winston';

export type Logger = winston.Logger;

const ALL_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

// Metadata keys that only add noise on a terminal.
const HIDDEN_META = new Set(['component', 'service']);

function compactMeta(meta: Record<string, unknown>): string {
  const keys = Object.keys(meta).filter(k => !HIDDEN_META.has(k));
  if (!keys.length) return '';
  const data: Record<string, unknown> = {};
  for (const k of keys) data[k] = meta[k];
  const text = JSON.stringify(data);
  return text.length < 300 ? ` ${text}` : '';
}

const consoleFormat = winston.format.combine(
  winston.format.errors({ stack: false }),
  winston.format.printf(({ level, message, component, ...meta }) => {
    const where = typeof component === 'string' ? `[cgsieve:${component}]` : '[cgsieve]';
    return `${where} ${level}: ${String(message)}${compactMeta(meta)}`;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
    const where = typeof component === 'string' ? ` (${component})` : '';
    return `${String(timestamp)} [${level}]${where}: ${String(message)}${compactMeta(meta)}`;
  })
);

function consoleTransport() {
  return new winston.transports.Console({ format: consoleFormat, stderrLevels: ALL_LEVELS });
}

function fileTransport(filename: string) {
  return new winston.transports.File({ filename, format: fileFormat });
}

export const logger = winston.createLogger({
  level: 'info',
  transports: [consoleTransport()],
});

export interface LoggingOptions {
  level?: string;
  quiet?: boolean;
  /** Send diagnostics to this file instead of stderr. */
  statusFile?: string;
}

export function configureLogging(opts: LoggingOptions): void {
  logger.level = opts.quiet ? 'error' : (opts.level ?? 'info');
  logger.clear();
  logger.add(opts.statusFile ? fileTransport(opts.statusFile) : consoleTransport());
}

export const createComponentLogger = (component: string): Logger => logger.child({ component });

/** Logger for one daemon request whose status channel was redirected. */
export function createStatusLogger(filename: string, level: string): Logger {
  return winston.createLogger({ level, transports: [fileTransport(filename)] });
}

export function closeLogger(target: Logger): Promise<void> {
  return new Promise(resolve => {
    target.on('finish', () => resolve());
    target.end();
  });
}
