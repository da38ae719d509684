/**
 * Error taxonomy shared by the store, extractor, renderer and server.
 * Every failure that leaves a module is one of these; foreign errors are
 * wrapped where they occur.
 */

export enum ErrorCode {
  CONFIG = 'CONFIG',
  INPUT = 'INPUT',
  NOT_FOUND = 'NOT_FOUND',
  EMPTY_RESULT = 'EMPTY_RESULT',
  RENDER = 'RENDER',
  RESOURCE = 'RESOURCE',
}

export type RunMode = 'direct' | 'daemon';

export class CgsieveError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown> | undefined;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CgsieveError';
    this.code = code;
    this.details = details;
  }
}

/** Invalid parameter or parameter combination. */
export class ConfigError extends CgsieveError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(ErrorCode.CONFIG, message, details, options);
    this.name = 'ConfigError';
  }
}

/** Graph source missing or unparseable. */
export class InputError extends CgsieveError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(ErrorCode.INPUT, message, details, options);
    this.name = 'InputError';
  }
}

export class NotFoundError extends CgsieveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.NOT_FOUND, message, details);
    this.name = 'NotFoundError';
  }
}

export class EmptyResultError extends CgsieveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.EMPTY_RESULT, message, details);
    this.name = 'EmptyResultError';
  }
}

export class RenderError extends CgsieveError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(ErrorCode.RENDER, message, details, options);
    this.name = 'RenderError';
  }
}

/** Temporary storage or channel I/O failure. */
export class ResourceError extends CgsieveError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(ErrorCode.RESOURCE, message, details, options);
    this.name = 'ResourceError';
  }
}

/**
 * Whether an error stops the process. Daemon mode never stops on a request
 * failure; empty results and render failures are reported, not fatal.
 */
export function isFatal(error: unknown, mode: RunMode): boolean {
  if (mode === 'daemon') return false;
  if (!(error instanceof CgsieveError)) return true;
  return error.code !== ErrorCode.EMPTY_RESULT && error.code !== ErrorCode.RENDER;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function describeError(error: unknown): string {
  if (error instanceof CgsieveError) return `${error.name}: ${error.message}`;
  return errorMessage(error);
}
