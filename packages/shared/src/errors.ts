/**
 * Error taxonomy for the tap.
 *
 * Stream-level errors (everything except StateCorruptionError, CatalogError and
 * ConfigError) are caught by the orchestrator and recorded against the failing
 * stream; the fatal ones abort the run before any stream executes.
 */

export type TapErrorCode =
  | 'UNKNOWN_STREAM'
  | 'SOURCE_REQUEST'
  | 'SOURCE_UNAVAILABLE'
  | 'MALFORMED_RECORD'
  | 'STATE_CORRUPTION'
  | 'CATALOG'
  | 'CONFIG'
  | 'HTTP_STATUS';

export class TapError extends Error {
  public readonly code: TapErrorCode;
  public readonly context: Record<string, unknown>;

  constructor(message: string, code: TapErrorCode, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TapError';
    this.code = code;
    this.context = context;
  }

  /** Fatal errors abort the whole run; all others are scoped to one stream */
  get fatal(): boolean {
    return false;
  }
}

export class UnknownStreamError extends TapError {
  public readonly streamName: string;

  constructor(streamName: string, available: string[] = []) {
    const suffix = available.length > 0 ? `. Available streams: ${available.join(', ')}` : '';
    super(`Unknown stream: '${streamName}'${suffix}`, 'UNKNOWN_STREAM', { stream: streamName });
    this.name = 'UnknownStreamError';
    this.streamName = streamName;
  }
}

/** Non-retryable API error (4xx other than 429) */
export class SourceRequestError extends TapError {
  public readonly path: string;
  public readonly status: number | undefined;

  constructor(message: string, path: string, status?: number) {
    super(message, 'SOURCE_REQUEST', { path, status });
    this.name = 'SourceRequestError';
    this.path = path;
    this.status = status;
  }
}

/** Transient failures persisted past the retry budget */
export class SourceUnavailableError extends TapError {
  public readonly path: string;
  public readonly attempts: number;

  constructor(path: string, attempts: number, cause?: Error) {
    const reason = cause ? `: ${cause.message}` : '';
    super(`Source unavailable after ${attempts} attempts on ${path}${reason}`, 'SOURCE_UNAVAILABLE', { path, attempts }, { cause });
    this.name = 'SourceUnavailableError';
    this.path = path;
    this.attempts = attempts;
  }
}

export class MalformedRecordError extends TapError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'MALFORMED_RECORD', context);
    this.name = 'MalformedRecordError';
  }
}

export class StateCorruptionError extends TapError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'STATE_CORRUPTION', context);
    this.name = 'StateCorruptionError';
  }

  override get fatal(): boolean {
    return true;
  }
}

export class CatalogError extends TapError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CATALOG', context);
    this.name = 'CatalogError';
  }

  override get fatal(): boolean {
    return true;
  }
}

export class ConfigError extends TapError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG', context);
    this.name = 'ConfigError';
  }

  override get fatal(): boolean {
    return true;
  }
}

/**
 * Retryable HTTP status (429 or 5xx). Only ever surfaces wrapped in a
 * SourceUnavailableError once retries run out.
 */
export class HttpStatusError extends TapError {
  public readonly status: number;
  public readonly path: string;

  constructor(path: string, status: number, statusText: string) {
    super(`HTTP ${status} ${statusText} on ${path}`, 'HTTP_STATUS', { path, status });
    this.name = 'HttpStatusError';
    this.status = status;
    this.path = path;
  }
}

export function isFatalError(error: unknown): boolean {
  return error instanceof TapError && error.fatal;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
