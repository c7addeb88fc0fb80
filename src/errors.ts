export type ErrorKind = 'network' | 'parse' | 'storage' | 'config';

export class ScraperError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScraperError';
    this.kind = kind;
  }
}

export class NetworkError extends ScraperError {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, url: string, status?: number, options?: { cause?: unknown }) {
    super('network', message, options);
    this.name = 'NetworkError';
    this.url = url;
    this.status = status;
  }
}

export class ParseError extends ScraperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('parse', message, options);
    this.name = 'ParseError';
  }
}

export class StorageError extends ScraperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('storage', message, options);
    this.name = 'StorageError';
  }
}

export class ConfigError extends ScraperError {
  constructor(message: string) {
    super('config', message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
