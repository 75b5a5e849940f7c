// src/errors.ts

export type ErrorCode =
  | 'CONFIG_ERROR'
  | 'SOURCE_MISSING'
  | 'SOURCE_PARSE'
  | 'STORE_WRITE'
  | 'DB_ERROR'
  | 'NOT_FOUND';

export class ZoneMonitorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends ZoneMonitorError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
  }
}

export class SourceFileMissingError extends ZoneMonitorError {
  constructor(readonly path: string) {
    super('SOURCE_MISSING', `CSV file not found at ${path}`);
  }
}

/** Malformed source: bad header, broken row or unparseable timestamp. `row` is 1-based, header excluded. */
export class SourceParseError extends ZoneMonitorError {
  constructor(message: string, readonly row?: number) {
    super('SOURCE_PARSE', row === undefined ? message : `row ${row}: ${message}`);
  }
}

export class StoreWriteError extends ZoneMonitorError {
  constructor(message: string, cause?: unknown) {
    super('STORE_WRITE', message, { cause });
  }
}

export class StoreReadError extends ZoneMonitorError {
  constructor(message: string, cause?: unknown) {
    super('DB_ERROR', message, { cause });
  }
}

export class NotFoundError extends ZoneMonitorError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export class UnknownVariableError extends NotFoundError {
  constructor(readonly variable: string) {
    super(`unknown outdoor variable: ${variable}`);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
