export type MemoryErrorCode =
  | 'STORAGE_UNAVAILABLE'
  | 'VALIDATION_FAILURE'
  | 'CONSOLIDATION_ABORTED'
  | 'WATERMARK_MOVED';

export class MemoryError extends Error {
  readonly code: MemoryErrorCode;

  constructor(code: MemoryErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MemoryError';
    this.code = code;
  }
}

// The storage medium cannot be reached. Writes are not retried by the store.
export class StorageUnavailableError extends MemoryError {
  readonly operation: string;

  constructor(operation: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super('STORAGE_UNAVAILABLE', `Storage unavailable during ${operation}${detail}`, { cause });
    this.name = 'StorageUnavailableError';
    this.operation = operation;
  }
}

export class ValidationError extends MemoryError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('VALIDATION_FAILURE', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class ConsolidationAbortedError extends MemoryError {
  readonly reason: string;

  constructor(reason: string, cause?: unknown) {
    super('CONSOLIDATION_ABORTED', `Consolidation aborted: ${reason}`, { cause });
    this.name = 'ConsolidationAbortedError';
    this.reason = reason;
  }
}

// Another writer committed a batch between planning and commit.
export class WatermarkMovedError extends MemoryError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super('WATERMARK_MOVED', `Watermark moved from ${expected} to ${actual} since the batch was planned`);
    this.name = 'WatermarkMovedError';
    this.expected = expected;
    this.actual = actual;
  }
}

const UNAVAILABLE_SQLITE_CODES = [
  'SQLITE_CANTOPEN',
  'SQLITE_IOERR',
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
  'SQLITE_FULL',
  'SQLITE_READONLY',
  'SQLITE_NOTADB',
  'SQLITE_CORRUPT',
];

export function isStorageFault(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error instanceof MemoryError) return false;

  const code = 'code' in error ? error.code : undefined;
  if (typeof code === 'string') {
    return UNAVAILABLE_SQLITE_CODES.some((prefix) => code.startsWith(prefix));
  }

  return /database connection is not open/i.test(error.message);
}
