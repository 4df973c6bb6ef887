/**
 * @fileoverview report-sentinel error hierarchy
 *
 * Operational failures (bad input, storage, alert callbacks, configuration) are typed.
 * A tampered record is NOT an error: hash verification returns a value.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class SentinelError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// MALFORMED REPORT
// ============================================================================

export class MalformedReportError extends SentinelError {
  readonly code = 'MALFORMED_REPORT';
  readonly retryable = false;

  constructor(readonly issues: string[]) {
    super(`Malformed test-run report: ${issues.length > 0 ? issues.join('; ') : 'unknown issue'}`);
    this.name = 'MalformedReportError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        issues: this.issues,
      },
    };
  }
}

// ============================================================================
// STORAGE ERRORS
// ============================================================================

export type StorageOperation = 'read' | 'write' | 'lock' | 'append';

export class StorageError extends SentinelError {
  readonly code = 'STORAGE_ERROR';

  constructor(
    readonly operation: StorageOperation,
    readonly path: string,
    message: string,
    readonly cause?: Error,
    readonly retryable: boolean = true,
  ) {
    super(`Storage ${operation} failed for ${path}: ${message}`);
    this.name = 'StorageError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        path: this.path,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// CALLBACK ERRORS
// ============================================================================

export class CallbackError extends SentinelError {
  readonly code = 'CALLBACK_ERROR';
  readonly retryable = false;

  constructor(
    readonly callbackName: string,
    readonly project: string,
    readonly cause: Error,
  ) {
    super(`Alert callback ${callbackName} failed for ${project}: ${cause.message}`);
    this.name = 'CallbackError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        callbackName: this.callbackName,
        project: this.project,
        cause: this.cause.message,
      },
    };
  }
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export class ValidationError extends SentinelError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends SentinelError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configKey: this.configKey,
      },
    };
  }
}

// ============================================================================
// HELPERS
// ============================================================================

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function getErrorMessage(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}
