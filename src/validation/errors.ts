import type { AuthMode } from '../settings/schema.js';

export type TenantValidationErrorCode =
  | 'AUTHENTICATION_FAILED'
  | 'SECRET_RESOLUTION_FAILED'
  | 'SECRET_NOT_FOUND'
  | 'QUERY_TIMEOUT'
  | 'QUERY_FAILED'
  | 'INVALID_SETTINGS';

/** Base class for every failure raised by the tenant validation subsystem */
export class TenantValidationError extends Error {
  readonly code: TenantValidationErrorCode;

  constructor(code: TenantValidationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'TenantValidationError';
    this.code = code;
  }
}

export class AuthenticationError extends TenantValidationError {
  readonly mode: string;

  constructor(mode: AuthMode | string, message: string, options?: { cause?: unknown }) {
    super('AUTHENTICATION_FAILED', `${mode} authentication failed: ${message}`, options);
    this.name = 'AuthenticationError';
    this.mode = mode;
  }
}

export class SecretResolutionError extends TenantValidationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SECRET_RESOLUTION_FAILED', message, options);
    this.name = 'SecretResolutionError';
  }
}

export class SecretNotFoundError extends TenantValidationError {
  constructor(message = 'Client secret not found in secret store or configuration') {
    super('SECRET_NOT_FOUND', message);
    this.name = 'SecretNotFoundError';
  }
}

export class QueryTimeoutError extends TenantValidationError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('QUERY_TIMEOUT', `Resource Graph query timed out after ${timeoutMs}ms`);
    this.name = 'QueryTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class QueryExecutionError extends TenantValidationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('QUERY_FAILED', message, options);
    this.name = 'QueryExecutionError';
  }
}

export class SettingsValidationError extends TenantValidationError {
  readonly issues: Array<{ path: string; message: string }>;

  constructor(issues: Array<{ path: string; message: string }>) {
    super('INVALID_SETTINGS', `Invalid validation settings: ${issues.map((i) => i.message).join('; ')}`);
    this.name = 'SettingsValidationError';
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
