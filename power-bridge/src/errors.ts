export class AppError extends Error {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, options?: { code?: string; details?: unknown }) {
    super(message);
    this.name = 'AppError';
    this.code = options?.code ?? 'INTERNAL_ERROR';
    this.details = options?.details;
  }
}

/** Invalid or contradictory settings. Fatal: startup stops before any connection is made. */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, { code: 'CONFIGURATION_ERROR' });
    this.name = 'ConfigurationError';
  }
}

/** A host call over the system bus failed. `dbusName` carries the D-Bus error name when there is one. */
export class HostError extends AppError {
  public readonly dbusName?: string;

  constructor(message: string, options?: { dbusName?: string; code?: string }) {
    super(message, { code: options?.code ?? 'HOST_ERROR', details: options?.dbusName });
    this.name = 'HostError';
    this.dbusName = options?.dbusName;
  }
}

/** The caller lacks the polkit authorization for a host call. */
export class UnauthorizedError extends HostError {
  constructor(message: string, dbusName?: string) {
    super(message, { dbusName, code: 'UNAUTHORIZED' });
    this.name = 'UnauthorizedError';
  }
}

export type LockErrorKind = 'denied_by_policy' | 'host_unavailable';

export class LockError extends AppError {
  public readonly kind: LockErrorKind;

  constructor(kind: LockErrorKind, message: string) {
    super(message, { code: 'LOCK_ERROR', details: kind });
    this.name = 'LockError';
    this.kind = kind;
  }
}

export class ActionError extends AppError {
  public readonly action: string;

  constructor(action: string, message: string) {
    super(message, { code: 'ACTION_ERROR', details: action });
    this.name = 'ActionError';
    this.action = action;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : 'Unknown error';
}

export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof Error) {
    return new AppError(error.message, { code: 'INTERNAL_ERROR' });
  }
  return new AppError('Unknown error', { code: 'UNKNOWN_ERROR', details: error });
}
