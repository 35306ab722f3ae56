import { describe, it, expect } from 'vitest';
import { AppError, ConfigurationError, errorMessage, LockError, normalizeError, UnauthorizedError } from './errors.js';

describe('errors', () => {
  it('tags each error with its code', () => {
    expect(new ConfigurationError('MQTT_HOST is required').code).toBe('CONFIGURATION_ERROR');
    expect(new UnauthorizedError('Inhibit: Access denied').code).toBe('UNAUTHORIZED');
    expect(new LockError('host_unavailable', 'bus gone').details).toBe('host_unavailable');
  });

  it('normalizes unknown failures', () => {
    const known = new ConfigurationError('bad port');
    expect(normalizeError(known)).toBe(known);

    const wrapped = normalizeError(new Error('socket closed'));
    expect(wrapped).toBeInstanceOf(AppError);
    expect(wrapped.message).toBe('socket closed');
    expect(wrapped.code).toBe('INTERNAL_ERROR');

    expect(normalizeError(42).code).toBe('UNKNOWN_ERROR');
  });

  it('extracts a message from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(undefined)).toBe('Unknown error');
  });
});
