/**
 * Tests for error classes and codes.
 */
import { describe, it, expect } from 'vitest';
import {
  LicError,
  ConfigError,
  RegistryError,
  WriteError,
  InteractionCancelledError,
  ErrorCodes,
} from '../../../src/utils/errors.js';

describe('LicError', () => {
  it('should create error with code and message', () => {
    const error = new LicError('SOME_CODE', 'Test error message');

    expect(error.code).toBe('SOME_CODE');
    expect(error.message).toBe('Test error message');
    expect(error.name).toBe('LicError');
  });

  it('should include optional details', () => {
    const details = { url: 'https://registry.test/licenses', status: 500 };
    const error = new LicError('SOME_CODE', 'Test error', details);

    expect(error.details).toEqual(details);
  });

  it('should be instance of Error', () => {
    const error = new LicError('SOME_CODE', 'Test');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(LicError);
  });

  it('should have stack trace', () => {
    const error = new LicError('SOME_CODE', 'Test');

    expect(error.stack).toBeDefined();
  });

  describe('toJSON', () => {
    it('should serialize name, code, message and details', () => {
      const error = new LicError('SOME_CODE', 'Test', { key: 'mit' });

      expect(error.toJSON()).toEqual({
        name: 'LicError',
        code: 'SOME_CODE',
        message: 'Test',
        details: { key: 'mit' },
      });
    });
  });
});

describe('error subclasses', () => {
  it('ConfigError should carry its name and code', () => {
    const error = new ConfigError(ErrorCodes.MISSING_AUTHOR, 'no author');

    expect(error).toBeInstanceOf(LicError);
    expect(error.name).toBe('ConfigError');
    expect(error.code).toBe('MISSING_AUTHOR');
  });

  it('RegistryError should carry details', () => {
    const error = new RegistryError(ErrorCodes.REGISTRY_HTTP_ERROR, 'bad status', { status: 404 });

    expect(error.name).toBe('RegistryError');
    expect(error.details).toEqual({ status: 404 });
  });

  it('WriteError should be a LicError', () => {
    const error = new WriteError(ErrorCodes.LICENSE_WRITE_FAILED, 'denied');

    expect(error).toBeInstanceOf(LicError);
    expect(error.name).toBe('WriteError');
  });

  it('InteractionCancelledError should default its code and message', () => {
    const error = new InteractionCancelledError();

    expect(error.name).toBe('InteractionCancelledError');
    expect(error.code).toBe('INTERACTION_CANCELLED');
    expect(error.message).toBe('Operation cancelled.');
  });
});
