import { describe, it, expect } from 'vitest';
import { BaseError, ConfigurationError, ValidationError, errorMessage } from '../Types/errors.js';

describe('BaseError', () => {
  it('carries message, code and details', () => {
    const err = new BaseError('screening failed', 'GUARD_DOWN', { status: 503 });
    expect(err.message).toBe('screening failed');
    expect(err.code).toBe('GUARD_DOWN');
    expect(err.details).toEqual({ status: 503 });
    expect(err.name).toBe('BaseError');
  });

  it('is an Error with a stack', () => {
    const err = new BaseError('msg', 'CODE');
    expect(err).toBeInstanceOf(Error);
    expect(err.stack).toBeDefined();
    expect(err.details).toBeUndefined();
  });

  it('serializes name, code, message and details only', () => {
    const err = new BaseError('msg', 'CODE', { a: 1 });
    expect(JSON.parse(JSON.stringify(err))).toEqual({
      name: 'BaseError',
      code: 'CODE',
      message: 'msg',
      details: { a: 1 },
    });
  });

  it('omits absent details from JSON', () => {
    expect(new BaseError('msg', 'CODE').toJSON()).toEqual({ name: 'BaseError', code: 'CODE', message: 'msg' });
  });
});

describe('ConfigurationError', () => {
  it('has its own name and code', () => {
    const err = new ConfigurationError('Lakera API key is required', { key: 'LAKERA_GUARD_API_KEY' });
    expect(err).toBeInstanceOf(BaseError);
    expect(err.name).toBe('ConfigurationError');
    expect(err.code).toBe('CONFIGURATION_ERROR');
    expect(err.details).toEqual({ key: 'LAKERA_GUARD_API_KEY' });
  });
});

describe('ValidationError', () => {
  it('has its own name and code', () => {
    const err = new ValidationError('Invalid server URL: nope');
    expect(err).toBeInstanceOf(BaseError);
    expect(err.name).toBe('ValidationError');
    expect(err.code).toBe('VALIDATION_ERROR');
  });
});

describe('errorMessage', () => {
  it('uses the message of an Error', () => {
    expect(errorMessage(new ValidationError('bad input'))).toBe('bad input');
  });

  it('stringifies anything else', () => {
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
