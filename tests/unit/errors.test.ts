import { describe, expect, it } from 'vitest';

import {
  CadenceError,
  ERROR_CODES,
  configurationError,
  createCadenceError,
  decodeError,
  describeError,
  genericError,
  isCadenceError,
} from '../../src/errors/cadence-error.js';

describe('CadenceError', () => {
  it('carries code, details and cause', () => {
    const cause = new Error('root');
    const error = createCadenceError(ERROR_CODES.GENERATION_FAILED, 'wrapped', {
      details: { step: 'start' },
      cause,
    });
    expect(error).toBeInstanceOf(CadenceError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('CadenceError');
    expect(error.code).toBe('CADENCE_GENERATION_FAILED');
    expect(error.details).toEqual({ step: 'start' });
    expect(error.cause).toBe(cause);
  });

  it('matches by code', () => {
    const error = configurationError('bad value', { field: 'x' });
    expect(isCadenceError(error)).toBe(true);
    expect(isCadenceError(error, ERROR_CODES.CONFIG_INVALID)).toBe(true);
    expect(isCadenceError(error, ERROR_CODES.DECODE_FAILED)).toBe(false);
    expect(isCadenceError(new Error('plain'))).toBe(false);
  });

  it('separates configuration errors from call failures', () => {
    expect(configurationError('bad').isConfigurationError).toBe(true);
    expect(createCadenceError(ERROR_CODES.CONFIG_TEMPLATE_UNKNOWN, 'x').isConfigurationError).toBe(true);
    expect(decodeError(new Error('x')).isConfigurationError).toBe(false);
  });

  it('builds descriptive messages for wrapped failures', () => {
    expect(decodeError(new Error('out of memory')).message).toBe('Decode failed: out of memory');
    expect(genericError('Prompt assembly failed', 'bad input').message).toBe(
      'Prompt assembly failed: bad input'
    );
    expect(describeError(42)).toBe('42');
  });
});
