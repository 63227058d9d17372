import { describe, it, expect } from 'vitest';
import {
  ClaimKilledError,
  ConfigurationError,
  MissingEvidenceError,
  ScopeClosedError,
  VeritasError,
  getErrorMessage,
  isVeritasError,
} from '../errors.js';
import { Err, Ok, unwrap } from '../result.js';

describe('VeritasError hierarchy', () => {
  it('formats configuration errors with code and field', () => {
    const error = new ConfigurationError('direction', 'unsupported token');

    expect(error).toBeInstanceOf(VeritasError);
    expect(error.name).toBe('ConfigurationError');
    expect(error.message).toBe('Invalid direction: unsupported token');
    expect(error.toString()).toBe('[CONFIGURATION_ERROR] Invalid direction: unsupported token');
    expect(error.toJSON()).toMatchObject({
      code: 'CONFIGURATION_ERROR',
      message: 'Invalid direction: unsupported token',
      details: { field: 'direction', reason: 'unsupported token' },
    });
  });

  it('names the missing evidence', () => {
    const error = new MissingEvidenceError('result');

    expect(error.code).toBe('MISSING_EVIDENCE');
    expect(error.message).toBe('Evidence not bound: result');
    expect(error.toJSON().details).toEqual({ evidenceName: 'result' });
  });

  it('describes the operation attempted on a closed scope', () => {
    const error = new ScopeClosedError('bind', 'balance >= 0');

    expect(error.message).toBe('Cannot bind on closed claim scope: balance >= 0');
    expect(error.toJSON().details).toEqual({ operation: 'bind', statement: 'balance >= 0' });
  });

  it('carries reasoning on killed claims', () => {
    const error = new ClaimKilledError('2+2=5', 'result ≠ 5');

    expect(error.message).toBe('Claim KILLED: 2+2=5\nReasoning: result ≠ 5');
  });

  it('recognizes library errors', () => {
    expect(isVeritasError(new MissingEvidenceError('x'))).toBe(true);
    expect(isVeritasError(new Error('plain'))).toBe(false);
  });
});

describe('getErrorMessage', () => {
  it('extracts messages from errors, strings and message-bearing objects', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain string')).toBe('plain string');
    expect(getErrorMessage({ message: 42 })).toBe('42');
    expect(getErrorMessage(undefined)).toBe('Unknown error');
  });
});

describe('Result', () => {
  it('unwraps values and rethrows errors', () => {
    expect(unwrap(Ok(3))).toBe(3);
    expect(() => unwrap(Err(new ConfigurationError('kind', 'unknown')))).toThrow('Invalid kind: unknown');
  });
});
