import { describe, expect, it } from 'vitest';
import { StoreError, ValidationError, toToolError } from './errors.js';
import { toStoreError } from './store/database.js';

describe('toToolError', () => {
  it('keeps the field of validation errors', () => {
    expect(toToolError(new ValidationError('name', 'Name is required'))).toEqual({
      kind: 'validation',
      message: 'Name is required',
      field: 'name',
    });
  });

  it('maps store errors to store', () => {
    expect(toToolError(new StoreError('database is locked'))).toEqual({ kind: 'store', message: 'database is locked' });
  });

  it('maps anything else to internal', () => {
    expect(toToolError(new TypeError('x is not a function'))).toEqual({ kind: 'internal', message: 'x is not a function' });
    expect(toToolError('boom')).toEqual({ kind: 'internal', message: 'boom' });
  });
});

describe('toStoreError', () => {
  it('wraps driver errors and keeps the cause', () => {
    const cause = new Error('SQLITE_BUSY: database is locked');
    const wrapped = toStoreError(cause);

    expect(wrapped).toBeInstanceOf(StoreError);
    expect(wrapped.message).toBe('SQLITE_BUSY: database is locked');
    expect(wrapped.cause).toBe(cause);
  });

  it('passes typed errors through', () => {
    const validation = new ValidationError('projectId', 'Project 4 not found');
    expect(toStoreError(validation)).toBe(validation);
  });
});
