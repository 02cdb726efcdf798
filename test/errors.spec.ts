import { describe, expect, it } from 'vitest';
import {
  ConfigError,
  DatabaseConnectionError,
  describeError,
  driverErrorCode,
  QueryError
} from '../src/errors';

describe('describeError', () => {
  it('keeps details for configuration errors', () => {
    expect(describeError(new ConfigError('Invalid environment configuration', { fieldErrors: {} }))).toEqual({
      code: 'config_error',
      message: 'Invalid environment configuration',
      details: { fieldErrors: {} }
    });
  });

  it('omits details for database errors', () => {
    expect(describeError(new DatabaseConnectionError('Failed to connect', { driverCode: 'ECONNREFUSED' }))).toEqual({
      code: 'connection_error',
      message: 'Failed to connect'
    });
    expect(describeError(new QueryError('Failed to execute query'))).toEqual({
      code: 'query_error',
      message: 'Failed to execute query'
    });
  });

  it('names errors after their class', () => {
    expect(new QueryError('x').name).toBe('QueryError');
  });
});

describe('driverErrorCode', () => {
  it('reads string codes only', () => {
    expect(driverErrorCode(Object.assign(new Error('denied'), { code: 'ER_ACCESS_DENIED_ERROR' }))).toBe(
      'ER_ACCESS_DENIED_ERROR'
    );
    expect(driverErrorCode({ code: 1045 })).toBeUndefined();
    expect(driverErrorCode(null)).toBeUndefined();
  });
});
