/**
 * Error Handling Tests
 * @module tests/errors
 */

import { describe, it, expect } from 'vitest';
import {
  AssembleError,
  BindError,
  ConfigurationError,
  TemplateReadError,
  UsageError,
  getErrorMessage,
  getHttpStatusForCode,
  hasErrorCode,
  isBaseError,
  isClientError,
  isOperationalError,
  wrapError,
} from '../src/errors/index.js';

describe('Error Classes', () => {
  describe('BindError', () => {
    it('should describe a missing variable', () => {
      const error = BindError.missingRequired('region');

      expect(error.toJSON()).toMatchObject({
        name: 'BindError',
        message: 'Missing required variable: region',
        code: 'MISSING_REQUIRED_VARIABLE',
        statusCode: 422,
        details: { kind: 'MissingRequired', variable: 'region' },
      });
    });

    it('should name the input source', () => {
      const error = BindError.invalidInput('--var', "expected name=value, got 'x'", '--var');

      expect(error.message).toBe("Invalid variable input from --var: expected name=value, got 'x'");
      expect(error.context.source).toBe('--var');
      expect(BindError.invalidInput('x', 'bad').message).toBe('Invalid variable input: bad');
    });
  });

  describe('AssembleError', () => {
    it('should prefix the message with source and line', () => {
      const error = new AssembleError('DuplicateKey', "Key 'a' appears twice in section 'aws'", {
        line: 7,
        fragment: 'a = 2',
        source: 'cluster.ini',
      });

      expect(error.message).toBe("cluster.ini:7: Key 'a' appears twice in section 'aws'");
      expect(error.code).toBe('TEMPLATE_DUPLICATE_KEY');
      expect(error.context.details).toEqual({ kind: 'DuplicateKey', line: 7, fragment: 'a = 2', source: 'cluster.ini' });
    });

    it('should omit the line when there is none', () => {
      const error = new AssembleError('UnterminatedConditional', 'never closed', {
        line: null,
        fragment: '',
        source: '<inline>',
      });

      expect(error.message).toBe('<inline>: never closed');
      expect(error.line).toBeNull();
    });
  });

  describe('engine errors', () => {
    it('should mark configuration errors as non-operational', () => {
      const error = new ConfigurationError('server.port');

      expect(error.message).toBe('Invalid or missing configuration: server.port');
      expect(error.statusCode).toBe(500);
      expect(isOperationalError(error)).toBe(false);
    });

    it('should map usage errors to 400', () => {
      expect(new UsageError('bad flag').statusCode).toBe(400);
    });

    it('should keep the cause of a read error', () => {
      const cause = new Error('ENOENT: no such file');
      const error = new TemplateReadError('/tmp/x.ini', cause);

      expect(error.message).toBe('Failed to read /tmp/x.ini: ENOENT: no such file');
      expect(error.getRootCause()).toBe(cause);
      expect(error.toString()).toBe('TemplateReadError [TEMPLATE_READ_ERROR]: Failed to read /tmp/x.ini: ENOENT: no such file');
    });
  });
});

describe('Error Utilities', () => {
  it('should wrap unknown values', () => {
    const wrapped = wrapError('boom');

    expect(isBaseError(wrapped)).toBe(true);
    expect(wrapped.message).toBe('boom');
    expect(wrapped.code).toBe('INTERNAL_ERROR');
    expect(wrapped.context.details).toEqual({ originalValue: 'boom' });
  });

  it('should return BaseErrors unchanged', () => {
    const error = new UsageError('x');

    expect(wrapError(error)).toBe(error);
    expect(hasErrorCode(error, 'BAD_REQUEST')).toBe(true);
  });

  it('should extract messages', () => {
    expect(getErrorMessage(new Error('a'))).toBe('a');
    expect(getErrorMessage('b')).toBe('b');
  });

  it('should map codes to statuses', () => {
    expect(getHttpStatusForCode('TEMPLATE_UNBOUND_PLACEHOLDER')).toBe(422);
    expect(getHttpStatusForCode('NOT_A_CODE')).toBe(500);
    expect(isClientError('ROUTE_NOT_FOUND')).toBe(true);
    expect(isClientError('TEMPLATE_READ_ERROR')).toBe(false);
  });
});
