/**
 * Tests for error utilities
 */

import {
  BaseError,
  ChannelSourceError,
  ConfigurationError,
  describeError,
  ExportError,
  getHttpStatus,
  getResponseStatus,
  toError
} from '../errors';

describe('BaseError', () => {
  it('should create a base error with message and context', () => {
    const context = { key: 'value' };
    const error = new BaseError('Test error', context);

    expect(error.message).toBe('Test error');
    expect(error.name).toBe('BaseError');
    expect(error.context).toEqual(context);
    expect(error.timestamp).toBeInstanceOf(Date);
    expect(typeof error.id).toBe('string');
  });

  it('should serialize to JSON', () => {
    const error = new BaseError('Test error', { key: 'value' });

    expect(error.toJSON()).toMatchObject({
      name: 'BaseError',
      message: 'Test error',
      context: { key: 'value' },
      timestamp: expect.any(Date),
      stack: expect.any(String)
    });
  });
});

describe('ChannelSourceError', () => {
  it('should prefix the message with the source name', () => {
    const originalError = new Error('Network Error');
    const error = new ChannelSourceError('reddit', 'lookup failed', originalError);

    expect(error.message).toBe('Channel source reddit error: lookup failed');
    expect(error.name).toBe('ChannelSourceError');
    expect(error.source).toBe('reddit');
    expect(error.originalError).toBe(originalError);
    expect(error.context).toEqual({ source: 'reddit', originalError: 'Network Error' });
  });

  it('should be an instance of BaseError and Error', () => {
    const error = new ChannelSourceError('github', 'boom');

    expect(error).toBeInstanceOf(BaseError);
    expect(error).toBeInstanceOf(Error);
  });
});

describe('ConfigurationError', () => {
  it('should carry the missing fields', () => {
    const error = new ConfigurationError('bad env', ['OUTPUT_FILE']);

    expect(error.message).toBe('Configuration error: bad env');
    expect(error.missingFields).toEqual(['OUTPUT_FILE']);
  });
});

describe('ExportError', () => {
  it('should name the file it failed on', () => {
    const error = new ExportError('/tmp/out.json', 'disk full');

    expect(error.message).toBe('Export to /tmp/out.json failed: disk full');
    expect(error.filePath).toBe('/tmp/out.json');
  });
});

describe('HTTP status helpers', () => {
  it('should read the status of an axios-style error from its response', () => {
    const error = Object.assign(new Error('Request failed with status code 401'), {
      response: { status: 401 }
    });

    expect(getResponseStatus(error)).toBe(401);
    expect(getHttpStatus(error)).toBe(401);
  });

  it('should read an Octokit-style status from the error itself', () => {
    const error = Object.assign(new Error('Validation Failed'), { status: 422 });

    expect(getHttpStatus(error)).toBe(422);
    expect(getResponseStatus(error)).toBeUndefined();
  });

  it('should return undefined for values without a status', () => {
    expect(getHttpStatus(new Error('plain'))).toBeUndefined();
    expect(getHttpStatus('text')).toBeUndefined();
    expect(getHttpStatus(null)).toBeUndefined();
    expect(getResponseStatus({ response: null })).toBeUndefined();
  });
});

describe('describeError', () => {
  it('should append the HTTP status when there is one', () => {
    const error = Object.assign(new Error('Request failed with status code 403'), {
      response: { status: 403 }
    });

    expect(describeError(error)).toBe('Request failed with status code 403 (HTTP 403)');
  });

  it('should render errors and other values as text', () => {
    expect(describeError(new Error('Network Error'))).toBe('Network Error');
    expect(describeError('timeout')).toBe('timeout');
    expect(describeError(42)).toBe('42');
  });
});

describe('toError', () => {
  it('should keep Error instances and wrap anything else', () => {
    const original = new Error('kept');

    expect(toError(original)).toBe(original);
    expect(toError('wrapped')).toEqual(new Error('wrapped'));
  });
});
