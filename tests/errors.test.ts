import pino from 'pino';
import { describe, expect, it } from 'vitest';
import {
  buildApiError,
  formatErrorMessage,
  fromHttpResponse,
  fromTransportFailure,
  jsonParseError,
  logApiError,
  parseRetryAfter,
  schemaMismatchError,
} from '../src/client/error-factory.js';
import { ApiError, ErrorKind, classifyStatus, isApiError } from '../src/client/errors.js';
import { TransportError } from '../src/client/transport.js';
import type { RequestContext } from '../src/client/types.js';
import { jsonResponse, textResponse } from './helpers.js';

const context: RequestContext = {
  method: 'GET',
  url: 'https://gateway.test/v1/public/characters/42',
  params: { limit: '5' },
};

describe('classifyStatus', () => {
  it.each([
    [401, ErrorKind.Authentication],
    [404, ErrorKind.NotFound],
    [400, ErrorKind.Validation],
    [429, ErrorKind.RateLimit],
    [500, ErrorKind.ServerError],
    [503, ErrorKind.ServerError],
    [599, ErrorKind.ServerError],
  ])('maps %i to %s', (status, kind) => {
    expect(classifyStatus(status)).toBe(kind);
  });

  it('maps every 5xx code to SERVER_ERROR', () => {
    for (let status = 500; status < 600; status++) {
      expect(classifyStatus(status)).toBe('SERVER_ERROR');
    }
  });

  it.each([0, 200, 204, 302, 403, 409, 418, 499, 600, 999])('maps %i to UNKNOWN', (status) => {
    expect(classifyStatus(status)).toBe('UNKNOWN');
  });
});

describe('buildApiError', () => {
  it.each([
    [401, 'Authentication failed'],
    [404, 'Resource not found'],
    [400, 'Validation failed'],
    [429, 'Rate limit exceeded'],
    [502, 'Server error occurred'],
    [409, 'Marvel API error occurred'],
  ])('uses the default message for %i', (status, message) => {
    const error = buildApiError(status);
    expect(error.message).toBe(message);
    expect(error.statusCode).toBe(status);
  });

  it('keeps an explicit message', () => {
    expect(buildApiError(404, 'Character missing').message).toBe('Character missing');
  });

  it('attaches only the extras that belong to the kind', () => {
    const extra = {
      retryAfterSeconds: 5,
      validationMessages: ['limit must be positive'],
      resourceType: 'characters',
      resourceId: '42',
    };

    expect(buildApiError(429, undefined, undefined, undefined, extra).detail).toEqual({
      kind: 'RATE_LIMIT',
      retryAfterSeconds: 5,
    });
    expect(buildApiError(400, undefined, undefined, undefined, extra).detail).toEqual({
      kind: 'VALIDATION',
      validationMessages: ['limit must be positive'],
    });
    expect(buildApiError(404, undefined, undefined, undefined, extra).detail).toEqual({
      kind: 'NOT_FOUND',
      resourceType: 'characters',
      resourceId: '42',
    });
    expect(buildApiError(500, undefined, undefined, undefined, extra).detail).toEqual({ kind: 'SERVER_ERROR' });
  });

  it('leaves absent extras absent', () => {
    expect(buildApiError(429).detail).toEqual({ kind: 'RATE_LIMIT' });
    expect(buildApiError(404).detail).toEqual({ kind: 'NOT_FOUND' });
    expect(buildApiError(400).detail).toEqual({ kind: 'VALIDATION', validationMessages: [] });
  });

  it('is an Error and an ApiError', () => {
    const error = buildApiError(500, undefined, { code: 500 }, context);
    expect(error).toBeInstanceOf(Error);
    expect(isApiError(error)).toBe(true);
    expect(error.kind).toBe('SERVER_ERROR');
    expect(error.responseBody).toEqual({ code: 500 });
    expect(error.requestContext).toEqual(context);
  });
});

describe('ApiError.toString', () => {
  it('includes the status code when known', () => {
    expect(buildApiError(404).toString()).toBe('Resource not found (Status: 404)');
  });

  it('is just the message without a status code', () => {
    const error = new ApiError({ message: 'Request timeout', detail: { kind: 'NETWORK' } });
    expect(error.toString()).toBe('Request timeout');
  });
});

describe('fromHttpResponse', () => {
  it('takes the message from the body status field', () => {
    const error = fromHttpResponse(jsonResponse(409, { code: 409, status: 'You must pass a positive limit.' }), context);
    expect(error.message).toBe('You must pass a positive limit.');
    expect(error.kind).toBe('UNKNOWN');
    expect(error.responseBody).toEqual({ code: 409, status: 'You must pass a positive limit.' });
  });

  it('takes the message from the body message field', () => {
    const error = fromHttpResponse(
      jsonResponse(401, { code: 'InvalidCredentials', message: 'The passed API key is invalid.' }),
      context,
    );
    expect(error.message).toBe('The passed API key is invalid.');
    expect(error.kind).toBe('AUTHENTICATION');
  });

  it('falls back to the default message and keeps a non-JSON body as text', () => {
    const error = fromHttpResponse(textResponse(502, '<html>Bad Gateway</html>'), context);
    expect(error.message).toBe('Server error occurred');
    expect(error.responseBody).toBe('<html>Bad Gateway</html>');
  });

  it('reads Retry-After for rate limits', () => {
    const error = fromHttpResponse(jsonResponse(429, { code: 429, status: 'Slow down' }, { 'retry-after': '7' }), context);
    expect(error.detail).toEqual({ kind: 'RATE_LIMIT', retryAfterSeconds: 7 });
  });

  it('collects validation messages', () => {
    const error = fromHttpResponse(
      jsonResponse(400, { code: 400, message: 'Bad request', errors: ['limit too large', 'bad orderBy'] }),
      context,
    );
    expect(error.detail).toEqual({ kind: 'VALIDATION', validationMessages: ['limit too large', 'bad orderBy'] });
  });

  it('uses the body message as the validation message when no list is given', () => {
    const error = fromHttpResponse(jsonResponse(400, { code: 400, status: 'Invalid orderBy' }), context);
    expect(error.detail).toEqual({ kind: 'VALIDATION', validationMessages: ['Invalid orderBy'] });
  });

  it('names the missing resource on 404', () => {
    const error = fromHttpResponse(jsonResponse(404, { code: 404, status: "We couldn't find that character" }), context, {
      type: 'characters',
      id: 42,
    });
    expect(error.message).toBe("We couldn't find that character");
    expect(error.detail).toEqual({ kind: 'NOT_FOUND', resourceType: 'characters', resourceId: '42' });
  });
});

describe('parseRetryAfter', () => {
  it('parses delta seconds', () => {
    expect(parseRetryAfter('12')).toBe(12);
    expect(parseRetryAfter(['3', '9'])).toBe(3);
  });

  it('parses an HTTP date relative to now', () => {
    const now = Date.parse('Wed, 21 Oct 2015 07:27:30 GMT');
    expect(parseRetryAfter('Wed, 21 Oct 2015 07:28:00 GMT', now)).toBe(30);
  });

  it('returns undefined when absent or unparseable', () => {
    expect(parseRetryAfter(undefined)).toBeUndefined();
    expect(parseRetryAfter('')).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});

describe('fromTransportFailure', () => {
  it('reports timeouts', () => {
    const error = fromTransportFailure(new TransportError('timeout', 'Timeout awaiting request for 50ms'), context);
    expect(error.message).toBe('Request timeout');
    expect(error.kind).toBe('NETWORK');
    expect(error.statusCode).toBeUndefined();
    expect(error.requestContext).toEqual(context);
  });

  it('reports connection failures', () => {
    const error = fromTransportFailure(new TransportError('connection', 'connect ECONNREFUSED 127.0.0.1:1'), context);
    expect(error.message).toBe('Connection error');
    expect(error.kind).toBe('NETWORK');
  });

  it('carries the text of any other failure', () => {
    const cause = new Error('socket hang up');
    const error = fromTransportFailure(cause, context);
    expect(error.message).toBe('socket hang up');
    expect(error.kind).toBe('NETWORK');
    expect(error.cause).toBe(cause);
  });

  it('stringifies non-Error failures', () => {
    expect(fromTransportFailure('boom', context).message).toBe('boom');
  });
});

describe('parse failures', () => {
  it('keeps the raw text for unparseable JSON', () => {
    const error = jsonParseError(200, 'not json', context, new SyntaxError('Unexpected token'));
    expect(error.message).toBe('Failed to parse JSON response');
    expect(error.statusCode).toBe(200);
    expect(error.responseBody).toBe('not json');
  });

  it('keeps the parsed payload for schema mismatches', () => {
    const error = schemaMismatchError(200, { id: 'nope' }, context, new Error('invalid'));
    expect(error.message).toBe('Failed to parse response into model');
    expect(error.responseBody).toEqual({ id: 'nope' });
  });
});

describe('formatErrorMessage', () => {
  it('names the missing resource', () => {
    const error = buildApiError(404, undefined, undefined, undefined, { resourceType: 'characters', resourceId: '42' });
    expect(formatErrorMessage(error)).toBe('Resource not found (Status: 404) - Characters with ID 42 not found');
  });

  it('names the resource type alone', () => {
    const error = buildApiError(404, undefined, undefined, undefined, { resourceType: 'comics' });
    expect(formatErrorMessage(error)).toBe('Resource not found (Status: 404) - Comics not found');
  });

  it('adds the retry delay for rate limits', () => {
    expect(formatErrorMessage(buildApiError(429, undefined, undefined, undefined, { retryAfterSeconds: 30 }))).toBe(
      'Rate limit exceeded (Status: 429) - Retry after 30 seconds',
    );
    expect(formatErrorMessage(buildApiError(429))).toBe(
      'Rate limit exceeded (Status: 429) - Please wait before making more requests',
    );
  });

  it('lists validation messages', () => {
    const error = buildApiError(400, undefined, undefined, undefined, { validationMessages: ['a', 'b'] });
    expect(formatErrorMessage(error)).toBe('Validation failed (Status: 400) - Validation errors: a, b');
  });

  it('adds advice for network, server and authentication failures', () => {
    const network = new ApiError({ message: 'Connection error', detail: { kind: 'NETWORK' } });
    expect(formatErrorMessage(network)).toBe('Connection error - Please check your internet connection and try again');
    expect(formatErrorMessage(buildApiError(500))).toBe('Server error occurred (Status: 500) - Please try again later');
    expect(formatErrorMessage(buildApiError(401))).toBe('Authentication failed (Status: 401) - Please check your API keys');
  });

  it('leaves unknown errors as they are', () => {
    expect(formatErrorMessage(buildApiError(409))).toBe('Marvel API error occurred (Status: 409)');
  });
});

describe('logApiError', () => {
  function captureLogger() {
    const lines: Array<{ level: number; msg: string; kind: string }> = [];
    const logger = pino({ level: 'info' }, {
      write(line: string) {
        lines.push(JSON.parse(line));
      },
    });
    return { logger, lines };
  }

  it.each([
    [500, 50],
    [401, 50],
    [429, 40],
    [404, 30],
    [400, 30],
  ])('logs status %i at level %i', (status, level) => {
    const { logger, lines } = captureLogger();

    logApiError(buildApiError(status), logger);

    expect(lines).toHaveLength(1);
    expect(lines[0]?.level).toBe(level);
    expect(lines[0]?.kind).toBe(classifyStatus(status));
  });

  it('logs network failures as warnings with the formatted message', () => {
    const { logger, lines } = captureLogger();

    logApiError(new ApiError({ message: 'Request timeout', detail: { kind: 'NETWORK' } }), logger);

    expect(lines[0]?.level).toBe(40);
    expect(lines[0]?.msg).toBe('Request timeout - Please check your internet connection and try again');
  });
});
