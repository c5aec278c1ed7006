import { describe, it, expect, afterEach, vi } from 'vitest';
import createDebug from 'debug';
import { FetchError, MissingStationInfoError } from './errors.js';
import { createApp, enableLogging, formatError } from './logger.js';

const originalLog = createDebug.log;

afterEach(() => {
  createDebug.disable();
  createDebug.log = originalLog;
});

describe('enableLogging', () => {
  it('always shows errors', () => {
    enableLogging('');
    expect(createDebug.enabled('tide-calendar:error')).toBe(true);
    expect(createDebug.enabled('tide-calendar')).toBe(false);
  });

  it('adds the namespaces named in DEBUG', () => {
    enableLogging('tide-calendar');
    expect(createDebug.enabled('tide-calendar')).toBe(true);
    expect(createDebug.enabled('tide-calendar:error')).toBe(true);
  });
});

describe('formatError', () => {
  it('follows the cause chain', () => {
    const err = new MissingStationInfoError('0000000', {
      cause: new FetchError('Failed to fetch station info: 404 Not Found', 'https://example.test', 404),
    });
    expect(formatError(err)).toBe(
      'Failed to retrieve station info for 0000000 (caused by: Failed to fetch station info: 404 Not Found)'
    );
  });

  it('stringifies anything else', () => {
    expect(formatError('plain')).toBe('plain');
  });
});

describe('createApp', () => {
  it('logs errors together with their cause', () => {
    const log = vi.fn();
    createDebug.log = log;
    enableLogging('');

    createApp().error(new MissingStationInfoError('0000000', { cause: new Error('fetch failed') }));

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0].join(' ')).toContain(
      'Failed to retrieve station info for 0000000 (caused by: fetch failed)'
    );
  });
});
