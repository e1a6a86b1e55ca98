import { describe, expect, it } from 'vitest';
import { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';
import { TransportError } from './transportError.js';

describe('TimeoutError', () => {
  it('names the elapsed timeout', () => {
    const err = new TimeoutError(250);

    expect(err.timeout).toBe(250);
    expect(err.message).toBe('error request timed out after 250ms');
  });

  it('is found behind a transport error', () => {
    const timeout = new TimeoutError(60_000);
    const err = new TransportError('error in POST request to https://fpbase.test/graphql/', { cause: timeout });

    expect(isTimeoutError(err)).toBe(true);
    expect(getTimeoutError(err)).toBe(timeout);
  });

  it('does not match other errors', () => {
    expect(isTimeoutError(new Error('boom'))).toBe(false);
    expect(getTimeoutError('timed out')).toBeNull();
  });
});
