import { describe, expect, it } from 'vitest';
import { getHttpError, HTTPError, isHttpError } from './httpError.js';
import { isTransportError } from './transportError.js';

describe('HTTPError', () => {
  it('expect shallow to correctly return true', () => {
    const err = new HTTPError(new Response(null, { status: 400 }));

    expect(isHttpError(err)).toEqual(true);
    expect(err.message).toBe('HTTP Error: 400');
  });

  it('is a transport error', () => {
    const err = new HTTPError(new Response(null, { status: 502 }), 'error in POST request');

    expect(isTransportError(err)).toBe(true);
    expect(err.name).toBe('HTTPError');
  });

  it('exposes status and a readable response from a nested cause', async () => {
    const response = new Response('upstream down', { status: 503 });
    const err = new Error('wrapped', { cause: new HTTPError(response) });

    const httpError = getHttpError(err);
    expect(httpError?.status).toBe(503);
    expect(await httpError?.response.text()).toBe('upstream down');
  });

  it('expect weird shaped object to not crash', () => {
    const errorResponse = { ok: false, status: 401 } as Response;
    const err = new HTTPError(errorResponse);

    expect(getHttpError(err)?.response.status).toBe(401);
  });
});
