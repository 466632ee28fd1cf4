import { Hono } from 'hono';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { createApp } from '../src/app';
import { AppError, handleError, handleNotFound, type ErrorResponse } from '../src/middleware/errors';
import type { Probe } from '../src/monitor/types';
import { createFakePg } from './helpers/fake-pg';

const WEBSITE_ID = 'c5d6e7f8-3a4b-4c5d-8e9f-334455667788';

function appWith(apiKey: string | undefined) {
  return createApp({ db: createFakePg([]), probe: vi.fn<Probe>(), apiKey });
}

function postBatch(body: unknown) {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', 'X-API-Key': 'test-secret' },
    body: JSON.stringify(body),
  };
}

async function readError(res: Response): Promise<ErrorResponse> {
  return (await res.json()) as ErrorResponse;
}

describe('middleware/errors', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keeps headers set before an AppError is thrown', async () => {
    const res = await appWith('test-secret').request('/api/v1/checks', { method: 'DELETE' });

    expect(res.status).toBe(405);
    expect(res.headers.get('allow')).toBe('POST');
    await expect(readError(res)).resolves.toEqual({
      error: { code: 'METHOD_NOT_ALLOWED', message: 'Invalid request method' },
    });
  });

  it('turns batch schema violations into INVALID_ARGUMENT', async () => {
    const res = await appWith('test-secret').request(
      '/api/v1/checks',
      postBatch({ region: 'eu', urls: [{ websiteId: 'site-1', url: 'https://example.com/' }] }),
    );

    expect(res.status).toBe(400);
    const payload = await readError(res);
    expect(payload.error.code).toBe('INVALID_ARGUMENT');
    expect(payload.error.message).toMatch(/Invalid uuid/);
  });

  it('reports a missing urls list with the field path', async () => {
    const res = await appWith('test-secret').request('/api/v1/checks', postBatch({ region: 'eu' }));

    expect(res.status).toBe(400);
    const payload = await readError(res);
    expect(payload.error.code).toBe('INVALID_ARGUMENT');
    expect(payload.error.message).toMatch(/"urls"/);
  });

  it('answers 500 when the service has no key configured', async () => {
    const res = await appWith(undefined).request(
      '/api/v1/checks',
      postBatch({ region: 'eu', urls: [{ websiteId: WEBSITE_ID, url: 'https://example.com/' }] }),
    );

    expect(res.status).toBe(500);
    await expect(readError(res)).resolves.toEqual({
      error: { code: 'INTERNAL', message: 'API key is not configured' },
    });
  });

  it('hides unexpected failures behind a generic 500 and logs them', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const app = new Hono();
    app.onError(handleError);
    app.get('/explode', () => {
      throw new Error('pool exhausted');
    });

    const res = await app.request('/explode');

    expect(res.status).toBe(500);
    await expect(readError(res)).resolves.toEqual({
      error: { code: 'INTERNAL', message: 'Internal Server Error' },
    });
    expect(consoleError).toHaveBeenCalledTimes(1);
  });

  it('maps unmatched routes to NOT_FOUND', async () => {
    const app = new Hono();
    app.notFound(handleNotFound);

    const res = await app.request('/api/v2/checks');

    expect(res.status).toBe(404);
    await expect(readError(res)).resolves.toEqual({ error: { code: 'NOT_FOUND', message: 'Not Found' } });
  });

  it('carries status and code on AppError', () => {
    const err = new AppError(400, 'INVALID_ARGUMENT', 'Too many URLs, maximum allowed is 5');

    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('AppError');
    expect(err.status).toBe(400);
    expect(err.code).toBe('INVALID_ARGUMENT');
  });
});
