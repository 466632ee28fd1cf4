import { timingSafeEqual } from 'node:crypto';

import { createMiddleware } from 'hono/factory';

import { AppError } from './errors';

export const API_KEY_HEADER = 'X-API-Key';

function keysMatch(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}

// Runs before the body is read: a rejected caller never triggers a probe.
export function requireApiKey(expectedKey: string | undefined) {
  return createMiddleware(async (c, next) => {
    if (!expectedKey) {
      throw new AppError(500, 'INTERNAL', 'API key is not configured');
    }

    const presented = c.req.header(API_KEY_HEADER);
    if (!presented || !keysMatch(presented, expectedKey)) {
      throw new AppError(401, 'UNAUTHORIZED', 'Unauthorized');
    }

    await next();
  });
}
