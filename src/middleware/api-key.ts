import { createHash, timingSafeEqual } from 'node:crypto';
import type { RequestHandler } from 'express';
import { NotConfiguredError, UnauthorizedError } from '../errors.js';

export const API_KEY_HEADER = 'X-Api-Key';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

// Digests have equal length, so the comparison time does not depend on the key
function keysMatch(provided: string, expected: string): boolean {
  return timingSafeEqual(digest(provided), digest(expected));
}

/**
 * Rejects requests whose `X-Api-Key` header does not match `expectedKey`.
 * Without a configured key every request is refused with 503.
 */
export function requireApiKey(expectedKey: string | undefined): RequestHandler {
  return (req, res, next) => {
    if (!expectedKey) {
      const error = new NotConfiguredError('Proxy API key is not configured');
      res.status(error.status).json({ error: error.message });
      return;
    }

    const provided = req.header(API_KEY_HEADER);
    if (!provided) {
      const error = new UnauthorizedError(`Missing ${API_KEY_HEADER} header`);
      res.status(error.status).json({ error: error.message });
      return;
    }

    if (!keysMatch(provided, expectedKey)) {
      const error = new UnauthorizedError('Invalid API key');
      res.status(error.status).json({ error: error.message });
      return;
    }

    next();
  };
}
