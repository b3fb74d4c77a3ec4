import { createHash, timingSafeEqual } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';
import { UnauthorizedError } from '../domain/errors.js';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/**
 * Bearer API key check for every mutating and forensic route.
 * Both sides are hashed first so the comparison is constant-time regardless of length.
 */
export function requireApiKey(apiKey: string) {
  const expected = digest(apiKey);

  return (req: Request, _res: Response, next: NextFunction) => {
    const header = req.get('authorization') ?? '';
    const match = /^Bearer\s+(.+)$/i.exec(header);

    if (!match || !timingSafeEqual(digest(match[1].trim()), expected)) {
      return next(new UnauthorizedError());
    }

    next();
  };
}
