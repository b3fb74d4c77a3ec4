import type { Request } from 'express';
import type { ZodType } from 'zod';
import type { Provenance } from '../domain/entities/AuditEntry.js';
import { ValidationError } from '../domain/errors.js';

export function provenanceOf(req: Request): Provenance {
  return {
    ipAddress: req.ip ?? null,
    userAgent: req.get('user-agent') ?? null,
  };
}

/**
 * Validate a request body, reporting every issue as one ValidationError
 */
export function parseBody<T>(schema: ZodType<T>, body: unknown): T {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw new ValidationError('Invalid request body', {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return result.data;
}

export const MAX_PAGE_SIZE = 500;

/**
 * `?limit=` as an integer in 1..MAX_PAGE_SIZE; anything unparseable falls back
 */
export function parseLimit(value: unknown, fallback = 100): number {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    return fallback;
  }
  return Math.min(Math.max(parseInt(value, 10), 1), MAX_PAGE_SIZE);
}
