/**
 * Shared route handler helpers for input validation and JSON error bodies.
 *
 * @module lib/route-utils
 */
import type { Response } from 'express';
import type { ZodSchema } from 'zod';

/**
 * Parse and validate request input (body or query) against a Zod schema.
 *
 * Returns the validated data on success, or `null` after sending a 400 response on failure.
 */
export function parseInput<T>(schema: ZodSchema<T>, data: unknown, res: Response): T | null {
  const result = schema.safeParse(data);
  if (!result.success) {
    res.status(400).json({ error: 'Validation failed', details: result.error.flatten() });
    return null;
  }
  return result.data;
}

/** Send a JSON error body with an optional machine-readable code. */
export function sendError(res: Response, status: number, error: string, code?: string): void {
  res.status(status).json(code ? { error, code } : { error });
}
