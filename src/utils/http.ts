// HTTP Helpers
// Purpose: Shared request parsing and error replies for controllers

import { Request, Response } from 'express';
import { logger } from './logger';
import { AppError, ValidationError, errorMessage } from './errors';

/**
 * Answer a failed request. AppErrors keep their status and message;
 * anything else is logged and reported with `fallback`.
 */
export function sendError(res: Response, error: unknown, fallback: string, context?: Record<string, unknown>): void {
  if (error instanceof AppError && error.statusCode < 500) {
    res.status(error.statusCode).json({ success: false, error: error.message });
    return;
  }

  logger.error(fallback, { ...context, error: errorMessage(error) });
  res.status(error instanceof AppError ? error.statusCode : 500).json({
    success: false,
    error: `${fallback}. Please try again.`,
  });
}

/**
 * Read an optional string query parameter
 */
export function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Parse a positive integer id from a route parameter
 */
export function parseId(value: string | undefined, label: string): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new ValidationError(`Invalid ${label}`);
  }
  const id = Number(value);
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new ValidationError(`Invalid ${label}`);
  }
  return id;
}

/**
 * Id of the authenticated caller; routes mount `authenticate` first
 */
export function currentUserId(req: Request): number {
  if (!req.user) {
    throw new AppError('Not authenticated', 401);
  }
  return req.user.userId;
}
