// Request Logging Middleware
// Purpose: One log line per answered request, tagged with the caller and the ledger ids it touched

import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';
import { queryString } from '../utils/http';

// Route parameters naming a user or an entry
const ID_PARAMS = ['uid', 'eid'];

/**
 * Caller, role, route ids and requested time zone, omitting what is absent
 */
export function requestContext(req: Request): Record<string, unknown> {
  const context: Record<string, unknown> = {};
  if (req.user) {
    context.userId = req.user.userId;
    context.role = req.user.role;
  }
  for (const name of ID_PARAMS) {
    const value = req.params[name];
    if (value !== undefined && /^\d+$/.test(value)) {
      context[name] = Number(value);
    }
  }
  const timeZone = queryString(req, 'tz');
  if (timeZone) {
    context.timeZone = timeZone;
  }
  return context;
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();

  // Route params and req.user are only known once the response is done
  res.on('finish', () => {
    if (req.path === '/health') {
      return;
    }
    logger.request(req.method, req.originalUrl, res.statusCode, Date.now() - startTime, requestContext(req));
  });

  next();
}

export default requestLogger;
