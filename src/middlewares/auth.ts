// Authentication Middleware
// Purpose: JWT verification and role-based access control (RBAC)

import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import config from '../config/env';
import { Role } from '../entities/User';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

// User payload stored in JWT token
export interface AuthPayload {
  userId: number;
  username: string;
  role: Role;
}

// Extend Express Request to include user
declare global {
  namespace Express {
    interface Request {
      user?: AuthPayload;
    }
  }
}

function isAuthPayload(value: unknown): value is AuthPayload {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'userId' in value && typeof value.userId === 'number' &&
    'username' in value && typeof value.username === 'string' &&
    'role' in value && (value.role === 'ADMIN' || value.role === 'EMPLOYEE')
  );
}

/**
 * Verify JWT token and attach user to request
 * Use this middleware on all protected routes
 */
export function authenticate(req: Request, res: Response, next: NextFunction): void {
  try {
    const authHeader = req.headers.authorization;
    const token = authHeader && authHeader.startsWith('Bearer ') ? authHeader.slice('Bearer '.length) : undefined;

    if (!token) {
      res.status(401).json({
        success: false,
        error: 'No token provided. Please login.',
      });
      return;
    }

    const decoded = jwt.verify(token, config.JWT_SECRET);
    if (!isAuthPayload(decoded)) {
      logger.auth('failed_login', undefined, { reason: 'malformed_token' });
      res.status(401).json({
        success: false,
        error: 'Invalid token. Please login again.',
      });
      return;
    }

    // Attach user to request for use in controllers
    req.user = { userId: decoded.userId, username: decoded.username, role: decoded.role };

    next();
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      logger.auth('failed_login', undefined, { reason: 'token_expired' });
      res.status(401).json({
        success: false,
        error: 'Token expired. Please login again.',
      });
      return;
    }

    if (error instanceof jwt.JsonWebTokenError) {
      logger.auth('failed_login', undefined, { reason: 'invalid_token' });
      res.status(401).json({
        success: false,
        error: 'Invalid token. Please login again.',
      });
      return;
    }

    logger.error('Auth middleware error', { error: errorMessage(error) });
    res.status(500).json({
      success: false,
      error: 'Authentication failed',
    });
  }
}

/**
 * Role-based access control middleware factory
 * Use: authorize('ADMIN')
 */
export function authorize(...allowedRoles: Role[]) {
  return (req: Request, res: Response, next: NextFunction): void => {
    // Must be authenticated first
    if (!req.user) {
      res.status(401).json({
        success: false,
        error: 'Not authenticated',
      });
      return;
    }

    if (!allowedRoles.includes(req.user.role)) {
      logger.warn('Unauthorized access attempt', {
        userId: req.user.userId,
        role: req.user.role,
        requiredRoles: allowedRoles,
        path: req.path,
      });

      res.status(403).json({
        success: false,
        error: 'You do not have permission to access this resource',
      });
      return;
    }

    next();
  };
}

/**
 * Generate JWT token for a user
 */
export function generateToken(payload: AuthPayload): string {
  const options: jwt.SignOptions = {};
  // jsonwebtoken types only accept its own duration template; numeric strings are seconds
  if (/^\d+$/.test(config.JWT_EXPIRES_IN)) {
    options.expiresIn = Number(config.JWT_EXPIRES_IN);
  } else {
    options.expiresIn = config.JWT_EXPIRES_IN as jwt.SignOptions['expiresIn'];
  }
  return jwt.sign({ ...payload }, config.JWT_SECRET, options);
}

export default { authenticate, authorize, generateToken };
