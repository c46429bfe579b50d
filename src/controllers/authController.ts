// Authentication Controller
// Purpose: Handle login, account provisioning, and profile lookup

import { Request, Response } from 'express';
import { generateToken } from '../middlewares/auth';
import { findById, findByUsername, provisionUser, toPublicUser, verifyPassword } from '../services/userService';
import { Role } from '../entities/User';
import { logger } from '../utils/logger';
import { LookupError, ValidationError } from '../utils/errors';
import { currentUserId, sendError } from '../utils/http';

function readString(body: unknown, name: string): string | undefined {
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(body, name);
  return typeof value === 'string' ? value : undefined;
}

/**
 * POST /api/auth/login
 * Authenticate with username and password
 * Returns JWT token and user info on success
 */
export async function login(req: Request, res: Response): Promise<void> {
  try {
    const username = readString(req.body, 'username');
    const password = readString(req.body, 'password');

    // Validate required fields
    if (!username || !password) {
      res.status(400).json({
        success: false,
        error: 'Username and password are required',
      });
      return;
    }

    const user = await findByUsername(username);
    if (!user || !(await verifyPassword(user, password))) {
      logger.auth('failed_login', user?.id, { reason: user ? 'invalid_password' : 'user_not_found' });
      res.status(401).json({
        success: false,
        error: 'Invalid username or password',
      });
      return;
    }

    const token = generateToken({ userId: user.id, username: user.username, role: user.role });
    logger.auth('login', user.id);

    res.json({
      success: true,
      data: {
        token,
        user: toPublicUser(user),
      },
    });
  } catch (error) {
    sendError(res, error, 'Login failed');
  }
}

/**
 * POST /api/auth/register
 * Create an account and its clock state row (Admin only)
 */
export async function register(req: Request, res: Response): Promise<void> {
  try {
    const username = readString(req.body, 'username');
    const password = readString(req.body, 'password');
    const fullName = readString(req.body, 'full_name');
    const roleInput = readString(req.body, 'role');

    if (!username || !password || !fullName) {
      throw new ValidationError('Username, password, and full_name are required');
    }

    let role: Role = 'EMPLOYEE';
    if (roleInput !== undefined) {
      if (roleInput !== 'ADMIN' && roleInput !== 'EMPLOYEE') {
        throw new ValidationError('Role must be ADMIN or EMPLOYEE');
      }
      role = roleInput;
    }

    const user = await provisionUser({ username, password, fullName, role });

    res.status(201).json({
      success: true,
      message: 'User registered successfully',
      data: { user: toPublicUser(user) },
    });
  } catch (error) {
    sendError(res, error, 'Registration failed');
  }
}

/**
 * GET /api/auth/me
 * Current user's profile
 */
export async function getProfile(req: Request, res: Response): Promise<void> {
  try {
    const userId = currentUserId(req);
    const user = await findById(userId);
    if (!user) {
      throw new LookupError('User not found');
    }

    res.json({
      success: true,
      data: { user: toPublicUser(user) },
    });
  } catch (error) {
    sendError(res, error, 'Failed to fetch profile');
  }
}

export default { login, register, getProfile };
