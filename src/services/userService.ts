// User Service
// Purpose: Provision accounts together with their clock state row

import bcrypt from 'bcryptjs';
import { AppDataSource, withWriteLock } from '../config/database';
import { User, Role } from '../entities/User';
import { UserState } from '../entities/UserState';
import { ConflictError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { nowUnix } from '../utils/time';

const USERNAME_PATTERN = /^[a-z0-9._-]{3,64}$/;
const MIN_PASSWORD_LENGTH = 8;

export interface NewUser {
  username: string;
  password: string;
  fullName: string;
  role?: Role;
}

export type PublicUser = Omit<User, 'passwordHash'>;

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    username: user.username,
    fullName: user.fullName,
    role: user.role,
    createdAt: user.createdAt,
  };
}

/**
 * Create a user and its state row ('O', since now) in one transaction,
 * queued behind other writes.
 * Clock transitions require the state row to exist.
 */
export async function provisionUser(input: NewUser): Promise<User> {
  const username = input.username.trim().toLowerCase();
  if (!USERNAME_PATTERN.test(username)) {
    throw new ValidationError('Username must be 3-64 characters of a-z, 0-9, ".", "_" or "-"');
  }
  if (input.password.length < MIN_PASSWORD_LENGTH) {
    throw new ValidationError(`Password must be at least ${MIN_PASSWORD_LENGTH} characters`);
  }
  if (input.fullName.trim() === '') {
    throw new ValidationError('Full name is required');
  }

  const salt = await bcrypt.genSalt(10);
  const passwordHash = await bcrypt.hash(input.password, salt);

  const user = await withWriteLock(() =>
    AppDataSource.transaction(async manager => {
      const existing = await manager.findOne(User, { where: { username } });
      if (existing) {
        throw new ConflictError('Username is already taken');
      }

      const created = await manager.save(
        manager.create(User, {
          username,
          passwordHash,
          fullName: input.fullName.trim(),
          role: input.role ?? 'EMPLOYEE',
        })
      );
      await manager.insert(UserState, { uid: created.id, state: 'O', sinceUnixS: nowUnix() });
      return created;
    })
  );

  logger.auth('register', user.id, { username, role: user.role });
  return user;
}

export async function findByUsername(username: string): Promise<User | null> {
  return AppDataSource.getRepository(User).findOne({
    where: { username: username.trim().toLowerCase() },
  });
}

export async function findById(id: number): Promise<User | null> {
  return AppDataSource.getRepository(User).findOne({ where: { id } });
}

export async function verifyPassword(user: User, password: string): Promise<boolean> {
  return bcrypt.compare(password, user.passwordHash);
}

export default { provisionUser, findByUsername, findById, verifyPassword, toPublicUser };
