import { afterAll, beforeEach, describe, expect, it } from '@jest/globals';
import { closeDatabase } from '../../src/config/database';
import { findByUsername, provisionUser, toPublicUser, verifyPassword } from '../../src/services/userService';
import { ConflictError, ValidationError } from '../../src/utils/errors';
import { resetDatabase, setNow, stateOf } from '../helpers/db';

const NOW = 1714953600;

describe('userService', () => {
  beforeEach(async () => {
    await resetDatabase();
  });

  afterAll(async () => {
    await closeDatabase();
  });

  it('creates the user together with a clocked-out state row', async () => {
    setNow(NOW);

    const user = await provisionUser({ username: ' Ada.L ', password: 'test-password', fullName: 'Ada Lovelace' });

    expect(user.username).toBe('ada.l');
    expect(user.role).toBe('EMPLOYEE');
    const state = await stateOf(user.id);
    expect(state?.state).toBe('O');
    expect(state?.sinceUnixS).toBe(NOW);
  });

  it('stores a password hash that verifies', async () => {
    const user = await provisionUser({ username: 'grace', password: 'test-password', fullName: 'Grace Hopper' });

    expect(user.passwordHash).not.toBe('test-password');
    await expect(verifyPassword(user, 'test-password')).resolves.toBe(true);
    await expect(verifyPassword(user, 'wrong-password')).resolves.toBe(false);
  });

  it('rejects a taken username', async () => {
    await provisionUser({ username: 'grace', password: 'test-password', fullName: 'Grace Hopper' });

    await expect(
      provisionUser({ username: 'GRACE', password: 'test-password', fullName: 'Someone Else' })
    ).rejects.toBeInstanceOf(ConflictError);
  });

  it('validates input before hashing', async () => {
    await expect(provisionUser({ username: 'x', password: 'test-password', fullName: 'X' })).rejects.toBeInstanceOf(
      ValidationError
    );
    await expect(provisionUser({ username: 'xavier', password: 'short', fullName: 'X' })).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  it('finds users case-insensitively and hides the hash from public views', async () => {
    await provisionUser({ username: 'linus', password: 'test-password', fullName: 'Linus T', role: 'ADMIN' });

    const user = await findByUsername('LINUS');
    expect(user).not.toBeNull();
    if (!user) return;
    const view = toPublicUser(user);
    expect(view).toEqual({
      id: user.id,
      username: 'linus',
      fullName: 'Linus T',
      role: 'ADMIN',
      createdAt: user.createdAt,
    });
    expect('passwordHash' in view).toBe(false);
  });
});
