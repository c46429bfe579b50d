// Transition Service
// Purpose: Clock users in and out, keeping user_states and entries consistent

import { EntityManager, QueryRunner } from 'typeorm';
import { AppDataSource, withWriteLock } from '../config/database';
import { UserState, ClockState } from '../entities/UserState';
import { Entry } from '../entities/Entry';
import { logger } from '../utils/logger';
import { LookupError, TransactionError, errorMessage } from '../utils/errors';
import { scanUserState, StateRecord } from '../utils/scan';
import { nowUnix } from '../utils/time';

export interface TransitionResult {
  // false when the user was already in the requested state
  changed: boolean;
  state: ClockState;
  since: number;
  // entry written by a clock-out
  entryId?: number;
}

type MarkStep = (step: string) => void;

// Commit when `changed`, roll back otherwise
type TransitionWork = (manager: EntityManager, markStep: MarkStep) => Promise<TransitionResult>;

async function rollback(queryRunner: QueryRunner, uid: number): Promise<void> {
  if (!queryRunner.isTransactionActive) {
    return;
  }
  try {
    await queryRunner.rollbackTransaction();
  } catch (error) {
    logger.error('Failed to roll back transaction', { uid, error: errorMessage(error) });
  }
}

/**
 * Run one transition inside a transaction, queued behind any other write.
 * Any failure after begin rolls back and surfaces as a TransactionError
 * naming the step that failed.
 */
async function runTransition(uid: number, work: TransitionWork): Promise<TransitionResult> {
  return withWriteLock(async () => {
    const queryRunner = AppDataSource.createQueryRunner();
    let step = 'begin transaction';
    const markStep: MarkStep = next => {
      step = next;
    };

    try {
      await queryRunner.startTransaction();
      step = 'read user state';
      const result = await work(queryRunner.manager, markStep);

      if (!result.changed) {
        await rollback(queryRunner, uid);
        return result;
      }

      step = 'commit transaction';
      await queryRunner.commitTransaction();
      return result;
    } catch (error) {
      await rollback(queryRunner, uid);
      throw new TransactionError(step, uid, error);
    } finally {
      await queryRunner.release();
    }
  });
}

async function readState(manager: EntityManager, uid: number): Promise<StateRecord> {
  const row = await manager.findOne(UserState, { where: { uid } });
  if (!row) {
    throw new LookupError(`No user_states row for user ${uid}`);
  }
  return scanUserState(row);
}

/**
 * Clock a user in. A user already clocked in is left untouched.
 */
export async function clockIn(uid: number): Promise<TransitionResult> {
  const result = await runTransition(uid, async (manager, markStep) => {
    const current = await readState(manager, uid);
    if (current.state === 'I') {
      return { changed: false, state: 'I', since: current.since };
    }

    const now = nowUnix();
    markStep('update user state');
    await manager.update(UserState, { uid }, { state: 'I', sinceUnixS: now });
    return { changed: true, state: 'I', since: now };
  });

  logger.attendance(result.changed ? 'clock_in' : 'already_in', uid, { since: result.since });
  return result;
}

/**
 * Clock a user out, closing the open session as a valid entry.
 * The entry's end and the new `since` share one timestamp.
 */
export async function clockOut(uid: number): Promise<TransitionResult> {
  const result = await runTransition(uid, async (manager, markStep) => {
    const current = await readState(manager, uid);
    if (current.state === 'O') {
      return { changed: false, state: 'O', since: current.since };
    }

    const now = nowUnix();
    markStep('insert entry');
    const entry = await manager.save(
      manager.create(Entry, { uid, fromUnixS: current.since, toUnixS: now, valid: true })
    );

    markStep('update user state');
    await manager.update(UserState, { uid }, { state: 'O', sinceUnixS: now });
    return { changed: true, state: 'O', since: now, entryId: entry.eid };
  });

  logger.attendance(result.changed ? 'clock_out' : 'already_out', uid, {
    since: result.since,
    ...(result.entryId !== undefined && { entryId: result.entryId }),
  });
  return result;
}

/**
 * Current clock state of a user, read outside any transaction
 */
export async function getUserState(uid: number): Promise<StateRecord> {
  let row: UserState | null;
  try {
    row = await AppDataSource.getRepository(UserState).findOne({ where: { uid } });
  } catch (error) {
    throw new LookupError(`Failed to read state for user ${uid}`, { cause: error });
  }
  if (!row) {
    throw new LookupError(`No user_states row for user ${uid}`);
  }
  return scanUserState(row);
}

export default { clockIn, clockOut, getUserState };
