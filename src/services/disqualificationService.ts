import cron, { ScheduledTask } from 'node-cron';
import { AppDataSource, withWriteLock } from '../config/database';
import config from '../config/env';
import { Entry } from '../entities/Entry';
import { UserState } from '../entities/UserState';
import { logger } from '../utils/logger';
import { LookupError, ScanError, errorMessage } from '../utils/errors';
import { scanUserState, StateRecord } from '../utils/scan';
import { nowUnix } from '../utils/time';

export interface SweepSummary {
  sweptAt: number;
  // invalid entries written
  disqualified: number;
  // uids whose entry could not be written
  failed: number[];
  // rows skipped as malformed
  skipped: number;
  // state rows flipped to 'O'
  clockedOut: number;
}

/**
 * Closes every open session as an invalid entry, then clocks those users out.
 *
 * The inserts and the bulk state update are separate statements, not one
 * transaction: a crash between them leaves disqualified users still 'I', and a
 * user clocking in between them is clocked out without an entry.
 * Both steps use the same `sweptAt` timestamp. Each write waits its turn
 * behind live transitions, and transitions can run between the writes.
 */
export class DisqualificationService {
  private static task: ScheduledTask | null = null;

  /**
   * Schedule the sweep on DISQUALIFY_CRON
   */
  public static init(): void {
    if (this.task) {
      return;
    }

    this.task = cron.schedule(config.DISQUALIFY_CRON, async () => {
      logger.info('Running scheduled disqualification sweep...');
      try {
        await this.runSweep();
      } catch (error) {
        logger.error('Scheduled disqualification sweep failed', { error: errorMessage(error) });
      }
    });

    logger.info('Disqualification sweep scheduled', { cron: config.DISQUALIFY_CRON });
  }

  public static stop(): void {
    this.task?.stop();
    this.task = null;
  }

  public static async runSweep(): Promise<SweepSummary> {
    const sweptAt = nowUnix();
    const states = AppDataSource.getRepository(UserState);
    const entries = AppDataSource.getRepository(Entry);

    let rows: UserState[];
    try {
      rows = await states.find({ where: { state: 'I' }, order: { uid: 'ASC' } });
    } catch (error) {
      throw new LookupError('Failed to select users to disqualify', { cause: error });
    }

    const summary: SweepSummary = { sweptAt, disqualified: 0, failed: [], skipped: 0, clockedOut: 0 };

    for (const row of rows) {
      let open: StateRecord;
      try {
        open = scanUserState(row);
      } catch (error) {
        if (!(error instanceof ScanError)) {
          throw error;
        }
        logger.warn('Skipping malformed user state', { uid: row.uid, error: error.message });
        summary.skipped += 1;
        continue;
      }

      try {
        await withWriteLock(() =>
          entries.insert({ uid: open.uid, fromUnixS: open.since, toUnixS: sweptAt, valid: false })
        );
        summary.disqualified += 1;
        logger.attendance('disqualified', open.uid, { from: open.since, to: sweptAt });
      } catch (error) {
        summary.failed.push(open.uid);
        logger.error('Failed to add disqualifying entry', { uid: open.uid, error: errorMessage(error) });
      }
    }

    // Runs even when some inserts failed
    try {
      const result = await withWriteLock(() => states.update({ state: 'I' }, { state: 'O', sinceUnixS: sweptAt }));
      summary.clockedOut = result.affected ?? 0;
    } catch (error) {
      logger.error('Failed to clock out disqualified users', { error: errorMessage(error) });
    }

    logger.info('Disqualification sweep finished', { ...summary });
    return summary;
  }
}

export function runDisqualificationSweep(): Promise<SweepSummary> {
  return DisqualificationService.runSweep();
}

export default DisqualificationService;
