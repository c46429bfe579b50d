// Ledger Service
// Purpose: Read the entry ledger grouped by day, and administrative corrections

import { startOfDay } from 'date-fns';
import { AppDataSource, withWriteLock } from '../config/database';
import { Entry } from '../entities/Entry';
import { logger } from '../utils/logger';
import { LookupError, ScanError, ValidationError, errorMessage } from '../utils/errors';
import { scanEntry, EntryRecord } from '../utils/scan';
import { fromUnix, toUnix } from '../utils/time';

export type EntryView = Omit<EntryRecord, 'uid'>;

// Local start-of-day (Unix seconds) -> entries that started that day
export type EntriesByDay = Map<number, EntryView[]>;

function toView(record: EntryRecord): EntryView {
  return { eid: record.eid, from: record.from, to: record.to, valid: record.valid };
}

/**
 * Scan rows, logging and skipping malformed ones
 */
export function scanEntries(rows: Entry[]): EntryRecord[] {
  const records: EntryRecord[] = [];
  for (const row of rows) {
    try {
      records.push(scanEntry(row));
    } catch (error) {
      if (!(error instanceof ScanError)) {
        throw error;
      }
      logger.warn('Skipping malformed entry', { eid: row.eid, error: error.message });
    }
  }
  return records;
}

/**
 * Group entries by the local calendar day of their start.
 * An entry crossing midnight belongs wholly to the day it began.
 */
export function groupByDay(records: EntryRecord[], timeZone: string): EntriesByDay {
  const days: EntriesByDay = new Map();
  for (const record of records) {
    const key = toUnix(startOfDay(fromUnix(record.from, timeZone)));
    const bucket = days.get(key);
    if (bucket) {
      bucket.push(toView(record));
    } else {
      days.set(key, [toView(record)]);
    }
  }
  return days;
}

/**
 * List all of a user's entries, valid or not, grouped by day
 */
export async function listEntries(uid: number, timeZone: string): Promise<EntriesByDay> {
  let rows: Entry[];
  try {
    rows = await AppDataSource.getRepository(Entry).find({
      where: { uid },
      order: { fromUnixS: 'ASC', eid: 'ASC' },
    });
  } catch (error) {
    throw new LookupError(`Failed to list entries for user ${uid}`, { cause: error });
  }

  return groupByDay(scanEntries(rows), timeZone);
}

/**
 * Overwrite an entry's bounds. Administrative override: the bounds are not
 * checked against each other or against the user's state.
 */
export async function editEntry(eid: number, from: number, to: number): Promise<EntryView> {
  if (!Number.isSafeInteger(from) || !Number.isSafeInteger(to)) {
    throw new ValidationError('Entry bounds must be integer Unix seconds');
  }

  const repository = AppDataSource.getRepository(Entry);
  const entry = await withWriteLock(async () => {
    const found = await repository.findOne({ where: { eid } });
    if (!found) {
      throw new LookupError(`Entry ${eid} not found`);
    }

    found.fromUnixS = from;
    found.toUnixS = to;
    try {
      await repository.save(found);
    } catch (error) {
      logger.error('Failed to edit entry', { eid, error: errorMessage(error) });
      throw error;
    }
    return found;
  });

  logger.attendance('entry_edited', entry.uid, { eid, from, to });
  return { eid: entry.eid, from, to, valid: entry.valid };
}

/**
 * Remove an entry from the ledger
 */
export async function deleteEntry(eid: number): Promise<void> {
  const repository = AppDataSource.getRepository(Entry);
  const entry = await withWriteLock(async () => {
    const found = await repository.findOne({ where: { eid } });
    if (!found) {
      throw new LookupError(`Entry ${eid} not found`);
    }
    await repository.delete({ eid });
    return found;
  });
  logger.attendance('entry_deleted', entry.uid, { eid });
}

export default { listEntries, editEntry, deleteEntry };
