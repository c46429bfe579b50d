// Balance Service
// Purpose: Worked-time delta (actual minus expected seconds) over day and month windows

import { addDays, isWeekend, startOfDay, startOfMonth } from 'date-fns';
import { TZDate } from '@date-fns/tz';
import { LessThan, MoreThan } from 'typeorm';
import { AppDataSource } from '../config/database';
import config from '../config/env';
import { Entry } from '../entities/Entry';
import { LookupError } from '../utils/errors';
import { EntryRecord, StateRecord } from '../utils/scan';
import { nowUnix, toUnix } from '../utils/time';
import { scanEntries } from './ledgerService';
import { getUserState } from './transitionService';

export interface DeltaWindow {
  start: TZDate;
  end: TZDate;
}

export function dayWindow(date: TZDate): DeltaWindow {
  const start = startOfDay(date);
  return { start, end: startOfDay(addDays(date, 1)) };
}

/**
 * Month-to-date: from the first of the month up to the end of `date`'s day
 */
export function monthToDateWindow(date: TZDate): DeltaWindow {
  return { start: startOfMonth(date), end: startOfDay(addDays(date, 1)) };
}

/**
 * Expected seconds for a window: a full workday for every Monday-Friday
 * calendar day whose start falls inside it. Holidays are not considered.
 */
export function expectedSeconds(window: DeltaWindow, workdayHours = config.WORKDAY_HOURS): number {
  let weekdays = 0;
  for (let day = window.start; day.getTime() < window.end.getTime(); day = addDays(day, 1)) {
    if (!isWeekend(day)) {
      weekdays += 1;
    }
  }
  return weekdays * workdayHours * 60 * 60;
}

/**
 * Seconds worked by entries lying strictly inside the window
 */
export function workedSeconds(entries: EntryRecord[], window: DeltaWindow): number {
  const start = toUnix(window.start);
  const end = toUnix(window.end);
  return entries
    .filter(entry => entry.valid && entry.from > start && entry.to < end)
    .reduce((sum, entry) => sum + (entry.to - entry.from), 0);
}

/**
 * Contribution of a session that is still open, evaluated at read time
 */
export function openSessionSeconds(state: StateRecord, now: number): number {
  return state.state === 'I' ? now - state.since : 0;
}

/**
 * Compute the delta for a window. The entry read and the state read are not
 * taken from one snapshot, so a session closing in between can be counted
 * twice or not at all.
 */
export async function computeDelta(uid: number, window: DeltaWindow): Promise<number> {
  let entries: EntryRecord[];
  try {
    const rows = await AppDataSource.getRepository(Entry).find({
      where: {
        uid,
        valid: true,
        fromUnixS: MoreThan(toUnix(window.start)),
        toUnixS: LessThan(toUnix(window.end)),
      },
    });
    entries = scanEntries(rows);
  } catch (error) {
    throw new LookupError(`Failed to read entries for user ${uid}`, { cause: error });
  }

  const state = await getUserState(uid);

  return workedSeconds(entries, window) - expectedSeconds(window) + openSessionSeconds(state, nowUnix());
}

export async function getDeltaForDay(uid: number, date: TZDate): Promise<number> {
  return computeDelta(uid, dayWindow(date));
}

export async function getDeltaForMonth(uid: number, date: TZDate): Promise<number> {
  return computeDelta(uid, monthToDateWindow(date));
}

export default { getDeltaForDay, getDeltaForMonth };
