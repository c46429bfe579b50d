// Attendance Controller
// Purpose: Clock in/out, status, ledger listing and balances for the calling user

import { Request, Response } from 'express';
import { format } from 'date-fns';
import { TZDate } from '@date-fns/tz';
import {
  clockIn as clockInUser,
  clockOut as clockOutUser,
  getUserState,
  TransitionResult,
} from '../services/transitionService';
import { getDeltaForDay, getDeltaForMonth, dayWindow, monthToDateWindow, DeltaWindow } from '../services/balanceService';
import { listEntries, EntriesByDay } from '../services/ledgerService';
import { currentUserId, queryString, sendError } from '../utils/http';
import { parseCalendarDate, resolveTimeZone, toUnix } from '../utils/time';

function transitionBody(result: TransitionResult) {
  return {
    state: result.state,
    since: result.since,
    ...(result.entryId !== undefined && { entryId: result.entryId }),
  };
}

/**
 * Days in chronological order, each keyed by its local start in Unix seconds
 */
export function daysBody(days: EntriesByDay, timeZone: string) {
  return [...days.entries()]
    .sort(([a], [b]) => a - b)
    .map(([day, entries]) => ({
      day,
      date: format(new TZDate(day * 1000, timeZone), 'yyyy-MM-dd'),
      entries,
    }));
}

function windowBody(window: DeltaWindow) {
  return { start: toUnix(window.start), end: toUnix(window.end) };
}

/**
 * PUT /api/u/clock/in
 * Clock the caller in; a no-op when already clocked in
 */
export async function clockIn(req: Request, res: Response): Promise<void> {
  let uid: number | undefined;
  try {
    uid = currentUserId(req);
    const result = await clockInUser(uid);

    res.json({
      success: true,
      message: result.changed ? 'Clocked in' : 'Already clocked in',
      data: transitionBody(result),
    });
  } catch (error) {
    sendError(res, error, 'Clock-in failed', { uid });
  }
}

/**
 * PUT /api/u/clock/out
 * Clock the caller out, closing the session as a ledger entry
 */
export async function clockOut(req: Request, res: Response): Promise<void> {
  let uid: number | undefined;
  try {
    uid = currentUserId(req);
    const result = await clockOutUser(uid);

    res.json({
      success: true,
      message: result.changed ? 'Clocked out' : 'Already clocked out',
      data: transitionBody(result),
    });
  } catch (error) {
    sendError(res, error, 'Clock-out failed', { uid });
  }
}

/**
 * GET /api/u/status?tz=
 * Current state plus today's and month-to-date balances
 */
export async function getStatus(req: Request, res: Response): Promise<void> {
  let uid: number | undefined;
  try {
    uid = currentUserId(req);
    const timeZone = resolveTimeZone(queryString(req, 'tz'));
    const today = parseCalendarDate(undefined, timeZone);

    const state = await getUserState(uid);
    const [day, month] = await Promise.all([getDeltaForDay(uid, today), getDeltaForMonth(uid, today)]);

    res.json({
      success: true,
      data: {
        state: state.state,
        since: state.since,
        delta: { day, month },
      },
    });
  } catch (error) {
    sendError(res, error, 'Failed to fetch status', { uid });
  }
}

/**
 * GET /api/u/entries?tz=
 * Caller's entries grouped by the local day they started
 */
export async function getOwnEntries(req: Request, res: Response): Promise<void> {
  let uid: number | undefined;
  try {
    uid = currentUserId(req);
    const timeZone = resolveTimeZone(queryString(req, 'tz'));
    const days = await listEntries(uid, timeZone);

    res.json({
      success: true,
      data: { timeZone, days: daysBody(days, timeZone) },
    });
  } catch (error) {
    sendError(res, error, 'Failed to fetch entries', { uid });
  }
}

/**
 * GET /api/u/delta/day?date=YYYY-MM-DD&tz=
 */
export async function getDayDelta(req: Request, res: Response): Promise<void> {
  let uid: number | undefined;
  try {
    uid = currentUserId(req);
    const timeZone = resolveTimeZone(queryString(req, 'tz'));
    const date = parseCalendarDate(queryString(req, 'date'), timeZone);
    const delta = await getDeltaForDay(uid, date);

    res.json({
      success: true,
      data: {
        date: format(date, 'yyyy-MM-dd'),
        timeZone,
        window: windowBody(dayWindow(date)),
        delta,
      },
    });
  } catch (error) {
    sendError(res, error, 'Failed to compute day balance', { uid });
  }
}

/**
 * GET /api/u/delta/month?date=YYYY-MM-DD&tz=
 * Month-to-date balance as of `date`
 */
export async function getMonthDelta(req: Request, res: Response): Promise<void> {
  let uid: number | undefined;
  try {
    uid = currentUserId(req);
    const timeZone = resolveTimeZone(queryString(req, 'tz'));
    const date = parseCalendarDate(queryString(req, 'date'), timeZone);
    const delta = await getDeltaForMonth(uid, date);

    res.json({
      success: true,
      data: {
        date: format(date, 'yyyy-MM-dd'),
        timeZone,
        window: windowBody(monthToDateWindow(date)),
        delta,
      },
    });
  } catch (error) {
    sendError(res, error, 'Failed to compute month balance', { uid });
  }
}

export default { clockIn, clockOut, getStatus, getOwnEntries, getDayDelta, getMonthDelta };
