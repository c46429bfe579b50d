// Entry Controller
// Purpose: Administrative ledger access: listing any user, corrections, sweeps

import { Request, Response } from 'express';
import { listEntries, editEntry as editLedgerEntry, deleteEntry as deleteLedgerEntry } from '../services/ledgerService';
import { runDisqualificationSweep } from '../services/disqualificationService';
import { findById } from '../services/userService';
import { LookupError, ValidationError } from '../utils/errors';
import { parseId, queryString, sendError } from '../utils/http';
import { resolveTimeZone } from '../utils/time';
import { daysBody } from './attendanceController';

function readBound(body: unknown, name: 'from' | 'to'): number {
  if (typeof body !== 'object' || body === null || !(name in body)) {
    throw new ValidationError(`"${name}" is required`);
  }
  const value: unknown = Reflect.get(body, name);
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    throw new ValidationError(`"${name}" must be an integer Unix timestamp`);
  }
  return value;
}

/**
 * GET /api/users/:uid/entries?tz=
 * Any user's entries grouped by day (Admin only)
 */
export async function getUserEntries(req: Request, res: Response): Promise<void> {
  try {
    const uid = parseId(req.params.uid, 'user id');
    const timeZone = resolveTimeZone(queryString(req, 'tz'));

    const user = await findById(uid);
    if (!user) {
      throw new LookupError(`User ${uid} not found`);
    }

    const days = await listEntries(uid, timeZone);
    res.json({
      success: true,
      data: { uid, timeZone, days: daysBody(days, timeZone) },
    });
  } catch (error) {
    sendError(res, error, 'Failed to fetch user entries', { uid: req.params.uid });
  }
}

/**
 * PUT /api/entries/:eid
 * Overwrite an entry's bounds (Admin only). No consistency checks are made.
 */
export async function editEntry(req: Request, res: Response): Promise<void> {
  try {
    const eid = parseId(req.params.eid, 'entry id');
    const from = readBound(req.body, 'from');
    const to = readBound(req.body, 'to');

    const entry = await editLedgerEntry(eid, from, to);
    res.json({
      success: true,
      message: 'Entry updated',
      data: { entry },
    });
  } catch (error) {
    sendError(res, error, 'Failed to edit entry', { eid: req.params.eid });
  }
}

/**
 * DELETE /api/entries/:eid
 * Remove an entry (Admin only)
 */
export async function deleteEntry(req: Request, res: Response): Promise<void> {
  try {
    const eid = parseId(req.params.eid, 'entry id');
    await deleteLedgerEntry(eid);
    res.json({
      success: true,
      message: 'Entry deleted',
    });
  } catch (error) {
    sendError(res, error, 'Failed to delete entry', { eid: req.params.eid });
  }
}

/**
 * POST /api/entries/disqualify
 * Run the disqualification sweep now (Admin only)
 */
export async function disqualifyOpenSessions(req: Request, res: Response): Promise<void> {
  try {
    const summary = await runDisqualificationSweep();
    res.json({
      success: true,
      message: `Disqualified ${summary.disqualified} open session(s)`,
      data: summary,
    });
  } catch (error) {
    sendError(res, error, 'Disqualification sweep failed');
  }
}

export default { getUserEntries, editEntry, deleteEntry, disqualifyOpenSessions };
