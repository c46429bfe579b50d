// Row Scanning
// Purpose: Check stored rows against the shape their tables promise
// SQLite does not enforce column types, so a hand-edited row can hold anything.

import { UserState, ClockState } from '../entities/UserState';
import { Entry } from '../entities/Entry';
import { ScanError } from './errors';

export interface StateRecord {
  uid: number;
  state: ClockState;
  since: number;
}

export interface EntryRecord {
  eid: number;
  uid: number;
  from: number;
  to: number;
  valid: boolean;
}

export function scanUserState(row: UserState): StateRecord {
  const state: unknown = row.state;
  if (state !== 'I' && state !== 'O') {
    throw new ScanError('user_states', `uid ${row.uid} has unknown state ${JSON.stringify(state)}`);
  }
  if (!Number.isSafeInteger(row.sinceUnixS)) {
    throw new ScanError('user_states', `uid ${row.uid} has non-integer since_unix_s`);
  }
  return { uid: row.uid, state, since: row.sinceUnixS };
}

export function scanEntry(row: Entry): EntryRecord {
  if (!Number.isSafeInteger(row.fromUnixS) || !Number.isSafeInteger(row.toUnixS)) {
    throw new ScanError('entries', `eid ${row.eid} has non-integer bounds`);
  }
  return {
    eid: row.eid,
    uid: row.uid,
    from: row.fromUnixS,
    to: row.toUnixS,
    valid: row.valid,
  };
}
