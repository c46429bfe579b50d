import { afterAll, beforeEach, describe, expect, it } from '@jest/globals';
import { TZDate } from '@date-fns/tz';
import { closeDatabase } from '../../src/config/database';
import {
  dayWindow,
  expectedSeconds,
  getDeltaForDay,
  getDeltaForMonth,
  monthToDateWindow,
  openSessionSeconds,
  workedSeconds,
} from '../../src/services/balanceService';
import { LookupError } from '../../src/utils/errors';
import { resetDatabase, seedEntry, seedState, setNow } from '../helpers/db';

const HOUR = 60 * 60;
const WORKDAY = 8 * HOUR;

const MAY_1 = 1714521600; // Wed 2024-05-01 00:00 UTC
const MAY_2_09 = 1714640400;
const MAY_4 = 1714780800; // Sat
const MAY_6 = 1714953600; // Mon
const MAY_6_09 = 1714986000;
const MAY_6_17 = 1715014800;
const MAY_7 = 1715040000; // Tue
const MAY_7_09 = 1715072400;

function utcDate(year: number, month: number, day: number): TZDate {
  return new TZDate(year, month - 1, day, 'UTC');
}

describe('balanceService', () => {
  describe('windows', () => {
    it('spans one local day', () => {
      const window = dayWindow(utcDate(2024, 5, 6));
      expect(window.start.getTime()).toBe(MAY_6 * 1000);
      expect(window.end.getTime()).toBe(MAY_7 * 1000);
    });

    it('runs month-to-date up to the end of the given day', () => {
      const window = monthToDateWindow(utcDate(2024, 5, 6));
      expect(window.start.getTime()).toBe(MAY_1 * 1000);
      expect(window.end.getTime()).toBe(MAY_7 * 1000);
    });

    it('follows the time zone of the date', () => {
      const window = dayWindow(new TZDate(2024, 4, 6, 'Asia/Tokyo'));
      expect(window.start.getTime()).toBe(1714921200 * 1000);
      expect(window.end.getTime()).toBe(1715007600 * 1000);
    });
  });

  describe('expectedSeconds', () => {
    it('expects a workday on a weekday and nothing on a weekend', () => {
      expect(expectedSeconds(dayWindow(utcDate(2024, 5, 6)))).toBe(WORKDAY);
      expect(expectedSeconds(dayWindow(utcDate(2024, 5, 4)))).toBe(0);
      expect(expectedSeconds(dayWindow(utcDate(2024, 5, 5)))).toBe(0);
    });

    it('counts only weekdays in a month-to-date window', () => {
      // May 1-3 and May 6 are weekdays
      expect(expectedSeconds(monthToDateWindow(utcDate(2024, 5, 6)))).toBe(4 * WORKDAY);
    });

    it('counts calendar days across a daylight saving change', () => {
      // March 2024 has 21 weekdays; Berlin springs forward on Sunday the 31st
      expect(expectedSeconds(monthToDateWindow(new TZDate(2024, 2, 31, 'Europe/Berlin')))).toBe(21 * WORKDAY);
    });

    it('takes the workday length as a parameter', () => {
      expect(expectedSeconds(dayWindow(utcDate(2024, 5, 6)), 6)).toBe(6 * HOUR);
    });
  });

  describe('workedSeconds', () => {
    const window = dayWindow(utcDate(2024, 5, 6));

    it('sums valid entries strictly inside the window', () => {
      const entries = [
        { eid: 1, uid: 1, from: MAY_6_09, to: MAY_6_09 + 2 * HOUR, valid: true },
        { eid: 2, uid: 1, from: MAY_6_17, to: MAY_6_17 + HOUR, valid: true },
        { eid: 3, uid: 1, from: MAY_6_09, to: MAY_6_17, valid: false },
      ];
      expect(workedSeconds(entries, window)).toBe(3 * HOUR);
    });

    it('drops entries touching either edge', () => {
      const entries = [
        { eid: 1, uid: 1, from: MAY_6, to: MAY_6 + HOUR, valid: true },
        { eid: 2, uid: 1, from: MAY_7 - HOUR, to: MAY_7, valid: true },
        { eid: 3, uid: 1, from: MAY_6 - 1, to: MAY_6 + HOUR, valid: true },
      ];
      expect(workedSeconds(entries, window)).toBe(0);
    });
  });

  describe('openSessionSeconds', () => {
    it('counts an open session up to now', () => {
      expect(openSessionSeconds({ uid: 1, state: 'I', since: MAY_6_09 }, MAY_6_09 + 90)).toBe(90);
    });

    it('is zero when clocked out', () => {
      expect(openSessionSeconds({ uid: 1, state: 'O', since: MAY_6_09 }, MAY_6_17)).toBe(0);
    });
  });

  describe('with stored entries', () => {
    beforeEach(async () => {
      await resetDatabase();
    });

    afterAll(async () => {
      await closeDatabase();
    });

    it('is -8h for an empty weekday', async () => {
      await seedState(1, 'O', MAY_1);
      await expect(getDeltaForDay(1, utcDate(2024, 5, 6))).resolves.toBe(-WORKDAY);
    });

    it('is 0 for an empty weekend day', async () => {
      await seedState(1, 'O', MAY_1);
      await expect(getDeltaForDay(1, utcDate(2024, 5, 4))).resolves.toBe(0);
    });

    it('is 0 for a weekday with exactly eight worked hours', async () => {
      await seedState(1, 'O', MAY_6_17);
      await seedEntry(1, MAY_6_09, MAY_6_17);
      await expect(getDeltaForDay(1, utcDate(2024, 5, 6))).resolves.toBe(0);
    });

    it('ignores entries that reach the window edges and invalid entries', async () => {
      await seedState(1, 'O', MAY_7);
      await seedEntry(1, MAY_6, MAY_6 + HOUR);
      await seedEntry(1, MAY_7 - HOUR, MAY_7);
      await seedEntry(1, MAY_6_09, MAY_6_17, false);
      await seedEntry(1, MAY_6 + 1, MAY_6 + 1 + HOUR);
      await expect(getDeltaForDay(1, utcDate(2024, 5, 6))).resolves.toBe(HOUR - WORKDAY);
    });

    it('ignores other users entries', async () => {
      await seedState(1, 'O', MAY_1);
      await seedState(2, 'O', MAY_1);
      await seedEntry(2, MAY_6_09, MAY_6_17);
      await expect(getDeltaForDay(1, utcDate(2024, 5, 6))).resolves.toBe(-WORKDAY);
    });

    it('adds the open session as a live amount', async () => {
      await seedState(1, 'I', MAY_6_09);
      setNow(MAY_6_09 + HOUR);
      await expect(getDeltaForDay(1, utcDate(2024, 5, 6))).resolves.toBe(HOUR - WORKDAY);

      setNow(MAY_6_09 + 2 * HOUR);
      await expect(getDeltaForDay(1, utcDate(2024, 5, 6))).resolves.toBe(2 * HOUR - WORKDAY);
    });

    it('uses local day boundaries of the requested zone', async () => {
      await seedState(1, 'O', MAY_1);
      // 2024-05-05 16:00-20:00 UTC is 2024-05-06 01:00-05:00 in Tokyo
      await seedEntry(1, 1714924800, 1714939200);

      await expect(getDeltaForDay(1, new TZDate(2024, 4, 6, 'Asia/Tokyo'))).resolves.toBe(4 * HOUR - WORKDAY);
      await expect(getDeltaForDay(1, utcDate(2024, 5, 6))).resolves.toBe(-WORKDAY);
    });

    it('computes month-to-date balances', async () => {
      await seedState(1, 'O', MAY_7_09 + HOUR);
      await seedEntry(1, MAY_2_09, MAY_2_09 + WORKDAY);
      await seedEntry(1, MAY_6_09, MAY_6_17);
      // after the window
      await seedEntry(1, MAY_7_09, MAY_7_09 + HOUR);

      await expect(getDeltaForMonth(1, utcDate(2024, 5, 6))).resolves.toBe(2 * WORKDAY - 4 * WORKDAY);
    });

    it('is one workday short on the 1st when it is a weekday', async () => {
      await seedState(1, 'O', MAY_1);
      await expect(getDeltaForMonth(1, utcDate(2024, 5, 1))).resolves.toBe(-WORKDAY);
    });

    it('is 0 on the 1st when it falls on a weekend', async () => {
      await seedState(1, 'O', MAY_4);
      await expect(getDeltaForMonth(1, utcDate(2024, 6, 1))).resolves.toBe(0);
    });

    it('fails with a LookupError without a state row', async () => {
      await expect(getDeltaForDay(7, utcDate(2024, 5, 6))).rejects.toBeInstanceOf(LookupError);
    });
  });
});
