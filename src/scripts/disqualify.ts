// Disqualify Script
// Purpose: Run one disqualification sweep and exit
// Run: npm run sweep

import 'reflect-metadata';
import { closeDatabase, initializeDatabase } from '../config/database';
import { runDisqualificationSweep } from '../services/disqualificationService';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

async function main(): Promise<void> {
  try {
    await initializeDatabase();
    const summary = await runDisqualificationSweep();
    console.log(`Disqualified ${summary.disqualified} session(s), clocked out ${summary.clockedOut} user(s)`);
    if (summary.failed.length > 0) {
      console.log(`Failed to write entries for users: ${summary.failed.join(', ')}`);
      process.exitCode = 1;
    }
  } catch (error) {
    logger.error('Disqualification sweep failed', { error: errorMessage(error) });
    process.exitCode = 1;
  } finally {
    await closeDatabase();
  }
}

void main();
