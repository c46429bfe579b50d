// Create User Script
// Purpose: Provision an account and its clocked-out state row
// Run: npm run user:create -- <username> <password> "<full name>" [ADMIN|EMPLOYEE]

import 'reflect-metadata';
import { closeDatabase, initializeDatabase } from '../config/database';
import { provisionUser } from '../services/userService';
import { Role } from '../entities/User';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

function parseRole(value: string | undefined): Role {
  if (value === undefined || value === 'EMPLOYEE') {
    return 'EMPLOYEE';
  }
  if (value === 'ADMIN') {
    return 'ADMIN';
  }
  throw new Error(`Unknown role "${value}", expected ADMIN or EMPLOYEE`);
}

async function createUser(): Promise<void> {
  const [username, password, fullName, role] = process.argv.slice(2);

  if (!username || !password || !fullName) {
    console.log('Usage: npm run user:create -- <username> <password> "<full name>" [ADMIN|EMPLOYEE]');
    process.exitCode = 1;
    return;
  }

  try {
    await initializeDatabase();
    const user = await provisionUser({ username, password, fullName, role: parseRole(role) });

    console.log('\n========================================');
    console.log('  User created successfully!');
    console.log('========================================');
    console.log(`  Id: ${user.id}`);
    console.log(`  Username: ${user.username}`);
    console.log(`  Role: ${user.role}`);
    console.log('========================================\n');
  } catch (error) {
    logger.error('Error creating user', { error: errorMessage(error) });
    process.exitCode = 1;
  } finally {
    await closeDatabase();
  }
}

void createUser();
