// Attendance Routes
// Purpose: Clock in/out, status, entries and balances for the calling user

import { Router } from 'express';
import { clockIn, clockOut, getStatus, getOwnEntries, getDayDelta, getMonthDelta } from '../controllers/attendanceController';
import { authenticate } from '../middlewares/auth';

const router = Router();

// All routes require authentication
router.use(authenticate);

router.put('/clock/in', clockIn);
router.put('/clock/out', clockOut);
router.get('/status', getStatus);
router.get('/entries', getOwnEntries);
router.get('/delta/day', getDayDelta);
router.get('/delta/month', getMonthDelta);

export default router;
