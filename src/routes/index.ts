// Main Routes Index
// Purpose: Aggregate all route modules

import { Router } from 'express';
import authRoutes from './authRoutes';
import attendanceRoutes from './attendanceRoutes';
import entryRoutes from './entryRoutes';
import userRoutes from './userRoutes';

const router = Router();

// Mount route modules
router.use('/auth', authRoutes);
router.use('/u', attendanceRoutes);
router.use('/entries', entryRoutes);
router.use('/users', userRoutes);

export default router;
