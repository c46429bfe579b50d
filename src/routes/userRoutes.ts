// User Routes
// Purpose: Admin views of other users' ledgers

import { Router } from 'express';
import { getUserEntries } from '../controllers/entryController';
import { authenticate, authorize } from '../middlewares/auth';

const router = Router();

router.use(authenticate, authorize('ADMIN'));

router.get('/:uid/entries', getUserEntries);

export default router;
