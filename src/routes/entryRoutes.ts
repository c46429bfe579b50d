// Entry Routes
// Purpose: Administrative ledger corrections and on-demand disqualification

import { Router } from 'express';
import { editEntry, deleteEntry, disqualifyOpenSessions } from '../controllers/entryController';
import { authenticate, authorize } from '../middlewares/auth';

const router = Router();

router.use(authenticate, authorize('ADMIN'));

router.post('/disqualify', disqualifyOpenSessions);
router.put('/:eid', editEntry);
router.delete('/:eid', deleteEntry);

export default router;
