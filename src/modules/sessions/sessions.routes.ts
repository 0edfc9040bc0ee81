import { Router } from 'express';

import { createSession, getSession, postExit, postTurn } from './sessions.controller';

const router = Router();

router.post('/', createSession);
router.get('/:id', getSession);
router.post('/:id/turn', postTurn);
router.post('/:id/exit', postExit);

export { router as sessionsRoutes };
