import { Router } from 'express';

import { getNextNodes } from './projects.controller';

const router = Router();

router.get('/:id/next-nodes', getNextNodes);

export { router as projectsRoutes };
