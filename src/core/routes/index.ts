import { Router } from 'express';

import { healthRoutes } from '../../modules/health/health.routes';
import { projectsRoutes } from '../../modules/projects/projects.routes';
import { sessionsRoutes } from '../../modules/sessions/sessions.routes';

const router = Router();

router.use('/health', healthRoutes);
router.use('/sessions', sessionsRoutes);
router.use('/projects', projectsRoutes);

export { router as apiRoutes };
