import type { RequestHandler } from 'express';

import { nextNodesQuerySchema, projectIdParamSchema } from './projects.schema';
import { projectsService } from './projects.service';

export const getNextNodes: RequestHandler<{ id: string }> = async (req, res, next) => {
  try {
    const { id } = projectIdParamSchema.parse(req.params);
    const { limit } = nextNodesQuerySchema.parse(req.query);
    const response = await projectsService.getNextNodes(id, limit);
    res.status(200).json(response);
  } catch (error: unknown) {
    next(error);
  }
};
