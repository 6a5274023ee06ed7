import { Router } from 'express';
import { asyncHandler } from '../middleware/errorHandler.js';
import { auditContext, requireActor } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { createProjectValidator, idParam } from '../middleware/validators.js';
import type { ProjectService } from '../services/project.service.js';
import { bodyOf, intParam, str } from './input.js';

export function createProjectRouter(projects: ProjectService): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      const data = await projects.listProjects();
      res.json({ success: true, data });
    }),
  );

  router.get(
    '/:id',
    idParam(),
    validate,
    asyncHandler(async (req, res) => {
      const data = await projects.getProject(intParam(req));
      res.json({ success: true, data });
    }),
  );

  router.post(
    '/',
    requireActor,
    createProjectValidator,
    validate,
    asyncHandler(async (req, res) => {
      const data = await projects.createProject(str(bodyOf(req), 'name') ?? '', auditContext(req));
      res.status(201).json({ success: true, data });
    }),
  );

  return router;
}
