import { Router, type Response } from 'express';
import { param } from 'express-validator';
import { AUDIT_ACTIONS } from '../constants/enums.js';
import { asyncHandler, AppError } from '../middleware/errorHandler.js';
import { requireActor } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { auditRecentQuery, idParam, paginationQuery } from '../middleware/validators.js';
import type { AuditPage, AuditService } from '../services/audit.service.js';
import { intParam, oneOf, pageOf, queryOf, str } from './input.js';

const sendPage = (res: Response, page: AuditPage) =>
  res.json({ success: true, data: page.entries, pagination: page.pagination });

export function createAuditRouter(audit: AuditService): Router {
  const router = Router();

  // Change history for one entity, newest first
  router.get(
    '/entity/:type/:id',
    param('type').isString().trim().notEmpty().withMessage('Entity type is required'),
    idParam(),
    paginationQuery,
    validate,
    asyncHandler(async (req, res) => {
      sendPage(res, await audit.history(req.params.type, intParam(req), pageOf(req)));
    }),
  );

  router.get(
    '/actor/:id',
    idParam(),
    paginationQuery,
    validate,
    asyncHandler(async (req, res) => {
      sendPage(res, await audit.activity(intParam(req), pageOf(req)));
    }),
  );

  router.get(
    '/recent',
    auditRecentQuery,
    validate,
    asyncHandler(async (req, res) => {
      const query = queryOf(req);
      sendPage(
        res,
        await audit.recent(pageOf(req), {
          action: oneOf(AUDIT_ACTIONS, query, 'action'),
          entityType: str(query, 'entityType'),
        }),
      );
    }),
  );

  router.get(
    '/me',
    requireActor,
    paginationQuery,
    validate,
    asyncHandler(async (req, res) => {
      if (req.actorId === undefined) throw new AppError('Authentication required', 401, 'UNAUTHENTICATED');
      sendPage(res, await audit.activity(req.actorId, pageOf(req)));
    }),
  );

  return router;
}
