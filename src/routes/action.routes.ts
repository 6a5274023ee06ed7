import { Router } from 'express';
import { ACTION_PRIORITIES, ACTION_STATUSES } from '../constants/enums.js';
import { asyncHandler } from '../middleware/errorHandler.js';
import { auditContext, requireActor } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import {
  actionStatusValidator,
  createActionValidator,
  idParam,
  listActionsValidator,
  updateActionValidator,
} from '../middleware/validators.js';
import type { ActionPatch, ActionService } from '../services/action.service.js';
import { bodyOf, int, intList, intParam, nullableInt, nullableStr, oneOf, queryOf, str } from './input.js';

const readAction = (source: Record<string, unknown>): ActionPatch => ({
  title: str(source, 'title'),
  description: nullableStr(source, 'description'),
  status: oneOf(ACTION_STATUSES, source, 'status'),
  priority: oneOf(ACTION_PRIORITIES, source, 'priority'),
  ownerId: nullableInt(source, 'ownerId'),
  dueDate: nullableStr(source, 'dueDate'),
  riskIds: intList(source, 'riskIds'),
});

export function createActionRouter(actions: ActionService): Router {
  const router = Router();

  router.get(
    '/',
    listActionsValidator,
    validate,
    asyncHandler(async (req, res) => {
      const query = queryOf(req);
      const data = await actions.listActions({
        status: oneOf(ACTION_STATUSES, query, 'status'),
        riskId: int(query, 'riskId'),
      });
      res.json({ success: true, data });
    }),
  );

  router.get(
    '/overdue',
    asyncHandler(async (_req, res) => {
      const data = await actions.listOverdue();
      res.json({ success: true, data });
    }),
  );

  router.get(
    '/:id',
    idParam(),
    validate,
    asyncHandler(async (req, res) => {
      const data = await actions.getAction(intParam(req));
      res.json({ success: true, data });
    }),
  );

  router.post(
    '/',
    requireActor,
    createActionValidator,
    validate,
    asyncHandler(async (req, res) => {
      const patch = readAction(bodyOf(req));
      const data = await actions.createAction({ ...patch, title: patch.title ?? '' }, auditContext(req));
      res.status(201).json({ success: true, data });
    }),
  );

  router.put(
    '/:id',
    requireActor,
    idParam(),
    updateActionValidator,
    validate,
    asyncHandler(async (req, res) => {
      const data = await actions.updateAction(intParam(req), readAction(bodyOf(req)), auditContext(req));
      res.json({ success: true, data });
    }),
  );

  router.patch(
    '/:id/status',
    requireActor,
    idParam(),
    actionStatusValidator,
    validate,
    asyncHandler(async (req, res) => {
      const status = oneOf(ACTION_STATUSES, bodyOf(req), 'status') ?? 'planned';
      const data = await actions.changeStatus(intParam(req), status, auditContext(req));
      res.json({ success: true, data });
    }),
  );

  router.delete(
    '/:id',
    requireActor,
    idParam(),
    validate,
    asyncHandler(async (req, res) => {
      await actions.deleteAction(intParam(req), auditContext(req));
      res.json({ success: true, message: 'Action deleted' });
    }),
  );

  return router;
}
