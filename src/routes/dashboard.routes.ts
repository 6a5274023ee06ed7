import { Router } from 'express';
import { asyncHandler } from '../middleware/errorHandler.js';
import { validate } from '../middleware/validate.js';
import { alertsQuery } from '../middleware/validators.js';
import type { DashboardService } from '../services/dashboard.service.js';
import { bool, queryOf } from './input.js';

export function createDashboardRouter(dashboard: DashboardService): Router {
  const router = Router();

  router.get(
    '/summary',
    asyncHandler(async (_req, res) => {
      const data = await dashboard.getSummary();
      res.json({ success: true, data });
    }),
  );

  router.get(
    '/alerts',
    alertsQuery,
    validate,
    asyncHandler(async (req, res) => {
      const query = queryOf(req);
      const data = await dashboard.getAlerts({
        includeInfo: bool(query, 'includeInfo'),
        includeWarning: bool(query, 'includeWarning'),
        includeDanger: bool(query, 'includeDanger'),
      });
      res.json({ success: true, data });
    }),
  );

  router.get(
    '/alerts/count',
    asyncHandler(async (_req, res) => {
      const data = await dashboard.countAlerts();
      res.json({ success: true, data });
    }),
  );

  return router;
}
