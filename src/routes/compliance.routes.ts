import { Router, type Request } from 'express';
import { COMPLIANCE_STATUSES, FRAMEWORKS, type Framework } from '../constants/enums.js';
import { asyncHandler, AppError } from '../middleware/errorHandler.js';
import { auditContext, requireActor } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import {
  coverageQuery,
  createActionMappingValidator,
  createMappingValidator,
  frameworkParam,
  idParam,
  principlesQuery,
  updateMappingValidator,
} from '../middleware/validators.js';
import type { ComplianceService } from '../services/compliance.service.js';
import { bodyOf, bool, int, intParam, nullableOneOf, nullableStr, oneOf, queryOf, str } from './input.js';

const frameworkOf = (req: Request): Framework => {
  const framework = oneOf(FRAMEWORKS, req.params, 'framework');
  if (framework === undefined) throw new AppError(`Unknown framework: ${req.params.framework}`, 404, 'NOT_FOUND');
  return framework;
};

export function createComplianceRouter(compliance: ComplianceService): Router {
  // Every route below is scoped to one framework: /api/compliance/nsm/... or /api/compliance/ekom/...
  const router = Router();

  // ============================================
  // PRINCIPLES
  // ============================================

  router.get(
    '/:framework/principles',
    frameworkParam,
    principlesQuery,
    validate,
    asyncHandler(async (req, res) => {
      const query = queryOf(req);
      const data = await compliance.listPrinciples(frameworkOf(req), {
        activeOnly: bool(query, 'activeOnly'),
        asOf: str(query, 'asOf'),
      });
      res.json({ success: true, data });
    }),
  );

  router.get(
    '/:framework/principles/:id',
    frameworkParam,
    idParam(),
    validate,
    asyncHandler(async (req, res) => {
      const data = await compliance.getPrinciple(frameworkOf(req), intParam(req));
      res.json({ success: true, data });
    }),
  );

  // ============================================
  // COVERAGE
  // ============================================

  router.get(
    '/:framework/coverage',
    frameworkParam,
    coverageQuery,
    validate,
    asyncHandler(async (req, res) => {
      const query = queryOf(req);
      const data = await compliance.getCoverage(frameworkOf(req), {
        mode: oneOf(['active', 'all'] as const, query, 'mode'),
        projectId: int(query, 'projectId'),
        asOf: str(query, 'asOf'),
      });
      res.json({ success: true, data });
    }),
  );

  router.get(
    '/:framework/gaps',
    frameworkParam,
    coverageQuery,
    validate,
    asyncHandler(async (req, res) => {
      const query = queryOf(req);
      const data = await compliance.getGaps(frameworkOf(req), {
        projectId: int(query, 'projectId'),
        asOf: str(query, 'asOf'),
      });
      res.json({ success: true, data });
    }),
  );

  // ============================================
  // RISK MAPPINGS
  // ============================================

  router.get(
    '/:framework/mappings/risk/:riskId',
    frameworkParam,
    idParam('riskId'),
    validate,
    asyncHandler(async (req, res) => {
      const data = await compliance.listRiskMappings(frameworkOf(req), intParam(req, 'riskId'));
      res.json({ success: true, data });
    }),
  );

  router.post(
    '/:framework/mappings',
    requireActor,
    frameworkParam,
    createMappingValidator,
    validate,
    asyncHandler(async (req, res) => {
      const body = bodyOf(req);
      const data = await compliance.addRiskMapping(
        frameworkOf(req),
        {
          riskId: int(body, 'riskId') ?? 0,
          principleId: int(body, 'principleId') ?? 0,
          complianceStatus: nullableOneOf(COMPLIANCE_STATUSES, body, 'complianceStatus'),
          notes: nullableStr(body, 'notes'),
        },
        auditContext(req),
      );
      res.status(201).json({ success: true, data });
    }),
  );

  router.patch(
    '/:framework/mappings/:id',
    requireActor,
    frameworkParam,
    idParam(),
    updateMappingValidator,
    validate,
    asyncHandler(async (req, res) => {
      const body = bodyOf(req);
      const data = await compliance.updateRiskMapping(
        frameworkOf(req),
        intParam(req),
        {
          complianceStatus: nullableOneOf(COMPLIANCE_STATUSES, body, 'complianceStatus'),
          notes: nullableStr(body, 'notes'),
        },
        auditContext(req),
      );
      res.json({ success: true, data });
    }),
  );

  router.delete(
    '/:framework/mappings/:id',
    requireActor,
    frameworkParam,
    idParam(),
    validate,
    asyncHandler(async (req, res) => {
      await compliance.removeRiskMapping(frameworkOf(req), intParam(req), auditContext(req));
      res.json({ success: true, message: 'Mapping removed' });
    }),
  );

  // ============================================
  // ACTION MAPPINGS
  // ============================================

  router.get(
    '/:framework/action-mappings/action/:actionId',
    frameworkParam,
    idParam('actionId'),
    validate,
    asyncHandler(async (req, res) => {
      const data = await compliance.listActionMappings(frameworkOf(req), intParam(req, 'actionId'));
      res.json({ success: true, data });
    }),
  );

  router.post(
    '/:framework/action-mappings',
    requireActor,
    frameworkParam,
    createActionMappingValidator,
    validate,
    asyncHandler(async (req, res) => {
      const body = bodyOf(req);
      const data = await compliance.addActionMapping(
        frameworkOf(req),
        {
          actionId: int(body, 'actionId') ?? 0,
          principleId: int(body, 'principleId') ?? 0,
          notes: nullableStr(body, 'notes'),
        },
        auditContext(req),
      );
      res.status(201).json({ success: true, data });
    }),
  );

  router.delete(
    '/:framework/action-mappings/:id',
    requireActor,
    frameworkParam,
    idParam(),
    validate,
    asyncHandler(async (req, res) => {
      await compliance.removeActionMapping(frameworkOf(req), intParam(req), auditContext(req));
      res.json({ success: true, message: 'Action mapping removed' });
    }),
  );

  return router;
}
