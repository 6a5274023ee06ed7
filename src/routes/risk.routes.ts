import { Router } from 'express';
import { RISK_STATUSES } from '../constants/enums.js';
import { asyncHandler } from '../middleware/errorHandler.js';
import { auditContext, requireActor } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import {
  acceptRiskValidator,
  createRiskValidator,
  idParam,
  listRisksValidator,
  matrixQuery,
  riskExportQuery,
  updateRiskValidator,
} from '../middleware/validators.js';
import type { AuditService } from '../services/audit.service.js';
import type { RiskInput, RiskPatch, RiskService, RiskView } from '../services/risk.service.js';
import { RISK_BANDS } from '../services/riskScoring.service.js';
import { toCsv } from '../utils/csv.js';
import { bodyOf, int, intList, intParam, nullableInt, nullableStr, oneOf, queryOf, str } from './input.js';

const readRisk = (source: Record<string, unknown>): RiskPatch => ({
  title: str(source, 'title'),
  description: nullableStr(source, 'description'),
  projectId: nullableInt(source, 'projectId'),
  ownerId: nullableInt(source, 'ownerId'),
  likelihood: int(source, 'likelihood'),
  consequence: int(source, 'consequence'),
  targetLikelihood: nullableInt(source, 'targetLikelihood'),
  targetConsequence: nullableInt(source, 'targetConsequence'),
  status: oneOf(RISK_STATUSES, source, 'status'),
  nsmPrincipleIds: intList(source, 'nsmPrincipleIds'),
  ekomPrincipleIds: intList(source, 'ekomPrincipleIds'),
  assetIds: intList(source, 'assetIds'),
});

const matrixOptions = (query: Record<string, unknown>) => ({
  projectId: int(query, 'projectId'),
  view: oneOf(['current', 'target'] as const, query, 'view'),
});

const EXPORT_HEADERS = [
  'ID',
  'Title',
  'Project',
  'Status',
  'Likelihood',
  'Consequence',
  'Score',
  'Band',
  'Target Score',
  'Accepted Until',
  'NSM Principles',
  'Ekom Principles',
];

const exportRow = (risk: RiskView) => [
  risk.id,
  risk.title,
  risk.projectName,
  risk.status,
  risk.likelihood,
  risk.consequence,
  risk.score,
  risk.band,
  risk.targetScore,
  risk.acceptanceValidUntil,
  risk.nsmPrincipleIds.join(' '),
  risk.ekomPrincipleIds.join(' '),
];

export function createRiskRouter(risks: RiskService, audit: AuditService): Router {
  const router = Router();

  // ============================================
  // READS
  // ============================================

  router.get(
    '/',
    listRisksValidator,
    validate,
    asyncHandler(async (req, res) => {
      const query = queryOf(req);
      const data = await risks.listRisks({
        projectId: int(query, 'projectId'),
        status: oneOf(RISK_STATUSES, query, 'status'),
        band: oneOf(RISK_BANDS, query, 'band'),
      });
      res.json({ success: true, data });
    }),
  );

  // 5×5 likelihood/consequence heatmap
  router.get(
    '/matrix',
    matrixQuery,
    validate,
    asyncHandler(async (req, res) => {
      const data = await risks.getRiskMatrix(matrixOptions(queryOf(req)));
      res.json({ success: true, data });
    }),
  );

  router.get(
    '/distribution',
    matrixQuery,
    validate,
    asyncHandler(async (req, res) => {
      const data = await risks.getRiskDistribution(matrixOptions(queryOf(req)));
      res.json({ success: true, data });
    }),
  );

  router.get(
    '/export',
    requireActor,
    riskExportQuery,
    validate,
    asyncHandler(async (req, res) => {
      const format = oneOf(['csv', 'json'] as const, queryOf(req), 'format') ?? 'csv';
      const data = await risks.listRisks();
      await audit.logExport(auditContext(req), 'risk', format);

      if (format === 'csv') {
        res.setHeader('Content-Type', 'text/csv');
        res.setHeader('Content-Disposition', 'attachment; filename="risk-register.csv"');
        res.send(toCsv(EXPORT_HEADERS, data.map(exportRow)));
        return;
      }
      res.json({ success: true, data });
    }),
  );

  router.get(
    '/:id',
    idParam(),
    validate,
    asyncHandler(async (req, res) => {
      const data = await risks.getRisk(intParam(req));
      res.json({ success: true, data });
    }),
  );

  // ============================================
  // MUTATIONS
  // ============================================

  router.post(
    '/',
    requireActor,
    createRiskValidator,
    validate,
    asyncHandler(async (req, res) => {
      const patch = readRisk(bodyOf(req));
      const input: RiskInput = {
        ...patch,
        title: patch.title ?? '',
        likelihood: patch.likelihood ?? 0,
        consequence: patch.consequence ?? 0,
      };
      const data = await risks.createRisk(input, auditContext(req));
      res.status(201).json({ success: true, data });
    }),
  );

  router.put(
    '/:id',
    requireActor,
    idParam(),
    updateRiskValidator,
    validate,
    asyncHandler(async (req, res) => {
      const data = await risks.updateRisk(intParam(req), readRisk(bodyOf(req)), auditContext(req));
      res.json({ success: true, data });
    }),
  );

  router.delete(
    '/:id',
    requireActor,
    idParam(),
    validate,
    asyncHandler(async (req, res) => {
      await risks.deleteRisk(intParam(req), auditContext(req));
      res.json({ success: true, message: 'Risk deleted' });
    }),
  );

  // ============================================
  // ACCEPTANCE
  // ============================================

  router.post(
    '/:id/accept',
    requireActor,
    idParam(),
    acceptRiskValidator,
    validate,
    asyncHandler(async (req, res) => {
      const body = bodyOf(req);
      const data = await risks.acceptRisk(
        intParam(req),
        { rationale: str(body, 'rationale') ?? '', validUntil: nullableStr(body, 'validUntil') },
        auditContext(req),
      );
      res.json({ success: true, data });
    }),
  );

  router.delete(
    '/:id/accept',
    requireActor,
    idParam(),
    validate,
    asyncHandler(async (req, res) => {
      const data = await risks.revokeAcceptance(intParam(req), auditContext(req));
      res.json({ success: true, data });
    }),
  );

  return router;
}
