import { Router } from 'express';
import { asyncHandler } from '../middleware/errorHandler.js';
import { auditContext, requireActor } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import {
  assessmentValidator,
  createSupplierValidator,
  idParam,
  updateSupplierValidator,
} from '../middleware/validators.js';
import type { SupplierPatch, SupplierService } from '../services/supplier.service.js';
import { bodyOf, bool, int, intParam, nullableStr, str } from './input.js';

const readSupplier = (source: Record<string, unknown>): SupplierPatch => ({
  name: str(source, 'name'),
  criticality: int(source, 'criticality'),
  contractEndDate: nullableStr(source, 'contractEndDate'),
  lastAssessedAt: nullableStr(source, 'lastAssessedAt'),
  isExternal: bool(source, 'isExternal'),
});

export function createSupplierRouter(suppliers: SupplierService): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      const data = await suppliers.listSuppliers();
      res.json({ success: true, data });
    }),
  );

  router.get(
    '/:id',
    idParam(),
    validate,
    asyncHandler(async (req, res) => {
      const data = await suppliers.getSupplier(intParam(req));
      res.json({ success: true, data });
    }),
  );

  router.post(
    '/',
    requireActor,
    createSupplierValidator,
    validate,
    asyncHandler(async (req, res) => {
      const patch = readSupplier(bodyOf(req));
      const data = await suppliers.createSupplier(
        { ...patch, name: patch.name ?? '', criticality: patch.criticality ?? 0 },
        auditContext(req),
      );
      res.status(201).json({ success: true, data });
    }),
  );

  router.put(
    '/:id',
    requireActor,
    idParam(),
    updateSupplierValidator,
    validate,
    asyncHandler(async (req, res) => {
      const data = await suppliers.updateSupplier(intParam(req), readSupplier(bodyOf(req)), auditContext(req));
      res.json({ success: true, data });
    }),
  );

  // Stamp a completed supplier assessment (today unless a date is given)
  router.post(
    '/:id/assessments',
    requireActor,
    idParam(),
    assessmentValidator,
    validate,
    asyncHandler(async (req, res) => {
      const assessedOn = nullableStr(bodyOf(req), 'assessedOn') ?? undefined;
      const data = await suppliers.recordAssessment(intParam(req), assessedOn, auditContext(req));
      res.json({ success: true, data });
    }),
  );

  router.delete(
    '/:id',
    requireActor,
    idParam(),
    validate,
    asyncHandler(async (req, res) => {
      await suppliers.deleteSupplier(intParam(req), auditContext(req));
      res.json({ success: true, message: 'Supplier deleted' });
    }),
  );

  return router;
}
