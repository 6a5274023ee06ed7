import { Router } from 'express';
import { ASSET_CATEGORIES, ASSET_TYPES } from '../constants/enums.js';
import { asyncHandler } from '../middleware/errorHandler.js';
import { auditContext, requireActor } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { createAssetValidator, idParam, updateAssetValidator } from '../middleware/validators.js';
import type { AssetPatch, AssetService } from '../services/asset.service.js';
import { bodyOf, bool, int, intParam, nullableInt, nullableStr, oneOf, str } from './input.js';

const readAsset = (source: Record<string, unknown>): AssetPatch => ({
  name: str(source, 'name'),
  description: nullableStr(source, 'description'),
  assetType: oneOf(ASSET_TYPES, source, 'assetType'),
  category: oneOf(ASSET_CATEGORIES, source, 'category'),
  criticality: int(source, 'criticality'),
  location: nullableStr(source, 'location'),
  parentId: nullableInt(source, 'parentId'),
  isManual: bool(source, 'isManual'),
});

export function createAssetRouter(assets: AssetService): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      const data = await assets.listAssets();
      res.json({ success: true, data });
    }),
  );

  router.get(
    '/:id',
    idParam(),
    validate,
    asyncHandler(async (req, res) => {
      const data = await assets.getAsset(intParam(req));
      res.json({ success: true, data });
    }),
  );

  // Risks raised against an asset
  router.get(
    '/:id/risks',
    idParam(),
    validate,
    asyncHandler(async (req, res) => {
      const data = await assets.listRisksForAsset(intParam(req));
      res.json({ success: true, data });
    }),
  );

  router.post(
    '/',
    requireActor,
    createAssetValidator,
    validate,
    asyncHandler(async (req, res) => {
      const patch = readAsset(bodyOf(req));
      const data = await assets.createAsset(
        { ...patch, name: patch.name ?? '', assetType: patch.assetType ?? 'physical' },
        auditContext(req),
      );
      res.status(201).json({ success: true, data });
    }),
  );

  router.put(
    '/:id',
    requireActor,
    idParam(),
    updateAssetValidator,
    validate,
    asyncHandler(async (req, res) => {
      const data = await assets.updateAsset(intParam(req), readAsset(bodyOf(req)), auditContext(req));
      res.json({ success: true, data });
    }),
  );

  router.delete(
    '/:id',
    requireActor,
    idParam(),
    validate,
    asyncHandler(async (req, res) => {
      await assets.deleteAsset(intParam(req), auditContext(req));
      res.json({ success: true, message: 'Asset deleted' });
    }),
  );

  return router;
}
