import {
  ASSET_CATEGORIES,
  ASSET_TYPES,
  parseEnum,
  type AssetCategory,
  type AssetType,
} from '../constants/enums.js';
import type { AssetChanges, AssetRecord, EntityStore, NewAsset, RiskRecord, UnitOfWork } from '../store/types.js';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors.js';
import type { AuditContext, AuditService, AuditValues } from './audit.service.js';

export interface AssetInput {
  name: string;
  assetType: AssetType;
  description?: string | null;
  category?: AssetCategory;
  criticality?: number;
  location?: string | null;
  parentId?: number | null;
  isManual?: boolean;
}

export type AssetPatch = Partial<AssetInput>;

const ENTITY = 'asset';

const DEFAULT_CRITICALITY = 3;

const AUDITED_FIELDS = {
  name: 'name',
  description: 'description',
  asset_type: 'assetType',
  category: 'category',
  criticality: 'criticality',
  location: 'location',
  parent_id: 'parentId',
  is_manual: 'isManual',
} as const satisfies Record<string, keyof NewAsset>;

function assertCriticality(value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || value > 5) {
    throw ValidationError.field('criticality', 'criticality must be an integer between 1 and 5');
  }
  return value;
}

const optionalText = (value: string | null | undefined): string | null => {
  if (value === undefined || value === null) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
};

/**
 * Network and service assets that risks are raised against. Assets form a
 * tree through `parentId`; an asset synced from an external inventory has
 * `isManual` false.
 */
export class AssetService {
  constructor(
    private readonly store: EntityStore,
    private readonly audit: AuditService,
  ) {}

  async getAsset(id: number): Promise<AssetRecord> {
    const asset = await this.store.assets.findById(id);
    if (!asset) throw new NotFoundError(ENTITY, id);
    return asset;
  }

  listAssets(): Promise<AssetRecord[]> {
    return this.store.assets.findAll();
  }

  /** Risks linked to an asset, ascending by id. */
  async listRisksForAsset(id: number): Promise<RiskRecord[]> {
    await this.getAsset(id);
    const riskIds = await this.store.assets.findRiskIds(id);
    const risks: RiskRecord[] = [];
    for (const riskId of riskIds) {
      const risk = await this.store.risks.findById(riskId);
      if (risk) risks.push(risk);
    }
    return risks;
  }

  async createAsset(input: AssetInput, context: AuditContext): Promise<AssetRecord> {
    if (typeof input.name !== 'string' || input.name.trim().length === 0) {
      throw ValidationError.field('name', 'name is required');
    }
    const data: NewAsset = {
      name: input.name.trim(),
      description: optionalText(input.description),
      assetType: parseEnum(ASSET_TYPES, input.assetType, 'assetType'),
      category: input.category === undefined ? 'other' : parseEnum(ASSET_CATEGORIES, input.category, 'category'),
      criticality: input.criticality === undefined ? DEFAULT_CRITICALITY : assertCriticality(input.criticality),
      location: optionalText(input.location),
      parentId: input.parentId ?? null,
      isManual: input.isManual ?? true,
    };
    return this.store.transaction(async (uow) => {
      if (data.parentId !== null) await this.assertParent(uow, null, data.parentId);
      const asset = await uow.assets.create(data);
      await this.audit.logCreate(uow, context, ENTITY, asset.id, {
        name: asset.name,
        asset_type: asset.assetType,
        category: asset.category,
        criticality: asset.criticality,
        parent_id: asset.parentId,
      });
      return asset;
    });
  }

  async updateAsset(id: number, patch: AssetPatch, context: AuditContext): Promise<AssetRecord> {
    const changes: AssetChanges = {};
    if (patch.name !== undefined) {
      if (patch.name.trim().length === 0) throw ValidationError.field('name', 'name is required');
      changes.name = patch.name.trim();
    }
    if (patch.description !== undefined) changes.description = optionalText(patch.description);
    if (patch.assetType !== undefined) changes.assetType = parseEnum(ASSET_TYPES, patch.assetType, 'assetType');
    if (patch.category !== undefined) changes.category = parseEnum(ASSET_CATEGORIES, patch.category, 'category');
    if (patch.criticality !== undefined) changes.criticality = assertCriticality(patch.criticality);
    if (patch.location !== undefined) changes.location = optionalText(patch.location);
    if (patch.parentId !== undefined) changes.parentId = patch.parentId;
    if (patch.isManual !== undefined) changes.isManual = patch.isManual;

    return this.store.transaction(async (uow) => {
      const existing = await uow.assets.findById(id);
      if (!existing) throw new NotFoundError(ENTITY, id);
      if (changes.parentId !== undefined && changes.parentId !== null) {
        await this.assertParent(uow, id, changes.parentId);
      }
      if (Object.keys(changes).length === 0) return existing;

      const updated = await uow.assets.update(id, changes);
      const oldValues: AuditValues = {};
      const newValues: AuditValues = {};
      for (const [auditKey, field] of Object.entries(AUDITED_FIELDS)) {
        if (existing[field] !== updated[field]) {
          oldValues[auditKey] = existing[field];
          newValues[auditKey] = updated[field];
        }
      }
      if (Object.keys(newValues).length > 0) {
        await this.audit.logUpdate(uow, context, ENTITY, id, oldValues, newValues);
      }
      return updated;
    });
  }

  async deleteAsset(id: number, context: AuditContext): Promise<void> {
    await this.store.transaction(async (uow) => {
      const existing = await uow.assets.findById(id);
      if (!existing) throw new NotFoundError(ENTITY, id);
      const children = (await uow.assets.findAll()).filter((asset) => asset.parentId === id);
      if (children.length > 0) {
        throw new ConflictError(`Asset ${id} has child assets: ${children.map((asset) => asset.id).join(', ')}`);
      }
      await uow.assets.delete(id);
      await this.audit.logDelete(uow, context, ENTITY, id, {
        name: existing.name,
        asset_type: existing.assetType,
        criticality: existing.criticality,
      });
    });
  }

  /**
   * The parent must exist and must not be the asset itself or one of its
   * descendants. `assetId` is null for an asset not yet created.
   */
  private async assertParent(uow: UnitOfWork, assetId: number | null, parentId: number): Promise<void> {
    const parent = await uow.assets.findById(parentId);
    if (!parent) throw ValidationError.field('parentId', `Unknown parent asset: ${parentId}`);
    if (assetId === null) return;

    const seen = new Set<number>();
    let cursor: AssetRecord | null = parent;
    while (cursor) {
      if (cursor.id === assetId) {
        throw ValidationError.field('parentId', `Asset ${assetId} cannot be placed under its own descendant ${parentId}`);
      }
      if (cursor.parentId === null || seen.has(cursor.id)) break;
      seen.add(cursor.id);
      cursor = await uow.assets.findById(cursor.parentId);
    }
  }
}
