import { ACCEPTABLE_FROM, RISK_STATUSES, parseEnum, type RiskStatus } from '../constants/enums.js';
import type { EntityStore, NewRisk, RiskChanges, RiskFilter, RiskRecord, UnitOfWork } from '../store/types.js';
import { parseIsoDate, type IsoDate } from '../utils/dates.js';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { AuditContext, AuditService, AuditValues } from './audit.service.js';
import type { ComplianceService } from './compliance.service.js';
import {
  assessRisk,
  assertRating,
  buildRiskMatrix,
  riskDistribution,
  type MatrixView,
  type RiskAssessment,
  type RiskBand,
  type RiskDistribution,
  type RiskMatrix,
} from './riskScoring.service.js';

export interface RiskInput {
  title: string;
  description?: string | null;
  projectId?: number | null;
  ownerId?: number | null;
  likelihood: number;
  consequence: number;
  targetLikelihood?: number | null;
  targetConsequence?: number | null;
  status?: RiskStatus;
  nsmPrincipleIds?: number[];
  ekomPrincipleIds?: number[];
  assetIds?: number[];
}

export type RiskPatch = Partial<RiskInput>;

export interface RiskListFilter {
  projectId?: number;
  status?: RiskStatus;
  band?: RiskBand;
}

export interface AcceptanceInput {
  rationale: string;
  validUntil?: IsoDate | null;
}

export interface RiskView extends RiskRecord, RiskAssessment {
  nsmPrincipleIds: number[];
  ekomPrincipleIds: number[];
  assetIds: number[];
}

export interface MatrixOptions {
  projectId?: number;
  view?: MatrixView;
}

const ENTITY = 'risk';

// Fields recorded in update entries, keyed by their audit name
const AUDITED_FIELDS = {
  title: 'title',
  description: 'description',
  project_id: 'projectId',
  owner_id: 'ownerId',
  likelihood: 'likelihood',
  consequence: 'consequence',
  target_likelihood: 'targetLikelihood',
  target_consequence: 'targetConsequence',
  status: 'status',
} as const satisfies Record<string, keyof NewRisk>;

function requireTitle(title: unknown): string {
  if (typeof title !== 'string' || title.trim().length === 0) {
    throw ValidationError.field('title', 'title is required');
  }
  return title.trim();
}

// Order-insensitive form of an id list, used for change detection and audit values
const idSet = (ids: readonly number[]): string => [...new Set(ids)].sort((a, b) => a - b).join(',');

function checkTargetPair(targetLikelihood: number | null, targetConsequence: number | null): void {
  if ((targetLikelihood === null) !== (targetConsequence === null)) {
    throw ValidationError.field(
      targetLikelihood === null ? 'targetLikelihood' : 'targetConsequence',
      'targetLikelihood and targetConsequence must both be set or both be empty',
    );
  }
  if (targetLikelihood !== null) assertRating(targetLikelihood, 'targetLikelihood');
  if (targetConsequence !== null) assertRating(targetConsequence, 'targetConsequence');
}

export class RiskService {
  constructor(
    private readonly store: EntityStore,
    private readonly audit: AuditService,
    private readonly compliance: ComplianceService,
    private readonly clock: () => Date,
    private readonly logger: Logger,
  ) {}

  // ============================================
  // Reads
  // ============================================

  async getRisk(id: number): Promise<RiskView> {
    const risk = await this.store.risks.findById(id);
    if (!risk) throw new NotFoundError(ENTITY, id);
    return this.toView(this.store, risk);
  }

  async listRisks(filter: RiskListFilter = {}): Promise<RiskView[]> {
    const query: RiskFilter = {};
    if (filter.projectId !== undefined) query.projectId = filter.projectId;
    if (filter.status !== undefined) query.statuses = [filter.status];
    const risks = await this.store.risks.findMany(query);
    const views = await Promise.all(risks.map((risk) => this.toView(this.store, risk)));
    return filter.band === undefined ? views : views.filter((view) => view.band === filter.band);
  }

  async getRiskMatrix(options: MatrixOptions = {}): Promise<RiskMatrix> {
    return buildRiskMatrix(await this.loadForMatrix(options.projectId), options.view ?? 'current');
  }

  async getRiskDistribution(options: MatrixOptions = {}): Promise<RiskDistribution & { total: number }> {
    const risks = await this.loadForMatrix(options.projectId);
    return { ...riskDistribution(risks, options.view ?? 'current'), total: risks.length };
  }

  private loadForMatrix(projectId: number | undefined): Promise<RiskRecord[]> {
    return this.store.risks.findMany(projectId === undefined ? {} : { projectId });
  }

  private async toView(uow: UnitOfWork, risk: RiskRecord): Promise<RiskView> {
    const [nsm, ekom, assetIds] = await Promise.all([
      uow.riskMappings.findByRisk('nsm', risk.id),
      uow.riskMappings.findByRisk('ekom', risk.id),
      uow.assets.findByRisk(risk.id),
    ]);
    return {
      ...risk,
      ...assessRisk(risk),
      nsmPrincipleIds: nsm.map((mapping) => mapping.principleId),
      ekomPrincipleIds: ekom.map((mapping) => mapping.principleId),
      assetIds,
    };
  }

  // ============================================
  // Mutations
  // ============================================

  async createRisk(input: RiskInput, context: AuditContext): Promise<RiskView> {
    const data: NewRisk = {
      title: requireTitle(input.title),
      description: input.description ?? null,
      projectId: input.projectId ?? null,
      ownerId: input.ownerId ?? null,
      likelihood: assertRating(input.likelihood, 'likelihood'),
      consequence: assertRating(input.consequence, 'consequence'),
      targetLikelihood: input.targetLikelihood ?? null,
      targetConsequence: input.targetConsequence ?? null,
      status: input.status === undefined ? 'identified' : parseEnum(RISK_STATUSES, input.status, 'status'),
      acceptedById: null,
      acceptedAt: null,
      acceptanceRationale: null,
      acceptanceValidUntil: null,
    };
    checkTargetPair(data.targetLikelihood, data.targetConsequence);
    if (data.status === 'accepted') {
      throw ValidationError.field('status', 'Risks are accepted through the accept operation');
    }

    return this.store.transaction(async (uow) => {
      await this.assertProject(uow, data.projectId);
      const risk = await uow.risks.create(data);
      if (input.nsmPrincipleIds) await this.compliance.replaceRiskMappings(uow, 'nsm', risk.id, input.nsmPrincipleIds);
      if (input.ekomPrincipleIds) {
        await this.compliance.replaceRiskMappings(uow, 'ekom', risk.id, input.ekomPrincipleIds);
      }
      if (input.assetIds) await this.linkAssets(uow, risk.id, input.assetIds);
      const view = await this.toView(uow, risk);
      await this.audit.logCreate(uow, context, ENTITY, risk.id, {
        title: view.title,
        likelihood: view.likelihood,
        consequence: view.consequence,
        risk_score: view.score,
        status: view.status,
      });
      return view;
    });
  }

  async updateRisk(id: number, patch: RiskPatch, context: AuditContext): Promise<RiskView> {
    return this.store.transaction(async (uow) => {
      const existing = await uow.risks.findById(id);
      if (!existing) throw new NotFoundError(ENTITY, id);

      const changes: RiskChanges = {};
      if (patch.title !== undefined) changes.title = requireTitle(patch.title);
      if (patch.description !== undefined) changes.description = patch.description;
      if (patch.projectId !== undefined) {
        await this.assertProject(uow, patch.projectId);
        changes.projectId = patch.projectId;
      }
      if (patch.ownerId !== undefined) changes.ownerId = patch.ownerId;
      if (patch.likelihood !== undefined) changes.likelihood = assertRating(patch.likelihood, 'likelihood');
      if (patch.consequence !== undefined) changes.consequence = assertRating(patch.consequence, 'consequence');
      if (patch.targetLikelihood !== undefined) changes.targetLikelihood = patch.targetLikelihood;
      if (patch.targetConsequence !== undefined) changes.targetConsequence = patch.targetConsequence;
      if (patch.status !== undefined) {
        const status = parseEnum(RISK_STATUSES, patch.status, 'status');
        if (status === 'accepted' && existing.status !== 'accepted') {
          throw ValidationError.field('status', 'Risks are accepted through the accept operation');
        }
        // Acceptance fields belong to the accepted status; only revocation clears them
        if (existing.status === 'accepted' && status !== 'accepted') {
          throw new ConflictError(`Risk ${id} is accepted; revoke the acceptance before changing its status`);
        }
        changes.status = status;
      }
      checkTargetPair(
        changes.targetLikelihood !== undefined ? changes.targetLikelihood : existing.targetLikelihood,
        changes.targetConsequence !== undefined ? changes.targetConsequence : existing.targetConsequence,
      );

      const oldValues: AuditValues = {};
      const newValues: AuditValues = {};
      const updated = Object.keys(changes).length > 0 ? await uow.risks.update(id, changes) : existing;
      for (const [auditKey, field] of Object.entries(AUDITED_FIELDS)) {
        if (existing[field] !== updated[field]) {
          oldValues[auditKey] = existing[field];
          newValues[auditKey] = updated[field];
        }
      }

      const replace = async (framework: 'nsm' | 'ekom', ids: number[] | undefined) => {
        if (ids === undefined) return;
        const key = `${framework}_principle_ids`;
        const before = idSet((await uow.riskMappings.findByRisk(framework, id)).map((mapping) => mapping.principleId));
        await this.compliance.replaceRiskMappings(uow, framework, id, ids);
        if (before !== idSet(ids)) {
          oldValues[key] = before;
          newValues[key] = idSet(ids);
        }
      };
      await replace('nsm', patch.nsmPrincipleIds);
      await replace('ekom', patch.ekomPrincipleIds);

      if (patch.assetIds !== undefined) {
        const before = idSet(await uow.assets.findByRisk(id));
        await this.linkAssets(uow, id, patch.assetIds);
        if (before !== idSet(patch.assetIds)) {
          oldValues.asset_ids = before;
          newValues.asset_ids = idSet(patch.assetIds);
        }
      }

      if (Object.keys(newValues).length > 0) {
        await this.audit.logUpdate(uow, context, ENTITY, id, oldValues, newValues);
      }
      return this.toView(uow, updated);
    });
  }

  async deleteRisk(id: number, context: AuditContext): Promise<void> {
    await this.store.transaction(async (uow) => {
      const existing = await uow.risks.findById(id);
      if (!existing) throw new NotFoundError(ENTITY, id);
      await uow.riskMappings.deleteByRisk('nsm', id);
      await uow.riskMappings.deleteByRisk('ekom', id);
      await uow.actions.deleteLinksForRisk(id);
      await uow.assets.deleteLinksForRisk(id);
      await uow.risks.delete(id);
      await this.audit.logDelete(uow, context, ENTITY, id, {
        title: existing.title,
        status: existing.status,
        risk_score: existing.likelihood * existing.consequence,
      });
    });
  }

  // ============================================
  // Acceptance
  // ============================================

  async acceptRisk(id: number, input: AcceptanceInput, context: AuditContext): Promise<RiskView> {
    if (typeof input.rationale !== 'string' || input.rationale.trim().length === 0) {
      throw ValidationError.field('rationale', 'rationale is required to accept a risk');
    }
    const validUntil =
      input.validUntil === undefined || input.validUntil === null ? null : parseIsoDate(input.validUntil, 'validUntil');

    return this.store.transaction(async (uow) => {
      const existing = await uow.risks.findById(id);
      if (!existing) throw new NotFoundError(ENTITY, id);
      if (!ACCEPTABLE_FROM.includes(existing.status)) {
        throw new ConflictError(`Risk ${id} cannot be accepted from status '${existing.status}'`);
      }

      const updated = await uow.risks.update(id, {
        status: 'accepted',
        acceptedById: context.actorId,
        acceptedAt: this.clock().toISOString(),
        acceptanceRationale: input.rationale.trim(),
        acceptanceValidUntil: validUntil,
      });

      await this.audit.logApprove(uow, context, ENTITY, id, updated.acceptanceRationale ?? input.rationale);
      await this.audit.logUpdate(
        uow,
        context,
        ENTITY,
        id,
        { status: existing.status },
        {
          status: updated.status,
          accepted_by_id: updated.acceptedById,
          acceptance_valid_until: updated.acceptanceValidUntil,
        },
      );
      this.logger.info('Risk accepted', { riskId: id, actorId: context.actorId });
      return this.toView(uow, updated);
    });
  }

  async revokeAcceptance(id: number, context: AuditContext): Promise<RiskView> {
    return this.store.transaction(async (uow) => {
      const existing = await uow.risks.findById(id);
      if (!existing) throw new NotFoundError(ENTITY, id);
      if (existing.status !== 'accepted') {
        throw new ConflictError(`Risk ${id} is not accepted`);
      }

      const updated = await uow.risks.update(id, {
        status: 'identified',
        acceptedById: null,
        acceptedAt: null,
        acceptanceRationale: null,
        acceptanceValidUntil: null,
      });

      await this.audit.logUpdate(
        uow,
        context,
        ENTITY,
        id,
        {
          status: existing.status,
          accepted_by_id: existing.acceptedById,
          accepted_at: existing.acceptedAt,
          acceptance_rationale: existing.acceptanceRationale,
          acceptance_valid_until: existing.acceptanceValidUntil,
        },
        { status: updated.status, acceptance_revoked: true },
      );
      this.logger.info('Risk acceptance revoked', { riskId: id, actorId: context.actorId });
      return this.toView(uow, updated);
    });
  }

  private async linkAssets(uow: UnitOfWork, riskId: number, assetIds: readonly number[]): Promise<void> {
    const missing: number[] = [];
    for (const assetId of new Set(assetIds)) {
      if (!(await uow.assets.findById(assetId))) missing.push(assetId);
    }
    if (missing.length > 0) throw ValidationError.field('assetIds', `Unknown asset ids: ${missing.join(', ')}`);
    await uow.assets.setRiskLinks(riskId, assetIds);
  }

  private async assertProject(uow: UnitOfWork, projectId: number | null): Promise<void> {
    if (projectId !== null && !(await uow.projects.findById(projectId))) {
      throw ValidationError.field('projectId', `Unknown project: ${projectId}`);
    }
  }
}
