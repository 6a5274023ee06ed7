import {
  FRAMEWORK_CATEGORIES,
  categoryLabel,
  type ComplianceStatus,
  type Framework,
  type PrincipleCategory,
} from '../constants/enums.js';
import type {
  ActionMappingRecord,
  EntityStore,
  PrincipleRecord,
  RiskMappingRecord,
  UnitOfWork,
} from '../store/types.js';
import { toIsoDate, type IsoDate } from '../utils/dates.js';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { AuditContext, AuditService } from './audit.service.js';

// ============================================
// Principle lifecycle
// ============================================

export type CoverageMode = 'active' | 'all';

export const isDeprecated = (principle: PrincipleRecord, asOf: IsoDate): boolean =>
  principle.deprecatedDate !== null && principle.deprecatedDate <= asOf;

export const isActive = (principle: PrincipleRecord, asOf: IsoDate): boolean =>
  !isDeprecated(principle, asOf) && (principle.effectiveDate === null || principle.effectiveDate <= asOf);

export const fullCode = (framework: Framework, code: string): string =>
  framework === 'nsm' ? `NSM ${code}` : `Ekomforskriften § ${code}`;

export interface PrincipleView extends PrincipleRecord {
  fullCode: string;
  categoryLabel: string;
  active: boolean;
  deprecated: boolean;
}

export const toPrincipleView = (principle: PrincipleRecord, asOf: IsoDate): PrincipleView => ({
  ...principle,
  fullCode: fullCode(principle.framework, principle.code),
  categoryLabel: categoryLabel(principle.framework, principle.category),
  active: isActive(principle, asOf),
  deprecated: isDeprecated(principle, asOf),
});

// ============================================
// Coverage aggregation
// ============================================

export interface StatusCounts {
  compliant: number;
  partial: number;
  nonCompliant: number;
  notAssessed: number;
}

export interface PrincipleCoverage {
  principleId: number;
  code: string;
  fullCode: string;
  title: string;
  category: PrincipleCategory;
  active: boolean;
  riskCount: number;
  actionCount: number;
  covered: boolean;
  status: StatusCounts;
}

export interface CategoryCoverage extends StatusCounts {
  category: PrincipleCategory;
  categoryLabel: string;
  totalPrinciples: number;
  coveredPrinciples: number;
}

export interface CoverageGap {
  id: number;
  code: string;
  fullCode: string;
  title: string;
  category: PrincipleCategory;
  categoryLabel: string;
  description: string | null;
}

export interface CoverageSummary extends StatusCounts {
  framework: Framework;
  mode: CoverageMode;
  asOf: IsoDate;
  totalPrinciples: number;
  coveredPrinciples: number;
  risksWithMapping: number;
  totalAssessed: number;
  coveragePercentage: number;
}

export interface CoverageReport {
  summary: CoverageSummary;
  principles: PrincipleCoverage[];
  categories: CategoryCoverage[];
  gaps: CoverageGap[];
}

export interface CoverageInput {
  framework: Framework;
  principles: readonly PrincipleRecord[];
  riskMappings: readonly RiskMappingRecord[];
  actionMappings: readonly ActionMappingRecord[];
  mode: CoverageMode;
  asOf: IsoDate;
}

const zeroCounts = (): StatusCounts => ({ compliant: 0, partial: 0, nonCompliant: 0, notAssessed: 0 });

const STATUS_KEYS: Record<ComplianceStatus, keyof StatusCounts> = {
  compliant: 'compliant',
  partial: 'partial',
  non_compliant: 'nonCompliant',
  not_assessed: 'notAssessed',
};

const addCounts = (target: StatusCounts, source: StatusCounts): void => {
  target.compliant += source.compliant;
  target.partial += source.partial;
  target.nonCompliant += source.nonCompliant;
  target.notAssessed += source.notAssessed;
};

export const coveragePercentage = (counts: StatusCounts): number => {
  const total = counts.compliant + counts.partial + counts.nonCompliant + counts.notAssessed;
  if (total === 0) return 0;
  return Math.round(((counts.compliant + counts.partial) / total) * 1000) / 10;
};

/**
 * Pure rollup of one framework's mappings. A mapping without a status counts as
 * not assessed. In the per-principle and category views a principle without
 * mappings also counts once as not assessed; the summary totals and percentage
 * count mappings only. Summary figures and the gap list only consider active
 * principles; mode 'all'
 * additionally lists inactive principles in the per-principle and category views.
 */
export function aggregateCoverage(input: CoverageInput): CoverageReport {
  const { framework, mode, asOf } = input;

  const risksByPrinciple = new Map<number, RiskMappingRecord[]>();
  for (const mapping of input.riskMappings) {
    const list = risksByPrinciple.get(mapping.principleId) ?? [];
    list.push(mapping);
    risksByPrinciple.set(mapping.principleId, list);
  }
  const actionsByPrinciple = new Map<number, Set<number>>();
  for (const mapping of input.actionMappings) {
    const set = actionsByPrinciple.get(mapping.principleId) ?? new Set<number>();
    set.add(mapping.actionId);
    actionsByPrinciple.set(mapping.principleId, set);
  }

  const listed = input.principles.filter((principle) => mode === 'all' || isActive(principle, asOf));

  const principles: PrincipleCoverage[] = listed.map((principle) => {
    const mappings = risksByPrinciple.get(principle.id) ?? [];
    const status = zeroCounts();
    for (const mapping of mappings) status[STATUS_KEYS[mapping.complianceStatus ?? 'not_assessed']]++;
    if (mappings.length === 0) status.notAssessed = 1;
    const riskCount = new Set(mappings.map((mapping) => mapping.riskId)).size;
    return {
      principleId: principle.id,
      code: principle.code,
      fullCode: fullCode(framework, principle.code),
      title: principle.title,
      category: principle.category,
      active: isActive(principle, asOf),
      riskCount,
      actionCount: actionsByPrinciple.get(principle.id)?.size ?? 0,
      covered: riskCount > 0,
      status,
    };
  });

  const categories: CategoryCoverage[] = [];
  for (const category of FRAMEWORK_CATEGORIES[framework]) {
    const members = principles.filter((principle) => principle.category === category);
    if (members.length === 0) continue;
    const rollup: CategoryCoverage = {
      category,
      categoryLabel: categoryLabel(framework, category),
      totalPrinciples: members.length,
      coveredPrinciples: members.filter((principle) => principle.covered).length,
      ...zeroCounts(),
    };
    for (const member of members) addCounts(rollup, member.status);
    categories.push(rollup);
  }

  // Summary totals count mapping statuses only; unmapped principles add nothing here
  const active = principles.filter((principle) => principle.active);
  const totals = zeroCounts();
  for (const principle of active) {
    for (const mapping of risksByPrinciple.get(principle.principleId) ?? []) {
      totals[STATUS_KEYS[mapping.complianceStatus ?? 'not_assessed']]++;
    }
  }
  const activeIds = new Set(active.map((principle) => principle.principleId));
  const risksWithMapping = new Set(
    input.riskMappings.filter((mapping) => activeIds.has(mapping.principleId)).map((mapping) => mapping.riskId),
  ).size;

  const byId = new Map(input.principles.map((principle) => [principle.id, principle]));
  const gaps: CoverageGap[] = [];
  for (const entry of active) {
    const principle = byId.get(entry.principleId);
    if (entry.covered || principle === undefined) continue;
    gaps.push({
      id: principle.id,
      code: principle.code,
      fullCode: entry.fullCode,
      title: principle.title,
      category: principle.category,
      categoryLabel: categoryLabel(framework, principle.category),
      description: principle.description,
    });
  }

  return {
    summary: {
      framework,
      mode,
      asOf,
      totalPrinciples: active.length,
      coveredPrinciples: active.filter((principle) => principle.covered).length,
      risksWithMapping,
      ...totals,
      totalAssessed: totals.compliant + totals.partial + totals.nonCompliant + totals.notAssessed,
      coveragePercentage: coveragePercentage(totals),
    },
    principles,
    categories,
    gaps,
  };
}

// ============================================
// Service
// ============================================

export interface CoverageOptions {
  mode?: CoverageMode;
  projectId?: number;
  asOf?: IsoDate;
}

export interface RiskMappingInput {
  riskId: number;
  principleId: number;
  complianceStatus?: ComplianceStatus | null;
  notes?: string | null;
}

export interface RiskMappingUpdate {
  complianceStatus?: ComplianceStatus | null;
  notes?: string | null;
}

export interface ActionMappingInput {
  actionId: number;
  principleId: number;
  notes?: string | null;
}

const mappingEntity = (framework: Framework): string => `${framework}_mapping`;
const actionMappingEntity = (framework: Framework): string => `${framework}_action_mapping`;

export class ComplianceService {
  constructor(
    private readonly store: EntityStore,
    private readonly audit: AuditService,
    private readonly clock: () => Date,
    private readonly logger: Logger,
  ) {}

  private today(): IsoDate {
    return toIsoDate(this.clock());
  }

  async listPrinciples(framework: Framework, options: { activeOnly?: boolean; asOf?: IsoDate } = {}) {
    const asOf = options.asOf ?? this.today();
    const principles = await this.store.principles.findAll(framework);
    return principles
      .map((principle) => toPrincipleView(principle, asOf))
      .filter((principle) => !options.activeOnly || principle.active);
  }

  async getPrinciple(framework: Framework, id: number): Promise<PrincipleView> {
    const principle = await this.store.principles.findById(framework, id);
    if (!principle) throw new NotFoundError(`${framework}_principle`, id);
    return toPrincipleView(principle, this.today());
  }

  async getCoverage(framework: Framework, options: CoverageOptions = {}): Promise<CoverageReport> {
    const riskIds =
      options.projectId === undefined
        ? undefined
        : (await this.store.risks.findMany({ projectId: options.projectId })).map((risk) => risk.id);
    const [principles, riskMappings, actionMappings] = await Promise.all([
      this.store.principles.findAll(framework),
      this.store.riskMappings.findAll(framework, riskIds),
      this.store.actionMappings.findAll(framework),
    ]);
    return aggregateCoverage({
      framework,
      principles,
      riskMappings,
      actionMappings,
      mode: options.mode ?? 'active',
      asOf: options.asOf ?? this.today(),
    });
  }

  async getSummary(framework: Framework, options: CoverageOptions = {}): Promise<CoverageSummary> {
    return (await this.getCoverage(framework, options)).summary;
  }

  async getGaps(framework: Framework, options: Omit<CoverageOptions, 'mode'> = {}): Promise<CoverageGap[]> {
    return (await this.getCoverage(framework, { ...options, mode: 'active' })).gaps;
  }

  // ============================================
  // Risk → principle mappings
  // ============================================

  async listRiskMappings(framework: Framework, riskId: number): Promise<RiskMappingRecord[]> {
    if (!(await this.store.risks.findById(riskId))) throw new NotFoundError('risk', riskId);
    return this.store.riskMappings.findByRisk(framework, riskId);
  }

  async addRiskMapping(framework: Framework, input: RiskMappingInput, context: AuditContext) {
    return this.store.transaction(async (uow) => {
      if (!(await uow.risks.findById(input.riskId))) throw new NotFoundError('risk', input.riskId);
      await this.assertPrinciplesExist(uow, framework, [input.principleId], 'principleId');
      if (await uow.riskMappings.findOne(framework, input.riskId, input.principleId)) {
        throw new ConflictError(
          `Risk ${input.riskId} is already mapped to ${framework} principle ${input.principleId}`,
        );
      }
      const mapping = await uow.riskMappings.create({
        framework,
        riskId: input.riskId,
        principleId: input.principleId,
        complianceStatus: input.complianceStatus ?? null,
        notes: input.notes ?? null,
      });
      await this.audit.logCreate(uow, context, mappingEntity(framework), mapping.id, {
        risk_id: mapping.riskId,
        principle_id: mapping.principleId,
        compliance_status: mapping.complianceStatus,
      });
      return mapping;
    });
  }

  async updateRiskMapping(framework: Framework, mappingId: number, changes: RiskMappingUpdate, context: AuditContext) {
    return this.store.transaction(async (uow) => {
      const existing = await uow.riskMappings.findById(framework, mappingId);
      if (!existing) throw new NotFoundError(mappingEntity(framework), mappingId);
      const updated = await uow.riskMappings.update(framework, mappingId, changes);
      await this.audit.logUpdate(
        uow,
        context,
        mappingEntity(framework),
        mappingId,
        { compliance_status: existing.complianceStatus, notes: existing.notes },
        { compliance_status: updated.complianceStatus, notes: updated.notes },
      );
      return updated;
    });
  }

  async removeRiskMapping(framework: Framework, mappingId: number, context: AuditContext): Promise<void> {
    await this.store.transaction(async (uow) => {
      const existing = await uow.riskMappings.findById(framework, mappingId);
      if (!existing) throw new NotFoundError(mappingEntity(framework), mappingId);
      await uow.riskMappings.delete(framework, mappingId);
      await this.audit.logDelete(uow, context, mappingEntity(framework), mappingId, {
        risk_id: existing.riskId,
        principle_id: existing.principleId,
        compliance_status: existing.complianceStatus,
      });
    });
  }

  /**
   * Replaces a risk's mappings for one framework inside the caller's transaction.
   * Principles that stay mapped keep their compliance status and notes.
   */
  async replaceRiskMappings(
    uow: UnitOfWork,
    framework: Framework,
    riskId: number,
    principleIds: readonly number[],
  ): Promise<number[]> {
    const field = framework === 'nsm' ? 'nsmPrincipleIds' : 'ekomPrincipleIds';
    await this.assertPrinciplesExist(uow, framework, principleIds, field);
    const previous = new Map(
      (await uow.riskMappings.findByRisk(framework, riskId)).map((mapping) => [mapping.principleId, mapping]),
    );
    await uow.riskMappings.deleteByRisk(framework, riskId);
    for (const principleId of principleIds) {
      const kept = previous.get(principleId);
      await uow.riskMappings.create({
        framework,
        riskId,
        principleId,
        complianceStatus: kept?.complianceStatus ?? null,
        notes: kept?.notes ?? null,
      });
    }
    this.logger.info('Risk mappings replaced', { framework, riskId, count: principleIds.length });
    return [...principleIds];
  }

  /** Rejects duplicate ids within one list and ids with no matching principle. */
  async assertPrinciplesExist(
    uow: UnitOfWork,
    framework: Framework,
    principleIds: readonly number[],
    field: string,
  ): Promise<void> {
    if (new Set(principleIds).size !== principleIds.length) {
      throw ValidationError.field(field, `${field} contains duplicate principle ids`);
    }
    const missing: number[] = [];
    for (const id of principleIds) {
      if (!(await uow.principles.findById(framework, id))) missing.push(id);
    }
    if (missing.length > 0) {
      throw ValidationError.field(field, `Unknown ${framework} principle ids: ${missing.join(', ')}`);
    }
  }

  // ============================================
  // Action → principle mappings (presence only)
  // ============================================

  async listActionMappings(framework: Framework, actionId: number): Promise<ActionMappingRecord[]> {
    if (!(await this.store.actions.findById(actionId))) throw new NotFoundError('action', actionId);
    return this.store.actionMappings.findByAction(framework, actionId);
  }

  async addActionMapping(framework: Framework, input: ActionMappingInput, context: AuditContext) {
    return this.store.transaction(async (uow) => {
      if (!(await uow.actions.findById(input.actionId))) throw new NotFoundError('action', input.actionId);
      await this.assertPrinciplesExist(uow, framework, [input.principleId], 'principleId');
      if (await uow.actionMappings.findOne(framework, input.actionId, input.principleId)) {
        throw new ConflictError(
          `Action ${input.actionId} is already mapped to ${framework} principle ${input.principleId}`,
        );
      }
      const mapping = await uow.actionMappings.create({
        framework,
        actionId: input.actionId,
        principleId: input.principleId,
        notes: input.notes ?? null,
      });
      await this.audit.logCreate(uow, context, actionMappingEntity(framework), mapping.id, {
        action_id: mapping.actionId,
        principle_id: mapping.principleId,
      });
      return mapping;
    });
  }

  async removeActionMapping(framework: Framework, mappingId: number, context: AuditContext): Promise<void> {
    await this.store.transaction(async (uow) => {
      const existing = await uow.actionMappings.findById(framework, mappingId);
      if (!existing) throw new NotFoundError(actionMappingEntity(framework), mappingId);
      await uow.actionMappings.delete(framework, mappingId);
      await this.audit.logDelete(uow, context, actionMappingEntity(framework), mappingId, {
        action_id: existing.actionId,
        principle_id: existing.principleId,
      });
    });
  }
}
