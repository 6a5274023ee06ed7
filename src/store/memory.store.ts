import type { Framework } from '../constants/enums.js';
import { NotFoundError } from '../utils/errors.js';
import type {
  ActionChanges,
  ActionFilter,
  ActionMappingRecord,
  ActionMappingRepository,
  ActionRecord,
  ActionRepository,
  AssetChanges,
  AssetRecord,
  AssetRepository,
  AuditFilter,
  AuditLogRecord,
  AuditLogRepository,
  EntityStore,
  NewAction,
  NewActionMapping,
  NewAuditLog,
  NewPrinciple,
  NewReview,
  NewRisk,
  NewRiskMapping,
  NewAsset,
  NewSupplier,
  Page,
  PrincipleRecord,
  PrincipleRepository,
  ProjectRecord,
  ProjectRepository,
  ReviewChanges,
  ReviewRecord,
  ReviewRepository,
  RiskChanges,
  RiskFilter,
  RiskMappingChanges,
  RiskMappingRecord,
  RiskMappingRepository,
  RiskRecord,
  RiskRepository,
  SupplierChanges,
  SupplierRecord,
  SupplierRepository,
  UnitOfWork,
} from './types.js';

// ============================================
// State
// ============================================

type StoredRisk = Omit<RiskRecord, 'projectName'>;

interface MemoryState {
  seq: Record<string, number>;
  projects: ProjectRecord[];
  risks: StoredRisk[];
  actions: ActionRecord[];
  actionRisks: { actionId: number; riskId: number }[];
  reviews: ReviewRecord[];
  suppliers: SupplierRecord[];
  assets: AssetRecord[];
  assetRisks: { assetId: number; riskId: number }[];
  principles: PrincipleRecord[];
  riskMappings: RiskMappingRecord[];
  actionMappings: ActionMappingRecord[];
  auditLogs: AuditLogRecord[];
}

const emptyState = (): MemoryState => ({
  seq: {},
  projects: [],
  risks: [],
  actions: [],
  actionRisks: [],
  reviews: [],
  suppliers: [],
  assets: [],
  assetRisks: [],
  principles: [],
  riskMappings: [],
  actionMappings: [],
  auditLogs: [],
});

export interface MemoryStoreOptions {
  clock?: () => Date;
}

const byId = <T extends { id: number }>(a: T, b: T): number => a.id - b.id;

const nextId = (state: MemoryState, table: string): number => {
  const id = (state.seq[table] ?? 0) + 1;
  state.seq[table] = id;
  return id;
};

function mustFind<T extends { id: number }>(rows: T[], id: number, entityType: string): T {
  const row = rows.find((candidate) => candidate.id === id);
  if (!row) throw new NotFoundError(entityType, id);
  return row;
}

// Keys present with an undefined value leave the stored field untouched
function applyChanges<T extends object>(target: T, changes: Partial<T>): void {
  for (const [key, value] of Object.entries(changes)) {
    if (value !== undefined) Reflect.set(target, key, value);
  }
}

function remove<T>(rows: T[], predicate: (row: T) => boolean): void {
  for (let i = rows.length - 1; i >= 0; i--) {
    if (predicate(rows[i])) rows.splice(i, 1);
  }
}

const matchesAudit = (entry: AuditLogRecord, filter: AuditFilter): boolean =>
  (filter.entityType === undefined || entry.entityType === filter.entityType) &&
  (filter.entityId === undefined || entry.entityId === filter.entityId) &&
  (filter.actorId === undefined || entry.actorId === filter.actorId) &&
  (filter.action === undefined || entry.action === filter.action);

// ============================================
// Repositories over a state accessor
// ============================================
// Every method resolves the state lazily, so the same code serves both the
// committed state and a transaction's working copy.

function bindRepositories(state: () => MemoryState, now: () => string): UnitOfWork {
  const withProjectName = (risk: StoredRisk): RiskRecord => ({
    ...risk,
    projectName:
      risk.projectId === null
        ? null
        : state().projects.find((project) => project.id === risk.projectId)?.name ?? null,
  });

  const projects: ProjectRepository = {
    async findById(id) {
      const project = state().projects.find((row) => row.id === id);
      return project ? { ...project } : null;
    },
    async findAll() {
      return state().projects.map((row) => ({ ...row })).sort(byId);
    },
    async create(name) {
      const project: ProjectRecord = { id: nextId(state(), 'projects'), name, createdAt: now() };
      state().projects.push(project);
      return { ...project };
    },
  };

  const risks: RiskRepository = {
    async findById(id) {
      const risk = state().risks.find((row) => row.id === id);
      return risk ? withProjectName(risk) : null;
    },
    async findMany(filter: RiskFilter = {}) {
      return state()
        .risks.filter(
          (risk) =>
            (filter.projectId === undefined || risk.projectId === filter.projectId) &&
            (filter.ownerId === undefined || risk.ownerId === filter.ownerId) &&
            (filter.statuses === undefined || filter.statuses.includes(risk.status)),
        )
        .sort(byId)
        .map(withProjectName);
    },
    async create(data: NewRisk) {
      const timestamp = now();
      const risk: StoredRisk = { ...data, id: nextId(state(), 'risks'), createdAt: timestamp, updatedAt: timestamp };
      state().risks.push(risk);
      return withProjectName(risk);
    },
    async update(id, changes: RiskChanges) {
      const risk = mustFind(state().risks, id, 'risk');
      applyChanges(risk, changes);
      risk.updatedAt = now();
      return withProjectName(risk);
    },
    async delete(id) {
      remove(state().risks, (row) => row.id === id);
    },
  };

  const actions: ActionRepository = {
    async findById(id) {
      const action = state().actions.find((row) => row.id === id);
      return action ? { ...action } : null;
    },
    async findMany(filter: ActionFilter = {}) {
      const linked =
        filter.riskId === undefined
          ? null
          : new Set(state().actionRisks.filter((link) => link.riskId === filter.riskId).map((link) => link.actionId));
      return state()
        .actions.filter(
          (action) =>
            (filter.statuses === undefined || filter.statuses.includes(action.status)) &&
            (linked === null || linked.has(action.id)),
        )
        .sort(byId)
        .map((row) => ({ ...row }));
    },
    async create(data: NewAction) {
      const timestamp = now();
      const action: ActionRecord = { ...data, id: nextId(state(), 'actions'), createdAt: timestamp, updatedAt: timestamp };
      state().actions.push(action);
      return { ...action };
    },
    async update(id, changes: ActionChanges) {
      const action = mustFind(state().actions, id, 'action');
      applyChanges(action, changes);
      action.updatedAt = now();
      return { ...action };
    },
    async delete(id) {
      remove(state().actions, (row) => row.id === id);
      remove(state().actionRisks, (link) => link.actionId === id);
    },
    async findRiskIds(actionId) {
      return state()
        .actionRisks.filter((link) => link.actionId === actionId)
        .map((link) => link.riskId)
        .sort((a, b) => a - b);
    },
    async setRiskLinks(actionId, riskIds) {
      remove(state().actionRisks, (link) => link.actionId === actionId);
      for (const riskId of new Set(riskIds)) state().actionRisks.push({ actionId, riskId });
    },
    async deleteLinksForRisk(riskId) {
      remove(state().actionRisks, (link) => link.riskId === riskId);
    },
  };

  const reviews: ReviewRepository = {
    async findById(id) {
      const review = state().reviews.find((row) => row.id === id);
      return review ? { ...review } : null;
    },
    async findAll() {
      return state().reviews.map((row) => ({ ...row })).sort(byId);
    },
    async create(data: NewReview) {
      const review: ReviewRecord = { ...data, id: nextId(state(), 'reviews'), createdAt: now() };
      state().reviews.push(review);
      return { ...review };
    },
    async update(id, changes: ReviewChanges) {
      const review = mustFind(state().reviews, id, 'review');
      applyChanges(review, changes);
      return { ...review };
    },
    async delete(id) {
      remove(state().reviews, (row) => row.id === id);
    },
  };

  const suppliers: SupplierRepository = {
    async findById(id) {
      const supplier = state().suppliers.find((row) => row.id === id);
      return supplier ? { ...supplier } : null;
    },
    async findAll() {
      return state().suppliers.map((row) => ({ ...row })).sort(byId);
    },
    async create(data: NewSupplier) {
      const timestamp = now();
      const supplier: SupplierRecord = { ...data, id: nextId(state(), 'suppliers'), createdAt: timestamp, updatedAt: timestamp };
      state().suppliers.push(supplier);
      return { ...supplier };
    },
    async update(id, changes: SupplierChanges) {
      const supplier = mustFind(state().suppliers, id, 'supplier');
      applyChanges(supplier, changes);
      supplier.updatedAt = now();
      return { ...supplier };
    },
    async delete(id) {
      remove(state().suppliers, (row) => row.id === id);
    },
  };

  const assets: AssetRepository = {
    async findById(id) {
      const asset = state().assets.find((row) => row.id === id);
      return asset ? { ...asset } : null;
    },
    async findAll() {
      return state().assets.map((row) => ({ ...row })).sort(byId);
    },
    async create(data: NewAsset) {
      const timestamp = now();
      const asset: AssetRecord = { ...data, id: nextId(state(), 'assets'), createdAt: timestamp, updatedAt: timestamp };
      state().assets.push(asset);
      return { ...asset };
    },
    async update(id, changes: AssetChanges) {
      const asset = mustFind(state().assets, id, 'asset');
      applyChanges(asset, changes);
      asset.updatedAt = now();
      return { ...asset };
    },
    async delete(id) {
      remove(state().assetRisks, (link) => link.assetId === id);
      remove(state().assets, (row) => row.id === id);
    },
    async findByRisk(riskId) {
      return state()
        .assetRisks.filter((link) => link.riskId === riskId)
        .map((link) => link.assetId)
        .sort((a, b) => a - b);
    },
    async findRiskIds(assetId) {
      return state()
        .assetRisks.filter((link) => link.assetId === assetId)
        .map((link) => link.riskId)
        .sort((a, b) => a - b);
    },
    async setRiskLinks(riskId, assetIds) {
      remove(state().assetRisks, (link) => link.riskId === riskId);
      for (const assetId of new Set(assetIds)) state().assetRisks.push({ assetId, riskId });
    },
    async deleteLinksForRisk(riskId) {
      remove(state().assetRisks, (link) => link.riskId === riskId);
    },
  };

  const principles: PrincipleRepository = {
    async findById(framework: Framework, id) {
      const principle = state().principles.find((row) => row.framework === framework && row.id === id);
      return principle ? { ...principle } : null;
    },
    async findAll(framework: Framework) {
      return state()
        .principles.filter((row) => row.framework === framework)
        .sort((a, b) => a.sortOrder - b.sortOrder || a.code.localeCompare(b.code))
        .map((row) => ({ ...row }));
    },
    async upsert(data: NewPrinciple) {
      const existing = state().principles.find((row) => row.framework === data.framework && row.code === data.code);
      if (existing) {
        Object.assign(existing, data);
        return { ...existing };
      }
      const principle: PrincipleRecord = { ...data, id: nextId(state(), `principles:${data.framework}`) };
      state().principles.push(principle);
      return { ...principle };
    },
  };

  const riskMappings: RiskMappingRepository = {
    async findById(framework, id) {
      const mapping = state().riskMappings.find((row) => row.framework === framework && row.id === id);
      return mapping ? { ...mapping } : null;
    },
    async findOne(framework, riskId, principleId) {
      const mapping = state().riskMappings.find(
        (row) => row.framework === framework && row.riskId === riskId && row.principleId === principleId,
      );
      return mapping ? { ...mapping } : null;
    },
    async findByRisk(framework, riskId) {
      return state()
        .riskMappings.filter((row) => row.framework === framework && row.riskId === riskId)
        .sort(byId)
        .map((row) => ({ ...row }));
    },
    async findAll(framework, riskIds) {
      const scope = riskIds === undefined ? null : new Set(riskIds);
      return state()
        .riskMappings.filter((row) => row.framework === framework && (scope === null || scope.has(row.riskId)))
        .sort(byId)
        .map((row) => ({ ...row }));
    },
    async create(data: NewRiskMapping) {
      const mapping: RiskMappingRecord = {
        ...data,
        id: nextId(state(), `riskMappings:${data.framework}`),
        createdAt: now(),
      };
      state().riskMappings.push(mapping);
      return { ...mapping };
    },
    async update(framework, id, changes: RiskMappingChanges) {
      const mapping = state().riskMappings.find((row) => row.framework === framework && row.id === id);
      if (!mapping) throw new NotFoundError(`${framework}_mapping`, id);
      applyChanges(mapping, changes);
      return { ...mapping };
    },
    async delete(framework, id) {
      remove(state().riskMappings, (row) => row.framework === framework && row.id === id);
    },
    async deleteByRisk(framework, riskId) {
      remove(state().riskMappings, (row) => row.framework === framework && row.riskId === riskId);
    },
  };

  const actionMappings: ActionMappingRepository = {
    async findById(framework, id) {
      const mapping = state().actionMappings.find((row) => row.framework === framework && row.id === id);
      return mapping ? { ...mapping } : null;
    },
    async findOne(framework, actionId, principleId) {
      const mapping = state().actionMappings.find(
        (row) => row.framework === framework && row.actionId === actionId && row.principleId === principleId,
      );
      return mapping ? { ...mapping } : null;
    },
    async findByAction(framework, actionId) {
      return state()
        .actionMappings.filter((row) => row.framework === framework && row.actionId === actionId)
        .sort(byId)
        .map((row) => ({ ...row }));
    },
    async findAll(framework) {
      return state()
        .actionMappings.filter((row) => row.framework === framework)
        .sort(byId)
        .map((row) => ({ ...row }));
    },
    async create(data: NewActionMapping) {
      const mapping: ActionMappingRecord = {
        ...data,
        id: nextId(state(), `actionMappings:${data.framework}`),
        createdAt: now(),
      };
      state().actionMappings.push(mapping);
      return { ...mapping };
    },
    async delete(framework, id) {
      remove(state().actionMappings, (row) => row.framework === framework && row.id === id);
    },
    async deleteByAction(framework, actionId) {
      remove(state().actionMappings, (row) => row.framework === framework && row.actionId === actionId);
    },
  };

  const auditLogs: AuditLogRepository = {
    async insert(entry: NewAuditLog) {
      const record: AuditLogRecord = { ...entry, id: nextId(state(), 'auditLogs') };
      state().auditLogs.push(record);
      return { ...record };
    },
    async find(filter: AuditFilter, page: Page) {
      return state()
        .auditLogs.filter((entry) => matchesAudit(entry, filter))
        .sort((a, b) => b.timestamp.localeCompare(a.timestamp) || b.id - a.id)
        .slice(page.offset, page.offset + page.limit)
        .map((row) => ({ ...row }));
    },
    async count(filter: AuditFilter) {
      return state().auditLogs.filter((entry) => matchesAudit(entry, filter)).length;
    },
  };

  return { projects, risks, actions, reviews, suppliers, assets, principles, riskMappings, actionMappings, auditLogs };
}

// ============================================
// Store
// ============================================

/**
 * In-process EntityStore. A transaction works on a structured clone of the
 * committed state and swaps it in on success; transactions run one at a time.
 */
export class MemoryEntityStore implements EntityStore {
  private state: MemoryState = emptyState();
  private queue: Promise<unknown> = Promise.resolve();
  private readonly repositories: UnitOfWork;
  private readonly now: () => string;

  constructor(options: MemoryStoreOptions = {}) {
    const clock = options.clock ?? (() => new Date());
    this.now = () => clock().toISOString();
    this.repositories = bindRepositories(() => this.state, this.now);
  }

  get projects() { return this.repositories.projects; }
  get risks() { return this.repositories.risks; }
  get actions() { return this.repositories.actions; }
  get reviews() { return this.repositories.reviews; }
  get suppliers() { return this.repositories.suppliers; }
  get assets() { return this.repositories.assets; }
  get principles() { return this.repositories.principles; }
  get riskMappings() { return this.repositories.riskMappings; }
  get actionMappings() { return this.repositories.actionMappings; }
  get auditLogs() { return this.repositories.auditLogs; }

  transaction<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      const draft = structuredClone(this.state);
      const result = await work(bindRepositories(() => draft, this.now));
      this.state = draft;
      return result;
    };
    const result = this.queue.then(run);
    // Keep the queue alive after a rollback; the caller still sees the rejection
    this.queue = result.catch(() => undefined);
    return result;
  }

  async close(): Promise<void> {
    await this.queue;
  }
}
