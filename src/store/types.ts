import type {
  ActionPriority,
  ActionStatus,
  AssetCategory,
  AssetType,
  AuditAction,
  ComplianceStatus,
  Framework,
  PrincipleCategory,
  RiskStatus,
} from '../constants/enums.js';
import type { IsoDate } from '../utils/dates.js';

// ============================================
// Records
// ============================================
// Timestamps are ISO-8601 strings; calendar dates are IsoDate ('YYYY-MM-DD').

export interface ProjectRecord {
  id: number;
  name: string;
  createdAt: string;
}

export interface RiskRecord {
  id: number;
  title: string;
  description: string | null;
  projectId: number | null;
  projectName: string | null;
  ownerId: number | null;
  likelihood: number;
  consequence: number;
  targetLikelihood: number | null;
  targetConsequence: number | null;
  status: RiskStatus;
  acceptedById: number | null;
  acceptedAt: string | null;
  acceptanceRationale: string | null;
  acceptanceValidUntil: IsoDate | null;
  createdAt: string;
  updatedAt: string;
}

export type NewRisk = Omit<RiskRecord, 'id' | 'projectName' | 'createdAt' | 'updatedAt'>;
export type RiskChanges = Partial<NewRisk>;

export interface ActionRecord {
  id: number;
  title: string;
  description: string | null;
  status: ActionStatus;
  priority: ActionPriority;
  ownerId: number | null;
  dueDate: IsoDate | null;
  completedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export type NewAction = Omit<ActionRecord, 'id' | 'createdAt' | 'updatedAt'>;
export type ActionChanges = Partial<NewAction>;

export interface ReviewRecord {
  id: number;
  title: string;
  scheduledDate: IsoDate;
  conductedDate: IsoDate | null;
  notes: string | null;
  createdAt: string;
}

export type NewReview = Omit<ReviewRecord, 'id' | 'createdAt'>;
export type ReviewChanges = Partial<NewReview>;

export interface SupplierRecord {
  id: number;
  name: string;
  criticality: number;
  contractEndDate: IsoDate | null;
  lastAssessedAt: IsoDate | null;
  isExternal: boolean;
  createdAt: string;
  updatedAt: string;
}

export type NewSupplier = Omit<SupplierRecord, 'id' | 'createdAt' | 'updatedAt'>;
export type SupplierChanges = Partial<NewSupplier>;

export interface AssetRecord {
  id: number;
  name: string;
  description: string | null;
  assetType: AssetType;
  category: AssetCategory;
  criticality: number;
  location: string | null;
  parentId: number | null;
  /** False when the asset is kept in sync from an external inventory. */
  isManual: boolean;
  createdAt: string;
  updatedAt: string;
}

export type NewAsset = Omit<AssetRecord, 'id' | 'createdAt' | 'updatedAt'>;
export type AssetChanges = Partial<NewAsset>;

export interface PrincipleRecord {
  id: number;
  framework: Framework;
  code: string;
  category: PrincipleCategory;
  title: string;
  description: string | null;
  legalText: string | null;
  version: string;
  effectiveDate: IsoDate | null;
  deprecatedDate: IsoDate | null;
  sortOrder: number;
}

export type NewPrinciple = Omit<PrincipleRecord, 'id'>;

export interface RiskMappingRecord {
  id: number;
  framework: Framework;
  riskId: number;
  principleId: number;
  complianceStatus: ComplianceStatus | null;
  notes: string | null;
  createdAt: string;
}

export type NewRiskMapping = Omit<RiskMappingRecord, 'id' | 'createdAt'>;
export type RiskMappingChanges = Partial<Pick<RiskMappingRecord, 'complianceStatus' | 'notes'>>;

export interface ActionMappingRecord {
  id: number;
  framework: Framework;
  actionId: number;
  principleId: number;
  notes: string | null;
  createdAt: string;
}

export type NewActionMapping = Omit<ActionMappingRecord, 'id' | 'createdAt'>;

export interface AuditLogRecord {
  id: number;
  timestamp: string;
  actorId: number | null;
  action: AuditAction;
  entityType: string;
  entityId: number | null;
  oldValues: string | null;
  newValues: string | null;
  description: string;
  ipAddress: string | null;
  userAgent: string | null;
}

export type NewAuditLog = Omit<AuditLogRecord, 'id'>;

// ============================================
// Queries
// ============================================

export interface RiskFilter {
  projectId?: number;
  statuses?: readonly RiskStatus[];
  ownerId?: number;
}

export interface ActionFilter {
  statuses?: readonly ActionStatus[];
  riskId?: number;
}

export interface AuditFilter {
  entityType?: string;
  entityId?: number;
  actorId?: number;
  action?: AuditAction;
}

export interface Page {
  limit: number;
  offset: number;
}

// ============================================
// Repositories
// ============================================
// Lists come back in ascending id order unless stated otherwise.

export interface ProjectRepository {
  findById(id: number): Promise<ProjectRecord | null>;
  findAll(): Promise<ProjectRecord[]>;
  create(name: string): Promise<ProjectRecord>;
}

export interface RiskRepository {
  findById(id: number): Promise<RiskRecord | null>;
  findMany(filter?: RiskFilter): Promise<RiskRecord[]>;
  create(data: NewRisk): Promise<RiskRecord>;
  update(id: number, changes: RiskChanges): Promise<RiskRecord>;
  delete(id: number): Promise<void>;
}

export interface ActionRepository {
  findById(id: number): Promise<ActionRecord | null>;
  findMany(filter?: ActionFilter): Promise<ActionRecord[]>;
  create(data: NewAction): Promise<ActionRecord>;
  update(id: number, changes: ActionChanges): Promise<ActionRecord>;
  delete(id: number): Promise<void>;
  findRiskIds(actionId: number): Promise<number[]>;
  setRiskLinks(actionId: number, riskIds: readonly number[]): Promise<void>;
  deleteLinksForRisk(riskId: number): Promise<void>;
}

export interface ReviewRepository {
  findById(id: number): Promise<ReviewRecord | null>;
  findAll(): Promise<ReviewRecord[]>;
  create(data: NewReview): Promise<ReviewRecord>;
  update(id: number, changes: ReviewChanges): Promise<ReviewRecord>;
  delete(id: number): Promise<void>;
}

export interface SupplierRepository {
  findById(id: number): Promise<SupplierRecord | null>;
  findAll(): Promise<SupplierRecord[]>;
  create(data: NewSupplier): Promise<SupplierRecord>;
  update(id: number, changes: SupplierChanges): Promise<SupplierRecord>;
  delete(id: number): Promise<void>;
}

export interface AssetRepository {
  findById(id: number): Promise<AssetRecord | null>;
  findAll(): Promise<AssetRecord[]>;
  create(data: NewAsset): Promise<AssetRecord>;
  update(id: number, changes: AssetChanges): Promise<AssetRecord>;
  delete(id: number): Promise<void>;
  /** Asset ids linked to a risk, ascending. */
  findByRisk(riskId: number): Promise<number[]>;
  /** Risk ids linked to an asset, ascending. */
  findRiskIds(assetId: number): Promise<number[]>;
  setRiskLinks(riskId: number, assetIds: readonly number[]): Promise<void>;
  deleteLinksForRisk(riskId: number): Promise<void>;
}

export interface PrincipleRepository {
  findById(framework: Framework, id: number): Promise<PrincipleRecord | null>;
  /** Ordered by sort order, then code. */
  findAll(framework: Framework): Promise<PrincipleRecord[]>;
  /** Insert or replace by (framework, code). */
  upsert(data: NewPrinciple): Promise<PrincipleRecord>;
}

export interface RiskMappingRepository {
  findById(framework: Framework, id: number): Promise<RiskMappingRecord | null>;
  findOne(framework: Framework, riskId: number, principleId: number): Promise<RiskMappingRecord | null>;
  findByRisk(framework: Framework, riskId: number): Promise<RiskMappingRecord[]>;
  findAll(framework: Framework, riskIds?: readonly number[]): Promise<RiskMappingRecord[]>;
  create(data: NewRiskMapping): Promise<RiskMappingRecord>;
  update(framework: Framework, id: number, changes: RiskMappingChanges): Promise<RiskMappingRecord>;
  delete(framework: Framework, id: number): Promise<void>;
  deleteByRisk(framework: Framework, riskId: number): Promise<void>;
}

export interface ActionMappingRepository {
  findById(framework: Framework, id: number): Promise<ActionMappingRecord | null>;
  findOne(framework: Framework, actionId: number, principleId: number): Promise<ActionMappingRecord | null>;
  findByAction(framework: Framework, actionId: number): Promise<ActionMappingRecord[]>;
  findAll(framework: Framework): Promise<ActionMappingRecord[]>;
  create(data: NewActionMapping): Promise<ActionMappingRecord>;
  delete(framework: Framework, id: number): Promise<void>;
  deleteByAction(framework: Framework, actionId: number): Promise<void>;
}

export interface AuditLogRepository {
  insert(entry: NewAuditLog): Promise<AuditLogRecord>;
  /** Newest first: timestamp descending, then id descending. */
  find(filter: AuditFilter, page: Page): Promise<AuditLogRecord[]>;
  count(filter: AuditFilter): Promise<number>;
}

export interface UnitOfWork {
  projects: ProjectRepository;
  risks: RiskRepository;
  actions: ActionRepository;
  reviews: ReviewRepository;
  suppliers: SupplierRepository;
  assets: AssetRepository;
  principles: PrincipleRepository;
  riskMappings: RiskMappingRepository;
  actionMappings: ActionMappingRepository;
  auditLogs: AuditLogRepository;
}

export interface EntityStore extends UnitOfWork {
  /** Runs `work` atomically: commits when it resolves, rolls back when it rejects. */
  transaction<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
