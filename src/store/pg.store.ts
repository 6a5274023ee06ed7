import pg from 'pg';
import type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import {
  ACTION_PRIORITIES,
  ACTION_STATUSES,
  ASSET_CATEGORIES,
  ASSET_TYPES,
  AUDIT_ACTIONS,
  COMPLIANCE_STATUSES,
  FRAMEWORK_CATEGORIES,
  RISK_STATUSES,
  parseEnum,
  type Framework,
} from '../constants/enums.js';
import { EngineError, NotFoundError, StoreFailure } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type {
  ActionMappingRecord,
  ActionMappingRepository,
  ActionRecord,
  ActionRepository,
  AssetRecord,
  AssetRepository,
  AuditFilter,
  AuditLogRecord,
  AuditLogRepository,
  EntityStore,
  PrincipleRecord,
  PrincipleRepository,
  ProjectRecord,
  ProjectRepository,
  ReviewRecord,
  ReviewRepository,
  RiskMappingRecord,
  RiskMappingRepository,
  RiskRecord,
  RiskRepository,
  SupplierRecord,
  SupplierRepository,
  UnitOfWork,
} from './types.js';

const DATE_OID = 1082;

// DATE columns stay 'YYYY-MM-DD' strings instead of local-midnight Date objects
pg.types.setTypeParser(DATE_OID, (value: string) => value);

type Run = <R extends QueryResultRow>(sql: string, params?: unknown[]) => Promise<R[]>;

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const runner =
  (exec: (sql: string, params: unknown[]) => Promise<QueryResult>): Run =>
  async (sql, params = []) => {
    try {
      const result = await exec(sql, params);
      return result.rows;
    } catch (error) {
      throw new StoreFailure(`Query failed: ${errorMessage(error)}`, error);
    }
  };

const iso = (value: Date | null): string | null => (value === null ? null : value.toISOString());
const isoRequired = (value: Date): string => value.toISOString();

/**
 * Builds `SET col = $n, ...` from the defined keys of `changes`.
 * Returns null when there is nothing to update.
 */
function setClause(
  columns: ReadonlyMap<string, string>,
  changes: object,
  firstParam: number,
): { sql: string; params: unknown[] } | null {
  const parts: string[] = [];
  const params: unknown[] = [];
  for (const [key, value] of Object.entries(changes)) {
    const column = columns.get(key);
    if (column === undefined || value === undefined) continue;
    params.push(value);
    parts.push(`${column} = $${firstParam + params.length - 1}`);
  }
  return parts.length === 0 ? null : { sql: parts.join(', '), params };
}

// ============================================
// Row shapes and mappers
// ============================================

interface ProjectRow {
  id: number;
  name: string;
  created_at: Date;
}

interface RiskRow {
  id: number;
  title: string;
  description: string | null;
  project_id: number | null;
  project_name: string | null;
  owner_id: number | null;
  likelihood: number;
  consequence: number;
  target_likelihood: number | null;
  target_consequence: number | null;
  status: string;
  accepted_by_id: number | null;
  accepted_at: Date | null;
  acceptance_rationale: string | null;
  acceptance_valid_until: string | null;
  created_at: Date;
  updated_at: Date;
}

interface ActionRow {
  id: number;
  title: string;
  description: string | null;
  status: string;
  priority: string;
  owner_id: number | null;
  due_date: string | null;
  completed_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

interface ReviewRow {
  id: number;
  title: string;
  scheduled_date: string;
  conducted_date: string | null;
  notes: string | null;
  created_at: Date;
}

interface SupplierRow {
  id: number;
  name: string;
  criticality: number;
  contract_end_date: string | null;
  last_assessed_at: string | null;
  is_external: boolean;
  created_at: Date;
  updated_at: Date;
}

interface AssetRow {
  id: number;
  name: string;
  description: string | null;
  asset_type: string;
  category: string;
  criticality: number;
  location: string | null;
  parent_id: number | null;
  is_manual: boolean;
  created_at: Date;
  updated_at: Date;
}

interface PrincipleRow {
  id: number;
  code: string;
  category: string;
  title: string;
  description: string | null;
  legal_text: string | null;
  version: string;
  effective_date: string | null;
  deprecated_date: string | null;
  sort_order: number;
}

interface RiskMappingRow {
  id: number;
  risk_id: number;
  principle_id: number;
  compliance_status: string | null;
  notes: string | null;
  created_at: Date;
}

interface ActionMappingRow {
  id: number;
  action_id: number;
  principle_id: number;
  notes: string | null;
  created_at: Date;
}

interface AuditLogRow {
  id: number;
  timestamp: Date;
  actor_id: number | null;
  action: string;
  entity_type: string;
  entity_id: number | null;
  old_values: string | null;
  new_values: string | null;
  description: string;
  ip_address: string | null;
  user_agent: string | null;
}

const toProject = (row: ProjectRow): ProjectRecord => ({
  id: row.id,
  name: row.name,
  createdAt: isoRequired(row.created_at),
});

const toRisk = (row: RiskRow): RiskRecord => ({
  id: row.id,
  title: row.title,
  description: row.description,
  projectId: row.project_id,
  projectName: row.project_name,
  ownerId: row.owner_id,
  likelihood: row.likelihood,
  consequence: row.consequence,
  targetLikelihood: row.target_likelihood,
  targetConsequence: row.target_consequence,
  status: parseEnum(RISK_STATUSES, row.status, 'status'),
  acceptedById: row.accepted_by_id,
  acceptedAt: iso(row.accepted_at),
  acceptanceRationale: row.acceptance_rationale,
  acceptanceValidUntil: row.acceptance_valid_until,
  createdAt: isoRequired(row.created_at),
  updatedAt: isoRequired(row.updated_at),
});

const toAction = (row: ActionRow): ActionRecord => ({
  id: row.id,
  title: row.title,
  description: row.description,
  status: parseEnum(ACTION_STATUSES, row.status, 'status'),
  priority: parseEnum(ACTION_PRIORITIES, row.priority, 'priority'),
  ownerId: row.owner_id,
  dueDate: row.due_date,
  completedAt: iso(row.completed_at),
  createdAt: isoRequired(row.created_at),
  updatedAt: isoRequired(row.updated_at),
});

const toReview = (row: ReviewRow): ReviewRecord => ({
  id: row.id,
  title: row.title,
  scheduledDate: row.scheduled_date,
  conductedDate: row.conducted_date,
  notes: row.notes,
  createdAt: isoRequired(row.created_at),
});

const toSupplier = (row: SupplierRow): SupplierRecord => ({
  id: row.id,
  name: row.name,
  criticality: row.criticality,
  contractEndDate: row.contract_end_date,
  lastAssessedAt: row.last_assessed_at,
  isExternal: row.is_external,
  createdAt: isoRequired(row.created_at),
  updatedAt: isoRequired(row.updated_at),
});

const toAsset = (row: AssetRow): AssetRecord => ({
  id: row.id,
  name: row.name,
  description: row.description,
  assetType: parseEnum(ASSET_TYPES, row.asset_type, 'assetType'),
  category: parseEnum(ASSET_CATEGORIES, row.category, 'category'),
  criticality: row.criticality,
  location: row.location,
  parentId: row.parent_id,
  isManual: row.is_manual,
  createdAt: isoRequired(row.created_at),
  updatedAt: isoRequired(row.updated_at),
});

const toPrinciple = (framework: Framework, row: PrincipleRow): PrincipleRecord => ({
  id: row.id,
  framework,
  code: row.code,
  category: parseEnum(FRAMEWORK_CATEGORIES[framework], row.category, 'category'),
  title: row.title,
  description: row.description,
  legalText: row.legal_text,
  version: row.version,
  effectiveDate: row.effective_date,
  deprecatedDate: row.deprecated_date,
  sortOrder: row.sort_order,
});

const toRiskMapping = (framework: Framework, row: RiskMappingRow): RiskMappingRecord => ({
  id: row.id,
  framework,
  riskId: row.risk_id,
  principleId: row.principle_id,
  complianceStatus:
    row.compliance_status === null ? null : parseEnum(COMPLIANCE_STATUSES, row.compliance_status, 'complianceStatus'),
  notes: row.notes,
  createdAt: isoRequired(row.created_at),
});

const toActionMapping = (framework: Framework, row: ActionMappingRow): ActionMappingRecord => ({
  id: row.id,
  framework,
  actionId: row.action_id,
  principleId: row.principle_id,
  notes: row.notes,
  createdAt: isoRequired(row.created_at),
});

const toAuditLog = (row: AuditLogRow): AuditLogRecord => ({
  id: row.id,
  timestamp: isoRequired(row.timestamp),
  actorId: row.actor_id,
  action: parseEnum(AUDIT_ACTIONS, row.action, 'action'),
  entityType: row.entity_type,
  entityId: row.entity_id,
  oldValues: row.old_values,
  newValues: row.new_values,
  description: row.description,
  ipAddress: row.ip_address,
  userAgent: row.user_agent,
});

function first<T>(rows: T[], entityType: string, id: number): T {
  const [row] = rows;
  if (row === undefined) throw new NotFoundError(entityType, id);
  return row;
}

// ============================================
// Column maps for partial updates
// ============================================

const RISK_COLUMNS = new Map<string, string>([
  ['title', 'title'],
  ['description', 'description'],
  ['projectId', 'project_id'],
  ['ownerId', 'owner_id'],
  ['likelihood', 'likelihood'],
  ['consequence', 'consequence'],
  ['targetLikelihood', 'target_likelihood'],
  ['targetConsequence', 'target_consequence'],
  ['status', 'status'],
  ['acceptedById', 'accepted_by_id'],
  ['acceptedAt', 'accepted_at'],
  ['acceptanceRationale', 'acceptance_rationale'],
  ['acceptanceValidUntil', 'acceptance_valid_until'],
]);

const ACTION_COLUMNS = new Map<string, string>([
  ['title', 'title'],
  ['description', 'description'],
  ['status', 'status'],
  ['priority', 'priority'],
  ['ownerId', 'owner_id'],
  ['dueDate', 'due_date'],
  ['completedAt', 'completed_at'],
]);

const REVIEW_COLUMNS = new Map<string, string>([
  ['title', 'title'],
  ['scheduledDate', 'scheduled_date'],
  ['conductedDate', 'conducted_date'],
  ['notes', 'notes'],
]);

const SUPPLIER_COLUMNS = new Map<string, string>([
  ['name', 'name'],
  ['criticality', 'criticality'],
  ['contractEndDate', 'contract_end_date'],
  ['lastAssessedAt', 'last_assessed_at'],
  ['isExternal', 'is_external'],
]);

const ASSET_COLUMNS = new Map<string, string>([
  ['name', 'name'],
  ['description', 'description'],
  ['assetType', 'asset_type'],
  ['category', 'category'],
  ['criticality', 'criticality'],
  ['location', 'location'],
  ['parentId', 'parent_id'],
  ['isManual', 'is_manual'],
]);

const MAPPING_COLUMNS = new Map<string, string>([
  ['complianceStatus', 'compliance_status'],
  ['notes', 'notes'],
]);

const RISK_SELECT = `
  SELECT r.*, p.name AS project_name
  FROM risks r
  LEFT JOIN projects p ON p.id = r.project_id`;

function auditWhere(filter: AuditFilter): { sql: string; params: unknown[] } {
  const conditions: string[] = [];
  const params: unknown[] = [];
  const add = (column: string, value: unknown) => {
    params.push(value);
    conditions.push(`${column} = $${params.length}`);
  };
  if (filter.entityType !== undefined) add('entity_type', filter.entityType);
  if (filter.entityId !== undefined) add('entity_id', filter.entityId);
  if (filter.actorId !== undefined) add('actor_id', filter.actorId);
  if (filter.action !== undefined) add('action', filter.action);
  return { sql: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '', params };
}

// ============================================
// Repositories
// ============================================
// Framework names come from a closed enum, so they are safe to splice into table names.

function bindRepositories(run: Run): UnitOfWork {
  const projects: ProjectRepository = {
    async findById(id) {
      const rows = await run<ProjectRow>('SELECT * FROM projects WHERE id = $1', [id]);
      return rows.length > 0 ? toProject(rows[0]) : null;
    },
    async findAll() {
      return (await run<ProjectRow>('SELECT * FROM projects ORDER BY id')).map(toProject);
    },
    async create(name) {
      const rows = await run<ProjectRow>('INSERT INTO projects (name) VALUES ($1) RETURNING *', [name]);
      return toProject(first(rows, 'project', 0));
    },
  };

  const risks: RiskRepository = {
    async findById(id) {
      const rows = await run<RiskRow>(`${RISK_SELECT} WHERE r.id = $1`, [id]);
      return rows.length > 0 ? toRisk(rows[0]) : null;
    },
    async findMany(filter = {}) {
      const conditions: string[] = [];
      const params: unknown[] = [];
      if (filter.projectId !== undefined) {
        params.push(filter.projectId);
        conditions.push(`r.project_id = $${params.length}`);
      }
      if (filter.ownerId !== undefined) {
        params.push(filter.ownerId);
        conditions.push(`r.owner_id = $${params.length}`);
      }
      if (filter.statuses !== undefined) {
        params.push([...filter.statuses]);
        conditions.push(`r.status = ANY($${params.length})`);
      }
      const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
      return (await run<RiskRow>(`${RISK_SELECT} ${where} ORDER BY r.id`, params)).map(toRisk);
    },
    async create(data) {
      const rows = await run<{ id: number }>(
        `INSERT INTO risks (title, description, project_id, owner_id, likelihood, consequence,
           target_likelihood, target_consequence, status, accepted_by_id, accepted_at,
           acceptance_rationale, acceptance_valid_until)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
         RETURNING id`,
        [
          data.title,
          data.description,
          data.projectId,
          data.ownerId,
          data.likelihood,
          data.consequence,
          data.targetLikelihood,
          data.targetConsequence,
          data.status,
          data.acceptedById,
          data.acceptedAt,
          data.acceptanceRationale,
          data.acceptanceValidUntil,
        ],
      );
      const { id } = first(rows, 'risk', 0);
      return toRisk(first(await run<RiskRow>(`${RISK_SELECT} WHERE r.id = $1`, [id]), 'risk', id));
    },
    async update(id, changes) {
      const set = setClause(RISK_COLUMNS, changes, 2);
      const assignments = set === null ? 'updated_at = NOW()' : `${set.sql}, updated_at = NOW()`;
      const updated = await run<{ id: number }>(`UPDATE risks SET ${assignments} WHERE id = $1 RETURNING id`, [
        id,
        ...(set?.params ?? []),
      ]);
      first(updated, 'risk', id);
      return toRisk(first(await run<RiskRow>(`${RISK_SELECT} WHERE r.id = $1`, [id]), 'risk', id));
    },
    async delete(id) {
      await run('DELETE FROM risks WHERE id = $1', [id]);
    },
  };

  const actions: ActionRepository = {
    async findById(id) {
      const rows = await run<ActionRow>('SELECT * FROM actions WHERE id = $1', [id]);
      return rows.length > 0 ? toAction(rows[0]) : null;
    },
    async findMany(filter = {}) {
      const conditions: string[] = [];
      const params: unknown[] = [];
      if (filter.statuses !== undefined) {
        params.push([...filter.statuses]);
        conditions.push(`a.status = ANY($${params.length})`);
      }
      if (filter.riskId !== undefined) {
        params.push(filter.riskId);
        conditions.push(`EXISTS (SELECT 1 FROM action_risks ar WHERE ar.action_id = a.id AND ar.risk_id = $${params.length})`);
      }
      const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
      return (await run<ActionRow>(`SELECT a.* FROM actions a ${where} ORDER BY a.id`, params)).map(toAction);
    },
    async create(data) {
      const rows = await run<ActionRow>(
        `INSERT INTO actions (title, description, status, priority, owner_id, due_date, completed_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7) RETURNING *`,
        [data.title, data.description, data.status, data.priority, data.ownerId, data.dueDate, data.completedAt],
      );
      return toAction(first(rows, 'action', 0));
    },
    async update(id, changes) {
      const set = setClause(ACTION_COLUMNS, changes, 2);
      const assignments = set === null ? 'updated_at = NOW()' : `${set.sql}, updated_at = NOW()`;
      const rows = await run<ActionRow>(`UPDATE actions SET ${assignments} WHERE id = $1 RETURNING *`, [
        id,
        ...(set?.params ?? []),
      ]);
      return toAction(first(rows, 'action', id));
    },
    async delete(id) {
      await run('DELETE FROM actions WHERE id = $1', [id]);
    },
    async findRiskIds(actionId) {
      const rows = await run<{ risk_id: number }>(
        'SELECT risk_id FROM action_risks WHERE action_id = $1 ORDER BY risk_id',
        [actionId],
      );
      return rows.map((row) => row.risk_id);
    },
    async setRiskLinks(actionId, riskIds) {
      await run('DELETE FROM action_risks WHERE action_id = $1', [actionId]);
      if (riskIds.length > 0) {
        await run(
          'INSERT INTO action_risks (action_id, risk_id) SELECT $1, UNNEST($2::int[]) ON CONFLICT DO NOTHING',
          [actionId, [...riskIds]],
        );
      }
    },
    async deleteLinksForRisk(riskId) {
      await run('DELETE FROM action_risks WHERE risk_id = $1', [riskId]);
    },
  };

  const reviews: ReviewRepository = {
    async findById(id) {
      const rows = await run<ReviewRow>('SELECT * FROM reviews WHERE id = $1', [id]);
      return rows.length > 0 ? toReview(rows[0]) : null;
    },
    async findAll() {
      return (await run<ReviewRow>('SELECT * FROM reviews ORDER BY id')).map(toReview);
    },
    async create(data) {
      const rows = await run<ReviewRow>(
        'INSERT INTO reviews (title, scheduled_date, conducted_date, notes) VALUES ($1, $2, $3, $4) RETURNING *',
        [data.title, data.scheduledDate, data.conductedDate, data.notes],
      );
      return toReview(first(rows, 'review', 0));
    },
    async update(id, changes) {
      const set = setClause(REVIEW_COLUMNS, changes, 2);
      if (set === null) {
        return toReview(first(await run<ReviewRow>('SELECT * FROM reviews WHERE id = $1', [id]), 'review', id));
      }
      const rows = await run<ReviewRow>(`UPDATE reviews SET ${set.sql} WHERE id = $1 RETURNING *`, [id, ...set.params]);
      return toReview(first(rows, 'review', id));
    },
    async delete(id) {
      await run('DELETE FROM reviews WHERE id = $1', [id]);
    },
  };

  const suppliers: SupplierRepository = {
    async findById(id) {
      const rows = await run<SupplierRow>('SELECT * FROM suppliers WHERE id = $1', [id]);
      return rows.length > 0 ? toSupplier(rows[0]) : null;
    },
    async findAll() {
      return (await run<SupplierRow>('SELECT * FROM suppliers ORDER BY id')).map(toSupplier);
    },
    async create(data) {
      const rows = await run<SupplierRow>(
        `INSERT INTO suppliers (name, criticality, contract_end_date, last_assessed_at, is_external)
         VALUES ($1, $2, $3, $4, $5) RETURNING *`,
        [data.name, data.criticality, data.contractEndDate, data.lastAssessedAt, data.isExternal],
      );
      return toSupplier(first(rows, 'supplier', 0));
    },
    async update(id, changes) {
      const set = setClause(SUPPLIER_COLUMNS, changes, 2);
      const assignments = set === null ? 'updated_at = NOW()' : `${set.sql}, updated_at = NOW()`;
      const rows = await run<SupplierRow>(`UPDATE suppliers SET ${assignments} WHERE id = $1 RETURNING *`, [
        id,
        ...(set?.params ?? []),
      ]);
      return toSupplier(first(rows, 'supplier', id));
    },
    async delete(id) {
      await run('DELETE FROM suppliers WHERE id = $1', [id]);
    },
  };

  const assets: AssetRepository = {
    async findById(id) {
      const rows = await run<AssetRow>('SELECT * FROM assets WHERE id = $1', [id]);
      return rows.length > 0 ? toAsset(rows[0]) : null;
    },
    async findAll() {
      return (await run<AssetRow>('SELECT * FROM assets ORDER BY id')).map(toAsset);
    },
    async create(data) {
      const rows = await run<AssetRow>(
        `INSERT INTO assets (name, description, asset_type, category, criticality, location, parent_id, is_manual)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8) RETURNING *`,
        [
          data.name,
          data.description,
          data.assetType,
          data.category,
          data.criticality,
          data.location,
          data.parentId,
          data.isManual,
        ],
      );
      return toAsset(first(rows, 'asset', 0));
    },
    async update(id, changes) {
      const set = setClause(ASSET_COLUMNS, changes, 2);
      const assignments = set === null ? 'updated_at = NOW()' : `${set.sql}, updated_at = NOW()`;
      const rows = await run<AssetRow>(`UPDATE assets SET ${assignments} WHERE id = $1 RETURNING *`, [
        id,
        ...(set?.params ?? []),
      ]);
      return toAsset(first(rows, 'asset', id));
    },
    async delete(id) {
      await run('DELETE FROM assets WHERE id = $1', [id]);
    },
    async findByRisk(riskId) {
      const rows = await run<{ asset_id: number }>(
        'SELECT asset_id FROM asset_risks WHERE risk_id = $1 ORDER BY asset_id',
        [riskId],
      );
      return rows.map((row) => row.asset_id);
    },
    async findRiskIds(assetId) {
      const rows = await run<{ risk_id: number }>(
        'SELECT risk_id FROM asset_risks WHERE asset_id = $1 ORDER BY risk_id',
        [assetId],
      );
      return rows.map((row) => row.risk_id);
    },
    async setRiskLinks(riskId, assetIds) {
      await run('DELETE FROM asset_risks WHERE risk_id = $1', [riskId]);
      if (assetIds.length > 0) {
        await run(
          'INSERT INTO asset_risks (risk_id, asset_id) SELECT $1, UNNEST($2::int[]) ON CONFLICT DO NOTHING',
          [riskId, [...assetIds]],
        );
      }
    },
    async deleteLinksForRisk(riskId) {
      await run('DELETE FROM asset_risks WHERE risk_id = $1', [riskId]);
    },
  };

  const principles: PrincipleRepository = {
    async findById(framework, id) {
      const rows = await run<PrincipleRow>(`SELECT * FROM ${framework}_principles WHERE id = $1`, [id]);
      return rows.length > 0 ? toPrinciple(framework, rows[0]) : null;
    },
    async findAll(framework) {
      const rows = await run<PrincipleRow>(`SELECT * FROM ${framework}_principles ORDER BY sort_order, code`);
      return rows.map((row) => toPrinciple(framework, row));
    },
    async upsert(data) {
      const rows = await run<PrincipleRow>(
        `INSERT INTO ${data.framework}_principles
           (code, category, title, description, legal_text, version, effective_date, deprecated_date, sort_order)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
         ON CONFLICT (code) DO UPDATE SET
           category = EXCLUDED.category,
           title = EXCLUDED.title,
           description = EXCLUDED.description,
           legal_text = EXCLUDED.legal_text,
           version = EXCLUDED.version,
           effective_date = EXCLUDED.effective_date,
           deprecated_date = EXCLUDED.deprecated_date,
           sort_order = EXCLUDED.sort_order
         RETURNING *`,
        [
          data.code,
          data.category,
          data.title,
          data.description,
          data.legalText,
          data.version,
          data.effectiveDate,
          data.deprecatedDate,
          data.sortOrder,
        ],
      );
      return toPrinciple(data.framework, first(rows, 'principle', 0));
    },
  };

  const riskMappings: RiskMappingRepository = {
    async findById(framework, id) {
      const rows = await run<RiskMappingRow>(`SELECT * FROM ${framework}_risk_mappings WHERE id = $1`, [id]);
      return rows.length > 0 ? toRiskMapping(framework, rows[0]) : null;
    },
    async findOne(framework, riskId, principleId) {
      const rows = await run<RiskMappingRow>(
        `SELECT * FROM ${framework}_risk_mappings WHERE risk_id = $1 AND principle_id = $2`,
        [riskId, principleId],
      );
      return rows.length > 0 ? toRiskMapping(framework, rows[0]) : null;
    },
    async findByRisk(framework, riskId) {
      const rows = await run<RiskMappingRow>(
        `SELECT * FROM ${framework}_risk_mappings WHERE risk_id = $1 ORDER BY id`,
        [riskId],
      );
      return rows.map((row) => toRiskMapping(framework, row));
    },
    async findAll(framework, riskIds) {
      const rows =
        riskIds === undefined
          ? await run<RiskMappingRow>(`SELECT * FROM ${framework}_risk_mappings ORDER BY id`)
          : await run<RiskMappingRow>(
              `SELECT * FROM ${framework}_risk_mappings WHERE risk_id = ANY($1::int[]) ORDER BY id`,
              [[...riskIds]],
            );
      return rows.map((row) => toRiskMapping(framework, row));
    },
    async create(data) {
      const rows = await run<RiskMappingRow>(
        `INSERT INTO ${data.framework}_risk_mappings (risk_id, principle_id, compliance_status, notes)
         VALUES ($1, $2, $3, $4) RETURNING *`,
        [data.riskId, data.principleId, data.complianceStatus, data.notes],
      );
      return toRiskMapping(data.framework, first(rows, `${data.framework}_mapping`, 0));
    },
    async update(framework, id, changes) {
      const set = setClause(MAPPING_COLUMNS, changes, 2);
      const rows =
        set === null
          ? await run<RiskMappingRow>(`SELECT * FROM ${framework}_risk_mappings WHERE id = $1`, [id])
          : await run<RiskMappingRow>(`UPDATE ${framework}_risk_mappings SET ${set.sql} WHERE id = $1 RETURNING *`, [
              id,
              ...set.params,
            ]);
      return toRiskMapping(framework, first(rows, `${framework}_mapping`, id));
    },
    async delete(framework, id) {
      await run(`DELETE FROM ${framework}_risk_mappings WHERE id = $1`, [id]);
    },
    async deleteByRisk(framework, riskId) {
      await run(`DELETE FROM ${framework}_risk_mappings WHERE risk_id = $1`, [riskId]);
    },
  };

  const actionMappings: ActionMappingRepository = {
    async findById(framework, id) {
      const rows = await run<ActionMappingRow>(`SELECT * FROM ${framework}_action_mappings WHERE id = $1`, [id]);
      return rows.length > 0 ? toActionMapping(framework, rows[0]) : null;
    },
    async findOne(framework, actionId, principleId) {
      const rows = await run<ActionMappingRow>(
        `SELECT * FROM ${framework}_action_mappings WHERE action_id = $1 AND principle_id = $2`,
        [actionId, principleId],
      );
      return rows.length > 0 ? toActionMapping(framework, rows[0]) : null;
    },
    async findByAction(framework, actionId) {
      const rows = await run<ActionMappingRow>(
        `SELECT * FROM ${framework}_action_mappings WHERE action_id = $1 ORDER BY id`,
        [actionId],
      );
      return rows.map((row) => toActionMapping(framework, row));
    },
    async findAll(framework) {
      const rows = await run<ActionMappingRow>(`SELECT * FROM ${framework}_action_mappings ORDER BY id`);
      return rows.map((row) => toActionMapping(framework, row));
    },
    async create(data) {
      const rows = await run<ActionMappingRow>(
        `INSERT INTO ${data.framework}_action_mappings (action_id, principle_id, notes)
         VALUES ($1, $2, $3) RETURNING *`,
        [data.actionId, data.principleId, data.notes],
      );
      return toActionMapping(data.framework, first(rows, `${data.framework}_action_mapping`, 0));
    },
    async delete(framework, id) {
      await run(`DELETE FROM ${framework}_action_mappings WHERE id = $1`, [id]);
    },
    async deleteByAction(framework, actionId) {
      await run(`DELETE FROM ${framework}_action_mappings WHERE action_id = $1`, [actionId]);
    },
  };

  const auditLogs: AuditLogRepository = {
    async insert(entry) {
      const rows = await run<AuditLogRow>(
        `INSERT INTO audit_logs
           (timestamp, actor_id, action, entity_type, entity_id, old_values, new_values, description, ip_address, user_agent)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10) RETURNING *`,
        [
          entry.timestamp,
          entry.actorId,
          entry.action,
          entry.entityType,
          entry.entityId,
          entry.oldValues,
          entry.newValues,
          entry.description,
          entry.ipAddress,
          entry.userAgent,
        ],
      );
      return toAuditLog(first(rows, 'audit_log', 0));
    },
    async find(filter, page) {
      const where = auditWhere(filter);
      const next = where.params.length + 1;
      const rows = await run<AuditLogRow>(
        `SELECT * FROM audit_logs ${where.sql}
         ORDER BY timestamp DESC, id DESC
         LIMIT $${next} OFFSET $${next + 1}`,
        [...where.params, page.limit, page.offset],
      );
      return rows.map(toAuditLog);
    },
    async count(filter) {
      const where = auditWhere(filter);
      const rows = await run<{ total: string }>(`SELECT COUNT(*) AS total FROM audit_logs ${where.sql}`, where.params);
      return rows.length > 0 ? Number(rows[0].total) : 0;
    },
  };

  return { projects, risks, actions, reviews, suppliers, assets, principles, riskMappings, actionMappings, auditLogs };
}

// ============================================
// Store
// ============================================

export interface PgStoreOptions {
  connectionString: string;
  poolMax: number;
  logger: Logger;
}

export class PgEntityStore implements EntityStore {
  private readonly pool: Pool;
  private readonly logger: Logger;
  private readonly repositories: UnitOfWork;

  constructor(options: PgStoreOptions) {
    this.pool = new pg.Pool({ connectionString: options.connectionString, max: options.poolMax });
    this.logger = options.logger;
    this.pool.on('error', (error) => this.logger.error('Idle PostgreSQL client error', { error: error.message }));
    this.repositories = bindRepositories(runner((sql, params) => this.pool.query(sql, params)));
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

  async transaction<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    const client: PoolClient = await this.pool.connect().catch((error: unknown) => {
      throw new StoreFailure(`Could not acquire a database connection: ${errorMessage(error)}`, error);
    });

    const run = runner((sql, params) => client.query(sql, params));
    try {
      await run('BEGIN');
      const result = await work(bindRepositories(run));
      await run('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        this.logger.error('Rollback failed', { error: errorMessage(rollbackError) });
      }
      if (error instanceof EngineError) throw error;
      throw new StoreFailure(`Transaction failed: ${errorMessage(error)}`, error);
    } finally {
      client.release();
    }
  }

  /** Applies a raw SQL script (used by the migration runner). */
  async execute(sql: string): Promise<void> {
    await runner((text, params) => this.pool.query(text, params))(sql);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
