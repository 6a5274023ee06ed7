import type { AuditConfig } from '../config/index.js';
import type { AuditAction } from '../constants/enums.js';
import type { AuditFilter, AuditLogRecord, EntityStore, UnitOfWork } from '../store/types.js';
import { StoreFailure, ValidationError } from '../utils/errors.js';

export type AuditScalar = string | number | boolean | null;
export type AuditValues = Record<string, AuditScalar>;

/** Who performed a mutation and from where. `actorId` is null for system actions. */
export interface AuditContext {
  actorId: number | null;
  ipAddress?: string | null;
  userAgent?: string | null;
}

export interface AuditEntry {
  id: number;
  timestamp: string;
  actorId: number | null;
  action: AuditAction;
  entityType: string;
  entityId: number | null;
  oldValues: AuditValues | null;
  newValues: AuditValues | null;
  description: string;
  ipAddress: string | null;
  userAgent: string | null;
}

export interface AuditPage {
  entries: AuditEntry[];
  pagination: { limit: number; offset: number; total: number };
}

export interface PageRequest {
  limit?: number;
  offset?: number;
}

export interface RecordInput {
  action: AuditAction;
  entityType: string;
  entityId: number | null;
  oldValues?: AuditValues | null;
  newValues?: AuditValues | null;
  description: string;
}

// ============================================
// Value serialization
// ============================================

const isScalar = (value: unknown): value is AuditScalar =>
  value === null ||
  typeof value === 'string' ||
  typeof value === 'boolean' ||
  (typeof value === 'number' && Number.isFinite(value));

/** JSON text for a flat scalar map; null when there is nothing to record. */
export function serializeValues(values: AuditValues | null | undefined): string | null {
  if (values === null || values === undefined) return null;
  const entries = Object.entries(values);
  if (entries.length === 0) return null;
  const invalid = entries.filter(([, value]) => !isScalar(value)).map(([key]) => key);
  if (invalid.length > 0) {
    throw new ValidationError(
      'Audit values must be flat scalars',
      invalid.map((key) => ({ field: key, message: 'Value must be a string, finite number, boolean or null' })),
    );
  }
  return JSON.stringify(values);
}

export function deserializeValues(text: string | null): AuditValues | null {
  if (text === null) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new StoreFailure('Stored audit values are not valid JSON', error);
  }
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new StoreFailure('Stored audit values are not an object', parsed);
  }
  const values: AuditValues = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!isScalar(value)) throw new StoreFailure(`Stored audit value '${key}' is not a scalar`, value);
    values[key] = value;
  }
  return values;
}

const toEntry = (record: AuditLogRecord): AuditEntry => ({
  ...record,
  oldValues: deserializeValues(record.oldValues),
  newValues: deserializeValues(record.newValues),
});

// ============================================
// Service
// ============================================

/**
 * Append-only audit trail. Writers take the caller's UnitOfWork so an entry
 * commits or rolls back together with the mutation it describes.
 */
export class AuditService {
  constructor(
    private readonly store: EntityStore,
    private readonly config: AuditConfig,
    private readonly clock: () => Date,
  ) {}

  async record(uow: UnitOfWork, context: AuditContext, input: RecordInput): Promise<AuditEntry> {
    const record = await uow.auditLogs.insert({
      timestamp: this.clock().toISOString(),
      actorId: context.actorId,
      action: input.action,
      entityType: input.entityType,
      entityId: input.entityId,
      oldValues: serializeValues(input.oldValues),
      newValues: serializeValues(input.newValues),
      description: input.description,
      ipAddress: context.ipAddress ?? null,
      userAgent: context.userAgent ?? null,
    });
    return toEntry(record);
  }

  logCreate(uow: UnitOfWork, context: AuditContext, entityType: string, entityId: number, values?: AuditValues) {
    return this.record(uow, context, {
      action: 'create',
      entityType,
      entityId,
      newValues: values,
      description: `Created ${entityType} #${entityId}`,
    });
  }

  logUpdate(
    uow: UnitOfWork,
    context: AuditContext,
    entityType: string,
    entityId: number,
    oldValues: AuditValues,
    newValues: AuditValues,
  ) {
    return this.record(uow, context, {
      action: 'update',
      entityType,
      entityId,
      oldValues,
      newValues,
      description: `Updated ${entityType} #${entityId}`,
    });
  }

  logDelete(uow: UnitOfWork, context: AuditContext, entityType: string, entityId: number, values?: AuditValues) {
    return this.record(uow, context, {
      action: 'delete',
      entityType,
      entityId,
      oldValues: values,
      description: `Deleted ${entityType} #${entityId}`,
    });
  }

  logApprove(uow: UnitOfWork, context: AuditContext, entityType: string, entityId: number, rationale: string) {
    return this.record(uow, context, {
      action: 'approve',
      entityType,
      entityId,
      newValues: { rationale },
      description: `Approved ${entityType} #${entityId}`,
    });
  }

  logLogin(context: AuditContext, userId: number, username: string) {
    return this.store.transaction((uow) =>
      this.record(uow, context, {
        action: 'login',
        entityType: 'user',
        entityId: userId,
        description: `User ${username} logged in`,
      }),
    );
  }

  logLogout(context: AuditContext, userId: number, username: string) {
    return this.store.transaction((uow) =>
      this.record(uow, context, {
        action: 'logout',
        entityType: 'user',
        entityId: userId,
        description: `User ${username} logged out`,
      }),
    );
  }

  logExport(context: AuditContext, entityType: string, format: string) {
    return this.store.transaction((uow) =>
      this.record(uow, context, {
        action: 'export',
        entityType,
        entityId: null,
        newValues: { format },
        description: `Exported ${entityType} as ${format}`,
      }),
    );
  }

  // ============================================
  // Queries (newest first)
  // ============================================

  history(entityType: string, entityId: number, page: PageRequest = {}): Promise<AuditPage> {
    return this.query({ entityType, entityId }, page);
  }

  activity(actorId: number, page: PageRequest = {}): Promise<AuditPage> {
    return this.query({ actorId }, page);
  }

  recent(page: PageRequest = {}, filter: Pick<AuditFilter, 'action' | 'entityType'> = {}): Promise<AuditPage> {
    return this.query(filter, page);
  }

  private resolvePage(page: PageRequest): { limit: number; offset: number } {
    const limit = page.limit ?? this.config.defaultPageSize;
    const offset = page.offset ?? 0;
    if (!Number.isInteger(limit) || limit < 1) throw ValidationError.field('limit', 'limit must be a positive integer');
    if (!Number.isInteger(offset) || offset < 0) {
      throw ValidationError.field('offset', 'offset must be a non-negative integer');
    }
    return { limit: Math.min(limit, this.config.maxPageSize), offset };
  }

  private async query(filter: AuditFilter, request: PageRequest): Promise<AuditPage> {
    const page = this.resolvePage(request);
    const [records, total] = await Promise.all([
      this.store.auditLogs.find(filter, page),
      this.store.auditLogs.count(filter),
    ]);
    return { entries: records.map(toEntry), pagination: { ...page, total } };
  }
}
