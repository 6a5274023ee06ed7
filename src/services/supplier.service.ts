import type { EntityStore, NewSupplier, SupplierChanges, SupplierRecord } from '../store/types.js';
import { parseIsoDate, toIsoDate, type IsoDate } from '../utils/dates.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import type { AuditContext, AuditService, AuditValues } from './audit.service.js';

export interface SupplierInput {
  name: string;
  criticality: number;
  contractEndDate?: IsoDate | null;
  lastAssessedAt?: IsoDate | null;
  isExternal?: boolean;
}

export type SupplierPatch = Partial<SupplierInput>;

const ENTITY = 'supplier';

const AUDITED_FIELDS = {
  name: 'name',
  criticality: 'criticality',
  contract_end_date: 'contractEndDate',
  last_assessed_at: 'lastAssessedAt',
  is_external: 'isExternal',
} as const satisfies Record<string, keyof NewSupplier>;

function assertCriticality(value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || value > 5) {
    throw ValidationError.field('criticality', 'criticality must be an integer between 1 and 5');
  }
  return value;
}

const optionalDate = (value: IsoDate | null | undefined, field: string): IsoDate | null =>
  value === undefined || value === null ? null : parseIsoDate(value, field);

export class SupplierService {
  constructor(
    private readonly store: EntityStore,
    private readonly audit: AuditService,
    private readonly clock: () => Date,
  ) {}

  async getSupplier(id: number): Promise<SupplierRecord> {
    const supplier = await this.store.suppliers.findById(id);
    if (!supplier) throw new NotFoundError(ENTITY, id);
    return supplier;
  }

  listSuppliers(): Promise<SupplierRecord[]> {
    return this.store.suppliers.findAll();
  }

  async createSupplier(input: SupplierInput, context: AuditContext): Promise<SupplierRecord> {
    if (typeof input.name !== 'string' || input.name.trim().length === 0) {
      throw ValidationError.field('name', 'name is required');
    }
    const data: NewSupplier = {
      name: input.name.trim(),
      criticality: assertCriticality(input.criticality),
      contractEndDate: optionalDate(input.contractEndDate, 'contractEndDate'),
      lastAssessedAt: optionalDate(input.lastAssessedAt, 'lastAssessedAt'),
      isExternal: input.isExternal ?? false,
    };
    return this.store.transaction(async (uow) => {
      const supplier = await uow.suppliers.create(data);
      await this.audit.logCreate(uow, context, ENTITY, supplier.id, {
        name: supplier.name,
        criticality: supplier.criticality,
        contract_end_date: supplier.contractEndDate,
      });
      return supplier;
    });
  }

  async updateSupplier(id: number, patch: SupplierPatch, context: AuditContext): Promise<SupplierRecord> {
    const changes: SupplierChanges = {};
    if (patch.name !== undefined) {
      if (patch.name.trim().length === 0) throw ValidationError.field('name', 'name is required');
      changes.name = patch.name.trim();
    }
    if (patch.criticality !== undefined) changes.criticality = assertCriticality(patch.criticality);
    if (patch.contractEndDate !== undefined) {
      changes.contractEndDate = optionalDate(patch.contractEndDate, 'contractEndDate');
    }
    if (patch.lastAssessedAt !== undefined) changes.lastAssessedAt = optionalDate(patch.lastAssessedAt, 'lastAssessedAt');
    if (patch.isExternal !== undefined) changes.isExternal = patch.isExternal;

    return this.store.transaction(async (uow) => {
      const existing = await uow.suppliers.findById(id);
      if (!existing) throw new NotFoundError(ENTITY, id);
      const updated = await uow.suppliers.update(id, changes);
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

  /** Stamps the date of the latest supplier assessment (today by default). */
  recordAssessment(id: number, assessedOn: IsoDate | undefined, context: AuditContext): Promise<SupplierRecord> {
    return this.updateSupplier(id, { lastAssessedAt: assessedOn ?? toIsoDate(this.clock()) }, context);
  }

  async deleteSupplier(id: number, context: AuditContext): Promise<void> {
    await this.store.transaction(async (uow) => {
      const existing = await uow.suppliers.findById(id);
      if (!existing) throw new NotFoundError(ENTITY, id);
      await uow.suppliers.delete(id);
      await this.audit.logDelete(uow, context, ENTITY, id, { name: existing.name, criticality: existing.criticality });
    });
  }
}
