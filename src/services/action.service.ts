import {
  ACTION_PRIORITIES,
  ACTION_STATUSES,
  CLOSED_ACTION_STATUSES,
  parseEnum,
  type ActionPriority,
  type ActionStatus,
} from '../constants/enums.js';
import type { ActionChanges, ActionRecord, EntityStore, NewAction, UnitOfWork } from '../store/types.js';
import { parseIsoDate, toIsoDate, type IsoDate } from '../utils/dates.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import type { AuditContext, AuditService, AuditValues } from './audit.service.js';

export interface ActionInput {
  title: string;
  description?: string | null;
  status?: ActionStatus;
  priority?: ActionPriority;
  ownerId?: number | null;
  dueDate?: IsoDate | null;
  riskIds?: number[];
}

export type ActionPatch = Partial<ActionInput>;

export interface ActionView extends ActionRecord {
  riskIds: number[];
  overdue: boolean;
}

const ENTITY = 'action';

const AUDITED_FIELDS = {
  title: 'title',
  description: 'description',
  status: 'status',
  priority: 'priority',
  owner_id: 'ownerId',
  due_date: 'dueDate',
} as const satisfies Record<string, keyof NewAction>;

export const isOverdue = (action: Pick<ActionRecord, 'status' | 'dueDate'>, today: IsoDate): boolean =>
  action.dueDate !== null && action.dueDate < today && !CLOSED_ACTION_STATUSES.includes(action.status);

export class ActionService {
  constructor(
    private readonly store: EntityStore,
    private readonly audit: AuditService,
    private readonly clock: () => Date,
  ) {}

  private today(): IsoDate {
    return toIsoDate(this.clock());
  }

  private async toView(uow: UnitOfWork, action: ActionRecord): Promise<ActionView> {
    return { ...action, riskIds: await uow.actions.findRiskIds(action.id), overdue: isOverdue(action, this.today()) };
  }

  async getAction(id: number): Promise<ActionView> {
    const action = await this.store.actions.findById(id);
    if (!action) throw new NotFoundError(ENTITY, id);
    return this.toView(this.store, action);
  }

  async listActions(filter: { status?: ActionStatus; riskId?: number } = {}): Promise<ActionView[]> {
    const actions = await this.store.actions.findMany({
      ...(filter.status !== undefined && { statuses: [filter.status] }),
      ...(filter.riskId !== undefined && { riskId: filter.riskId }),
    });
    return Promise.all(actions.map((action) => this.toView(this.store, action)));
  }

  async listOverdue(): Promise<ActionView[]> {
    const today = this.today();
    const actions = await this.store.actions.findMany();
    const overdue = actions.filter((action) => isOverdue(action, today));
    return Promise.all(overdue.map((action) => this.toView(this.store, action)));
  }

  async createAction(input: ActionInput, context: AuditContext): Promise<ActionView> {
    if (typeof input.title !== 'string' || input.title.trim().length === 0) {
      throw ValidationError.field('title', 'title is required');
    }
    const status = input.status === undefined ? 'planned' : parseEnum(ACTION_STATUSES, input.status, 'status');
    const data: NewAction = {
      title: input.title.trim(),
      description: input.description ?? null,
      status,
      priority: input.priority === undefined ? 'medium' : parseEnum(ACTION_PRIORITIES, input.priority, 'priority'),
      ownerId: input.ownerId ?? null,
      dueDate: input.dueDate === undefined || input.dueDate === null ? null : parseIsoDate(input.dueDate, 'dueDate'),
      completedAt: status === 'done' ? this.clock().toISOString() : null,
    };

    return this.store.transaction(async (uow) => {
      const action = await uow.actions.create(data);
      if (input.riskIds) await this.linkRisks(uow, action.id, input.riskIds);
      await this.audit.logCreate(uow, context, ENTITY, action.id, {
        title: action.title,
        status: action.status,
        priority: action.priority,
        due_date: action.dueDate,
      });
      return this.toView(uow, action);
    });
  }

  async updateAction(id: number, patch: ActionPatch, context: AuditContext): Promise<ActionView> {
    return this.store.transaction(async (uow) => {
      const existing = await uow.actions.findById(id);
      if (!existing) throw new NotFoundError(ENTITY, id);

      const changes: ActionChanges = {};
      if (patch.title !== undefined) {
        if (patch.title.trim().length === 0) throw ValidationError.field('title', 'title is required');
        changes.title = patch.title.trim();
      }
      if (patch.description !== undefined) changes.description = patch.description;
      if (patch.priority !== undefined) changes.priority = parseEnum(ACTION_PRIORITIES, patch.priority, 'priority');
      if (patch.ownerId !== undefined) changes.ownerId = patch.ownerId;
      if (patch.dueDate !== undefined) {
        changes.dueDate = patch.dueDate === null ? null : parseIsoDate(patch.dueDate, 'dueDate');
      }
      if (patch.status !== undefined) {
        const status = parseEnum(ACTION_STATUSES, patch.status, 'status');
        changes.status = status;
        if (status === 'done' && existing.status !== 'done') changes.completedAt = this.clock().toISOString();
        if (status !== 'done' && existing.status === 'done') changes.completedAt = null;
      }

      const updated = await uow.actions.update(id, changes);
      if (patch.riskIds !== undefined) await this.linkRisks(uow, id, patch.riskIds);

      const oldValues: AuditValues = {};
      const newValues: AuditValues = {};
      for (const [auditKey, field] of Object.entries(AUDITED_FIELDS)) {
        if (existing[field] !== updated[field]) {
          oldValues[auditKey] = existing[field];
          newValues[auditKey] = updated[field];
        }
      }
      if (Object.keys(newValues).length > 0 || patch.riskIds !== undefined) {
        if (patch.riskIds !== undefined) newValues.risk_ids = patch.riskIds.join(',');
        await this.audit.logUpdate(uow, context, ENTITY, id, oldValues, newValues);
      }
      return this.toView(uow, updated);
    });
  }

  changeStatus(id: number, status: ActionStatus, context: AuditContext): Promise<ActionView> {
    return this.updateAction(id, { status }, context);
  }

  async deleteAction(id: number, context: AuditContext): Promise<void> {
    await this.store.transaction(async (uow) => {
      const existing = await uow.actions.findById(id);
      if (!existing) throw new NotFoundError(ENTITY, id);
      await uow.actionMappings.deleteByAction('nsm', id);
      await uow.actionMappings.deleteByAction('ekom', id);
      await uow.actions.setRiskLinks(id, []);
      await uow.actions.delete(id);
      await this.audit.logDelete(uow, context, ENTITY, id, { title: existing.title, status: existing.status });
    });
  }

  private async linkRisks(uow: UnitOfWork, actionId: number, riskIds: readonly number[]): Promise<void> {
    const missing: number[] = [];
    for (const riskId of riskIds) {
      if (!(await uow.risks.findById(riskId))) missing.push(riskId);
    }
    if (missing.length > 0) throw ValidationError.field('riskIds', `Unknown risk ids: ${missing.join(', ')}`);
    await uow.actions.setRiskLinks(actionId, riskIds);
  }
}
