import { describe, it, expect } from 'vitest';
import { ACTOR, createTestContext } from '../testing/fixtures.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import { isOverdue } from './action.service.js';

describe('ActionService', () => {
  it('counts an open action past its due date as overdue', () => {
    expect(isOverdue({ status: 'planned', dueDate: '2025-03-09' }, '2025-03-10')).toBe(true);
    expect(isOverdue({ status: 'in_progress', dueDate: '2025-03-10' }, '2025-03-10')).toBe(false);
    expect(isOverdue({ status: 'done', dueDate: '2025-03-01' }, '2025-03-10')).toBe(false);
    expect(isOverdue({ status: 'cancelled', dueDate: '2025-03-01' }, '2025-03-10')).toBe(false);
    expect(isOverdue({ status: 'planned', dueDate: null }, '2025-03-10')).toBe(false);
  });

  it('rejects links to unknown risks without creating the action', async () => {
    const { services } = createTestContext();
    await expect(
      services.actions.createAction({ title: 'Harden BGP sessions', riskIds: [5] }, ACTOR),
    ).rejects.toBeInstanceOf(ValidationError);
    expect(await services.actions.listActions()).toEqual([]);
  });

  it('stamps and clears completion as the status moves through done', async () => {
    const { services, clock } = createTestContext();
    const action = await services.actions.createAction({ title: 'Rotate keys', dueDate: '2025-03-01' }, ACTOR);
    expect(action).toMatchObject({ status: 'planned', priority: 'medium', overdue: true, completedAt: null });
    expect((await services.actions.listOverdue()).map((row) => row.id)).toEqual([action.id]);

    clock.set('2025-03-11T12:00:00.000Z');
    const done = await services.actions.changeStatus(action.id, 'done', ACTOR);
    expect(done).toMatchObject({ status: 'done', completedAt: '2025-03-11T12:00:00.000Z', overdue: false });
    expect(await services.actions.listOverdue()).toEqual([]);

    const reopened = await services.actions.changeStatus(action.id, 'in_progress', ACTOR);
    expect(reopened.completedAt).toBeNull();

    const { entries } = await services.audit.history('action', action.id);
    expect(entries[1]).toMatchObject({
      action: 'update',
      oldValues: { status: 'planned' },
      newValues: { status: 'done' },
    });
  });

  it('replaces risk links and records them on the update entry', async () => {
    const { services } = createTestContext();
    const first = await services.risks.createRisk({ title: 'Power loss', likelihood: 2, consequence: 4 }, ACTOR);
    const second = await services.risks.createRisk({ title: 'Flooding', likelihood: 1, consequence: 5 }, ACTOR);
    const action = await services.actions.createAction({ title: 'Install UPS', riskIds: [first.id] }, ACTOR);

    const updated = await services.actions.updateAction(action.id, { riskIds: [second.id, first.id] }, ACTOR);
    expect(updated.riskIds).toEqual([first.id, second.id]);
    expect((await services.actions.listActions({ riskId: second.id })).map((row) => row.id)).toEqual([action.id]);

    const { entries } = await services.audit.history('action', action.id);
    expect(entries[0].newValues).toEqual({ risk_ids: '2,1' });
    expect(entries[0].oldValues).toBeNull();
  });

  it('deletes an action with its links', async () => {
    const { services } = createTestContext();
    const risk = await services.risks.createRisk({ title: 'Power loss', likelihood: 2, consequence: 4 }, ACTOR);
    const action = await services.actions.createAction({ title: 'Install UPS', riskIds: [risk.id] }, ACTOR);

    await services.actions.deleteAction(action.id, ACTOR);

    await expect(services.actions.getAction(action.id)).rejects.toBeInstanceOf(NotFoundError);
    expect(await services.actions.listActions({ riskId: risk.id })).toEqual([]);
  });
});
