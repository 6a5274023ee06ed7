import { describe, it, expect } from 'vitest';
import { StoreFailure, ValidationError } from '../utils/errors.js';
import { ACTOR, createTestContext } from '../testing/fixtures.js';
import { deserializeValues, serializeValues } from './audit.service.js';

describe('AuditService', () => {
  it('returns the recorded old and new values from the entity history', async () => {
    const { store, services } = createTestContext();
    const oldValues = { status: 'identified', risk_score: 12, accepted: false, owner_id: null };
    const newValues = { status: 'treated', risk_score: 6, accepted: true, owner_id: 3 };

    await store.transaction((uow) => services.audit.logUpdate(uow, ACTOR, 'risk', 9, oldValues, newValues));
    const { entries, pagination } = await services.audit.history('risk', 9);

    expect(pagination).toEqual({ limit: 50, offset: 0, total: 1 });
    expect(entries[0]).toMatchObject({
      action: 'update',
      entityType: 'risk',
      entityId: 9,
      actorId: 42,
      ipAddress: '127.0.0.1',
      userAgent: 'vitest',
      description: 'Updated risk #9',
      timestamp: '2025-03-10T09:00:00.000Z',
      oldValues,
      newValues,
    });
  });

  it('stores an empty value map as null', async () => {
    const { store, services } = createTestContext();
    await store.transaction((uow) => services.audit.logCreate(uow, { actorId: null }, 'supplier', 1, {}));
    const [entry] = (await services.audit.history('supplier', 1)).entries;
    expect(entry.newValues).toBeNull();
    expect(entry.actorId).toBeNull();
  });

  it('discards entries written by a transaction that rolls back', async () => {
    const { store, services } = createTestContext();
    const failing = store.transaction(async (uow) => {
      await services.audit.logDelete(uow, ACTOR, 'risk', 3, { title: 'Gone' });
      throw new Error('abort');
    });

    await expect(failing).rejects.toThrow('abort');
    expect((await services.audit.recent()).pagination.total).toBe(0);
  });

  it('lists newest first, breaking timestamp ties by id', async () => {
    const { store, services, clock } = createTestContext();
    await store.transaction((uow) => services.audit.logCreate(uow, ACTOR, 'risk', 1));
    await store.transaction((uow) => services.audit.logCreate(uow, ACTOR, 'risk', 2));
    clock.set('2025-03-11T09:00:00.000Z');
    await store.transaction((uow) => services.audit.logCreate(uow, ACTOR, 'risk', 3));
    clock.set('2025-03-09T09:00:00.000Z');
    await store.transaction((uow) => services.audit.logCreate(uow, ACTOR, 'risk', 4));

    const { entries } = await services.audit.activity(42);
    expect(entries.map((entry) => entry.entityId)).toEqual([3, 2, 1, 4]);
  });

  it('pages with limit and offset and caps the limit', async () => {
    const { store, services } = createTestContext({ env: { AUDIT_MAX_PAGE_SIZE: '3', AUDIT_DEFAULT_PAGE_SIZE: '2' } });
    for (let id = 1; id <= 5; id++) {
      await store.transaction((uow) => services.audit.logCreate(uow, ACTOR, 'action', id));
    }

    const first = await services.audit.recent();
    expect(first.entries.map((entry) => entry.entityId)).toEqual([5, 4]);
    expect(first.pagination).toEqual({ limit: 2, offset: 0, total: 5 });

    const capped = await services.audit.recent({ limit: 10, offset: 3 });
    expect(capped.entries.map((entry) => entry.entityId)).toEqual([2, 1]);
    expect(capped.pagination).toEqual({ limit: 3, offset: 3, total: 5 });

    await expect(services.audit.recent({ limit: 0 })).rejects.toThrow(ValidationError);
    await expect(services.audit.recent({ offset: -1 })).rejects.toThrow(ValidationError);
  });

  it('filters recent entries by action', async () => {
    const { store, services } = createTestContext();
    await store.transaction((uow) => services.audit.logCreate(uow, ACTOR, 'risk', 1));
    await services.audit.logExport(ACTOR, 'risk', 'csv');
    await services.audit.logLogin(ACTOR, 42, 'analyst');

    const exports = await services.audit.recent({}, { action: 'export' });
    expect(exports.entries).toHaveLength(1);
    expect(exports.entries[0]).toMatchObject({
      entityType: 'risk',
      entityId: null,
      newValues: { format: 'csv' },
      description: 'Exported risk as csv',
    });
    const logins = await services.audit.recent({}, { entityType: 'user' });
    expect(logins.entries[0].description).toBe('User analyst logged in');
  });

  describe('value serialization', () => {
    it('rejects nested values', () => {
      const nested = JSON.parse('{"ok":1,"nested":{"a":1}}');
      expect(() => serializeValues(nested)).toThrow(ValidationError);
    });

    it('reports corrupt stored values as a store failure', () => {
      expect(() => deserializeValues('{not json')).toThrow(StoreFailure);
      expect(() => deserializeValues('[1,2]')).toThrow(StoreFailure);
      expect(deserializeValues('{"a":"b"}')).toEqual({ a: 'b' });
    });
  });
});
