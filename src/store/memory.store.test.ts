import { describe, it, expect } from 'vitest';
import { principle } from '../testing/fixtures.js';
import { NotFoundError } from '../utils/errors.js';
import { MemoryEntityStore } from './memory.store.js';
import type { NewRisk } from './types.js';

const newRisk = (title: string, overrides: Partial<NewRisk> = {}): NewRisk => ({
  title,
  description: null,
  projectId: null,
  ownerId: null,
  likelihood: 3,
  consequence: 3,
  targetLikelihood: null,
  targetConsequence: null,
  status: 'identified',
  acceptedById: null,
  acceptedAt: null,
  acceptanceRationale: null,
  acceptanceValidUntil: null,
  ...overrides,
});

const createStore = () => new MemoryEntityStore({ clock: () => new Date('2025-03-10T09:00:00.000Z') });

describe('MemoryEntityStore', () => {
  it('commits the working copy when the transaction resolves', async () => {
    const store = createStore();
    const created = await store.transaction(async (uow) => {
      const project = await uow.projects.create('Backbone');
      return uow.risks.create(newRisk('Fibre cut', { projectId: project.id }));
    });

    expect(created).toMatchObject({ id: 1, projectName: 'Backbone', createdAt: '2025-03-10T09:00:00.000Z' });
    expect(await store.risks.findById(1)).toEqual(created);
  });

  it('discards every write when the transaction rejects', async () => {
    const store = createStore();
    await store.risks.create(newRisk('Existing'));

    await expect(
      store.transaction(async (uow) => {
        await uow.risks.update(1, { title: 'Renamed' });
        await uow.risks.create(newRisk('Phantom'));
        throw new Error('abort');
      }),
    ).rejects.toThrow('abort');

    const risks = await store.risks.findMany();
    expect(risks.map((risk) => risk.title)).toEqual(['Existing']);
    expect((await store.risks.create(newRisk('Next'))).id).toBe(2);
  });

  it('runs transactions one at a time', async () => {
    const store = createStore();
    const events: string[] = [];
    let release = () => {};
    const gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });

    const first = store.transaction(async (uow) => {
      events.push('first:start');
      await gate;
      await uow.risks.create(newRisk('First'));
      events.push('first:end');
    });
    const second = store.transaction(async (uow) => {
      events.push('second:start');
      const seen = await uow.risks.findMany();
      events.push(`second:saw ${seen.length}`);
    });

    await Promise.resolve();
    release();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start', 'second:saw 1']);
  });

  it('keeps serving transactions after a rollback', async () => {
    const store = createStore();
    const failed = store.transaction(async () => {
      throw new Error('boom');
    });
    const next = store.transaction((uow) => uow.projects.create('Access'));

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toMatchObject({ id: 1, name: 'Access' });
  });

  it('returns copies that do not alias stored rows', async () => {
    const store = createStore();
    const created = await store.risks.create(newRisk('Original'));
    created.title = 'Mutated';

    const fetched = await store.risks.findById(1);
    expect(fetched?.title).toBe('Original');
  });

  it('numbers principles and mappings per framework', async () => {
    const store = createStore();
    const nsm = await store.principles.upsert(principle('nsm', '1.1', 'identify'));
    const ekom = await store.principles.upsert(principle('ekom', '2-1', 'security'));
    const again = await store.principles.upsert(principle('nsm', '1.1', 'identify', { title: 'Renamed' }));

    expect([nsm.id, ekom.id, again.id]).toEqual([1, 1, 1]);
    expect((await store.principles.findAll('nsm')).map((row) => row.title)).toEqual(['Renamed']);
  });

  it('raises NotFoundError when updating a missing row', async () => {
    const store = createStore();
    await expect(store.risks.update(9, { title: 'x' })).rejects.toBeInstanceOf(NotFoundError);
  });
});
