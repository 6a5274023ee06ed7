import { describe, it, expect } from 'vitest';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors.js';
import { ACTOR, addPrinciples, createTestContext, principle } from '../testing/fixtures.js';
import type { TestContext } from '../testing/fixtures.js';

const RATIONALE = 'mitigations insufficient; residual risk tolerable';

async function seedRisks(ctx: TestContext, count: number) {
  for (let i = 1; i <= count; i++) {
    await ctx.services.risks.createRisk({ title: `Risk ${i}`, likelihood: 2, consequence: 3 }, ACTOR);
  }
}

describe('RiskService', () => {
  describe('createRisk', () => {
    it('derives score, band and target band and audits the creation', async () => {
      const { services } = createTestContext();
      const risk = await services.risks.createRisk(
        { title: '  Base station power loss ', likelihood: 5, consequence: 4, targetLikelihood: 2, targetConsequence: 2 },
        ACTOR,
      );

      expect(risk).toMatchObject({
        id: 1,
        title: 'Base station power loss',
        status: 'identified',
        score: 20,
        band: 'high',
        color: 'red',
        targetScore: 4,
        targetBand: 'acceptable',
        nsmPrincipleIds: [],
        ekomPrincipleIds: [],
        assetIds: [],
      });
      const [entry] = (await services.audit.history('risk', 1)).entries;
      expect(entry.newValues).toEqual({
        title: 'Base station power loss',
        likelihood: 5,
        consequence: 4,
        risk_score: 20,
        status: 'identified',
      });
    });

    it('requires both target ratings or neither', async () => {
      const { services } = createTestContext();
      await expect(
        services.risks.createRisk({ title: 'Half target', likelihood: 3, consequence: 3, targetLikelihood: 2 }, ACTOR),
      ).rejects.toThrow(ValidationError);
    });

    it('rejects out-of-range ratings, accepted status and unknown projects', async () => {
      const { services } = createTestContext();
      await expect(services.risks.createRisk({ title: 'x', likelihood: 6, consequence: 1 }, ACTOR)).rejects.toThrow(
        ValidationError,
      );
      await expect(
        services.risks.createRisk({ title: 'x', likelihood: 1, consequence: 1, status: 'accepted' }, ACTOR),
      ).rejects.toThrow(ValidationError);
      await expect(
        services.risks.createRisk({ title: 'x', likelihood: 1, consequence: 1, projectId: 3 }, ACTOR),
      ).rejects.toThrow(ValidationError);
      expect(await services.risks.listRisks()).toEqual([]);
    });

    it('maps the risk to principles of both frameworks', async () => {
      const { store, services } = createTestContext();
      await addPrinciples(store, [principle('nsm', '1.6', 'identify'), principle('ekom', '2-6', 'documentation')]);
      const risk = await services.risks.createRisk(
        { title: 'Unassessed supplier access', likelihood: 3, consequence: 4, nsmPrincipleIds: [1], ekomPrincipleIds: [1] },
        ACTOR,
      );
      expect(risk.nsmPrincipleIds).toEqual([1]);
      expect(risk.ekomPrincipleIds).toEqual([1]);
    });
  });

  describe('updateRisk', () => {
    it('records only the fields that changed', async () => {
      const { services } = createTestContext();
      const risk = await services.risks.createRisk({ title: 'Cable theft', likelihood: 3, consequence: 3 }, ACTOR);
      const updated = await services.risks.updateRisk(risk.id, { likelihood: 4, title: 'Cable theft' }, ACTOR);

      expect(updated).toMatchObject({ likelihood: 4, score: 12, band: 'medium' });
      const [entry] = (await services.audit.history('risk', risk.id)).entries;
      expect(entry.action).toBe('update');
      expect(entry.oldValues).toEqual({ likelihood: 3 });
      expect(entry.newValues).toEqual({ likelihood: 4 });
    });

    it('writes no entry when nothing changed', async () => {
      const { services } = createTestContext();
      const risk = await services.risks.createRisk({ title: 'Cable theft', likelihood: 3, consequence: 3 }, ACTOR);
      await services.risks.updateRisk(risk.id, { consequence: 3 }, ACTOR);
      expect((await services.audit.history('risk', risk.id)).pagination.total).toBe(1);
    });

    it('rejects clearing one half of the target pair', async () => {
      const { services } = createTestContext();
      const risk = await services.risks.createRisk(
        { title: 'Spoofed SMS', likelihood: 3, consequence: 3, targetLikelihood: 1, targetConsequence: 2 },
        ACTOR,
      );
      await expect(services.risks.updateRisk(risk.id, { targetLikelihood: null }, ACTOR)).rejects.toThrow(ValidationError);
      const cleared = await services.risks.updateRisk(risk.id, { targetLikelihood: null, targetConsequence: null }, ACTOR);
      expect(cleared.targetScore).toBeNull();
    });

    it('leaves updatedAt alone when only mappings are replaced', async () => {
      const { store, services, clock } = createTestContext();
      await addPrinciples(store, [principle('nsm', '1.1', 'identify')]);
      const risk = await services.risks.createRisk({ title: 'Cable theft', likelihood: 3, consequence: 3 }, ACTOR);
      clock.set('2025-03-11T12:00:00.000Z');

      const untouched = await services.risks.updateRisk(risk.id, {}, ACTOR);
      expect(untouched.updatedAt).toBe('2025-03-10T09:00:00.000Z');
      const mapped = await services.risks.updateRisk(risk.id, { nsmPrincipleIds: [1] }, ACTOR);
      expect(mapped.updatedAt).toBe('2025-03-10T09:00:00.000Z');
      expect(mapped.nsmPrincipleIds).toEqual([1]);

      const retitled = await services.risks.updateRisk(risk.id, { title: 'Copper theft' }, ACTOR);
      expect(retitled.updatedAt).toBe('2025-03-11T12:00:00.000Z');
    });

    it('treats a reordered mapping list as unchanged and records sorted id sets', async () => {
      const { store, services } = createTestContext();
      await addPrinciples(store, [
        principle('nsm', '1.1', 'identify'),
        principle('nsm', '1.2', 'identify'),
        principle('nsm', '1.3', 'identify'),
      ]);
      const risk = await services.risks.createRisk(
        { title: 'Flat network', likelihood: 3, consequence: 4, nsmPrincipleIds: [1, 2] },
        ACTOR,
      );

      await services.risks.updateRisk(risk.id, { nsmPrincipleIds: [2, 1] }, ACTOR);
      expect((await services.audit.history('risk', risk.id)).pagination.total).toBe(1);

      await services.risks.updateRisk(risk.id, { nsmPrincipleIds: [3, 1] }, ACTOR);
      const [entry] = (await services.audit.history('risk', risk.id)).entries;
      expect(entry.oldValues).toEqual({ nsm_principle_ids: '1,2' });
      expect(entry.newValues).toEqual({ nsm_principle_ids: '1,3' });
    });

    it('refuses to move an accepted risk to another status without revoking', async () => {
      const { services } = createTestContext();
      const risk = await services.risks.createRisk({ title: 'Legacy SS7 filter', likelihood: 2, consequence: 3 }, ACTOR);
      await services.risks.acceptRisk(risk.id, { rationale: RATIONALE }, ACTOR);

      await expect(services.risks.updateRisk(risk.id, { status: 'mitigated' }, ACTOR)).rejects.toThrow(ConflictError);

      const still = await services.risks.getRisk(risk.id);
      expect(still).toMatchObject({ status: 'accepted', acceptedById: 42, acceptanceRationale: RATIONALE });
      const retitled = await services.risks.updateRisk(risk.id, { title: 'Legacy SS7 filtering', status: 'accepted' }, ACTOR);
      expect(retitled).toMatchObject({ title: 'Legacy SS7 filtering', status: 'accepted', acceptanceRationale: RATIONALE });
    });
  });

  describe('asset links', () => {
    it('links assets on create and replaces them on update with an audit entry', async () => {
      const { services } = createTestContext();
      await services.assets.createAsset({ name: 'Core router OSL-1', assetType: 'physical', category: 'core_network' }, ACTOR);
      await services.assets.createAsset({ name: 'RAN site 17', assetType: 'location', category: 'radio' }, ACTOR);

      const risk = await services.risks.createRisk(
        { title: 'Router firmware unpatched', likelihood: 3, consequence: 4, assetIds: [1] },
        ACTOR,
      );
      expect(risk.assetIds).toEqual([1]);

      const updated = await services.risks.updateRisk(risk.id, { assetIds: [2, 1] }, ACTOR);
      expect(updated.assetIds).toEqual([1, 2]);
      const [entry] = (await services.audit.history('risk', risk.id)).entries;
      expect(entry.oldValues).toEqual({ asset_ids: '1' });
      expect(entry.newValues).toEqual({ asset_ids: '1,2' });

      expect((await services.assets.listRisksForAsset(2)).map((linked) => linked.id)).toEqual([risk.id]);
    });

    it('rejects unknown assets and keeps the risk unchanged', async () => {
      const { services } = createTestContext();
      const risk = await services.risks.createRisk({ title: 'Fibre cut', likelihood: 3, consequence: 3 }, ACTOR);
      await expect(
        services.risks.updateRisk(risk.id, { title: 'Fibre cut on E6', assetIds: [9] }, ACTOR),
      ).rejects.toThrow(ValidationError);
      expect((await services.risks.getRisk(risk.id)).title).toBe('Fibre cut');
      await expect(
        services.risks.createRisk({ title: 'x', likelihood: 1, consequence: 1, assetIds: [4] }, ACTOR),
      ).rejects.toThrow(ValidationError);
    });
  });

  describe('filters and matrix', () => {
    it('filters by band and status and builds the matrix per project', async () => {
      const { services } = createTestContext();
      const project = await services.projects.createProject('Backbone', ACTOR);
      await services.risks.createRisk({ title: 'A', likelihood: 5, consequence: 5, projectId: project.id }, ACTOR);
      await services.risks.createRisk({ title: 'B', likelihood: 1, consequence: 2 }, ACTOR);
      await services.risks.createRisk({ title: 'C', likelihood: 2, consequence: 5, status: 'mitigated' }, ACTOR);

      expect((await services.risks.listRisks({ band: 'high' })).map((risk) => risk.title)).toEqual(['A']);
      expect((await services.risks.listRisks({ status: 'mitigated' })).map((risk) => risk.title)).toEqual(['C']);

      const matrix = await services.risks.getRiskMatrix({ projectId: project.id });
      expect(matrix.total).toBe(1);
      expect(matrix.rows[0][4].risks).toEqual([{ id: 1, title: 'A', projectName: 'Backbone' }]);

      expect(await services.risks.getRiskDistribution()).toEqual({ acceptable: 1, low: 0, medium: 1, high: 1, total: 3 });
    });

    it('fails the matrix on a stored rating outside 1..5', async () => {
      const { store, services } = createTestContext();
      await store.transaction((uow) =>
        uow.risks.create({
          title: 'Imported with a bad rating',
          description: null,
          projectId: null,
          ownerId: null,
          likelihood: 6,
          consequence: 2,
          targetLikelihood: null,
          targetConsequence: null,
          status: 'identified',
          acceptedById: null,
          acceptedAt: null,
          acceptanceRationale: null,
          acceptanceValidUntil: null,
        }),
      );
      await expect(services.risks.getRiskMatrix()).rejects.toThrow(ValidationError);
      await expect(services.risks.getRiskDistribution()).rejects.toThrow(ValidationError);
    });
  });

  describe('acceptance', () => {
    it('accepts and then revokes risk 7 with a matching audit trail', async () => {
      const ctx = createTestContext();
      const { services } = ctx;
      await seedRisks(ctx, 7);

      const accepted = await services.risks.acceptRisk(7, { rationale: RATIONALE, validUntil: '2025-12-31' }, ACTOR);
      expect(accepted).toMatchObject({
        id: 7,
        status: 'accepted',
        acceptedById: 42,
        acceptedAt: '2025-03-10T09:00:00.000Z',
        acceptanceRationale: RATIONALE,
        acceptanceValidUntil: '2025-12-31',
      });

      let history = await services.audit.history('risk', 7);
      expect(history.entries.map((entry) => entry.action)).toEqual(['update', 'approve', 'create']);
      expect(history.entries[1].newValues).toEqual({ rationale: RATIONALE });
      expect(history.entries[0].oldValues).toEqual({ status: 'identified' });
      expect(history.entries[0].newValues).toEqual({
        status: 'accepted',
        accepted_by_id: 42,
        acceptance_valid_until: '2025-12-31',
      });

      const revoked = await services.risks.revokeAcceptance(7, ACTOR);
      expect(revoked).toMatchObject({
        status: 'identified',
        acceptedById: null,
        acceptedAt: null,
        acceptanceRationale: null,
        acceptanceValidUntil: null,
      });

      history = await services.audit.history('risk', 7);
      expect(history.entries).toHaveLength(4);
      expect(history.entries[0].action).toBe('update');
      expect(history.entries[0].oldValues).toEqual({
        status: 'accepted',
        accepted_by_id: 42,
        accepted_at: '2025-03-10T09:00:00.000Z',
        acceptance_rationale: RATIONALE,
        acceptance_valid_until: '2025-12-31',
      });
      expect(history.entries[0].newValues).toEqual({ status: 'identified', acceptance_revoked: true });
    });

    it('only accepts risks awaiting acceptance', async () => {
      const { services } = createTestContext();
      const risk = await services.risks.createRisk({ title: 'Closed', likelihood: 2, consequence: 2, status: 'closed' }, ACTOR);
      await expect(services.risks.acceptRisk(risk.id, { rationale: RATIONALE }, ACTOR)).rejects.toThrow(ConflictError);
      await expect(services.risks.acceptRisk(risk.id, { rationale: '  ' }, ACTOR)).rejects.toThrow(ValidationError);
      await expect(services.risks.acceptRisk(99, { rationale: RATIONALE }, ACTOR)).rejects.toThrow(NotFoundError);
      await expect(services.risks.revokeAcceptance(risk.id, ACTOR)).rejects.toThrow(ConflictError);
    });
  });

  describe('deleteRisk', () => {
    it('removes mappings and action links together with the risk', async () => {
      const { store, services } = createTestContext();
      await addPrinciples(store, [principle('nsm', '2.3', 'protect')]);
      const risk = await services.risks.createRisk({ title: 'Default passwords', likelihood: 4, consequence: 4, nsmPrincipleIds: [1] }, ACTOR);
      const action = await services.actions.createAction({ title: 'Rotate credentials', riskIds: [risk.id] }, ACTOR);
      const asset = await services.assets.createAsset({ name: 'OLT Bergen', assetType: 'physical' }, ACTOR);
      await services.risks.updateRisk(risk.id, { assetIds: [asset.id] }, ACTOR);

      await services.risks.deleteRisk(risk.id, ACTOR);

      expect(await store.riskMappings.findAll('nsm')).toEqual([]);
      expect((await services.actions.getAction(action.id)).riskIds).toEqual([]);
      expect(await services.assets.listRisksForAsset(asset.id)).toEqual([]);
      const [entry] = (await services.audit.history('risk', risk.id)).entries;
      expect(entry).toMatchObject({ action: 'delete', oldValues: { title: 'Default passwords', status: 'identified', risk_score: 16 } });
      await expect(services.risks.getRisk(risk.id)).rejects.toThrow(NotFoundError);
    });
  });
});
