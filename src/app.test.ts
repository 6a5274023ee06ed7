import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from './app.js';
import { addPrinciples, createTestContext, principle, type TestContext } from './testing/fixtures.js';

const ACTOR_HEADER = 'x-authenticated-user-id';

describe('HTTP API', () => {
  let ctx: TestContext;
  let app: Express;

  beforeEach(() => {
    ctx = createTestContext();
    app = createApp({ services: ctx.services, config: ctx.config, logger: ctx.logger });
  });

  const createRisk = (body: Record<string, unknown>) =>
    request(app).post('/api/risks').set(ACTOR_HEADER, '42').send(body);

  describe('platform', () => {
    it('reports health without an actor', async () => {
      const res = await request(app).get('/api/health');
      expect(res.status).toBe(200);
      expect(res.body.status).toBe('healthy');
    });

    it('tags every response with a request id', async () => {
      const res = await request(app).get('/api/risks');
      expect(res.headers['x-request-id']).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    });

    it('serves labelled reference data', async () => {
      const res = await request(app).get('/api/reference');
      expect(res.status).toBe(200);
      expect(res.body.data.bands[3]).toEqual({ value: 'high', label: 'High', color: 'red' });
      expect(res.body.data.criticality[4]).toEqual({ value: 5, label: 'Critical' });
      expect(res.body.data.assetCategories[0]).toEqual({ value: 'core_network', label: 'Core network' });
      expect(res.body.data.frameworks[1].categories[0]).toEqual({ value: 'security', label: expect.any(String) });
    });

    it('answers unknown routes with 404', async () => {
      const res = await request(app).get('/api/nowhere');
      expect(res.status).toBe(404);
      expect(res.body.error).toEqual({ code: 'ROUTE_NOT_FOUND', message: 'Route not found: GET /api/nowhere' });
    });

    it('rejects malformed JSON bodies with 400', async () => {
      const res = await request(app)
        .post('/api/risks')
        .set(ACTOR_HEADER, '42')
        .set('Content-Type', 'application/json')
        .send('{"title":');
      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('BAD_REQUEST');
    });
  });

  describe('actor identification', () => {
    it('requires an actor for mutations', async () => {
      const res = await request(app).post('/api/risks').send({ title: 'Fibre cut', likelihood: 3, consequence: 3 });
      expect(res.status).toBe(401);
      expect(res.body).toEqual({
        success: false,
        error: { code: 'UNAUTHENTICATED', message: 'Authentication required' },
      });
    });

    it('rejects a malformed actor header', async () => {
      const res = await request(app).get('/api/risks').set(ACTOR_HEADER, 'admin');
      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('INVALID_ACTOR');
    });

    it('rejects actor ids beyond the integer column range', async () => {
      const body = { title: 'Fibre cut', likelihood: 3, consequence: 3 };
      const tooLarge = await request(app).post('/api/risks').set(ACTOR_HEADER, '9999999999').send(body);
      expect(tooLarge.status).toBe(400);
      expect(tooLarge.body.error).toEqual({
        code: 'INVALID_ACTOR',
        message: `Malformed ${ACTOR_HEADER} header`,
      });

      const largest = await request(app).post('/api/risks').set(ACTOR_HEADER, '2147483647').send(body);
      expect(largest.status).toBe(201);
      const [entry] = (await ctx.services.audit.history('risk', 1)).entries;
      expect(entry.actorId).toBe(2147483647);
    });
  });

  describe('risks', () => {
    it('validates the request body', async () => {
      const res = await createRisk({ title: 'Fibre cut', likelihood: 7, consequence: 3 });
      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
      expect(res.body.error.details).toEqual([
        { field: 'likelihood', message: 'likelihood must be an integer between 1 and 5' },
      ]);
    });

    it('creates a risk and returns its assessment', async () => {
      const res = await createRisk({ title: 'Fibre cut on trunk route', likelihood: 4, consequence: 5 });
      expect(res.status).toBe(201);
      expect(res.body.data).toMatchObject({
        id: 1,
        title: 'Fibre cut on trunk route',
        score: 20,
        band: 'high',
        color: 'red',
        targetScore: null,
        status: 'identified',
      });

      const fetched = await request(app).get('/api/risks/1');
      expect(fetched.status).toBe(200);
      expect(fetched.body.data.score).toBe(20);
    });

    it('returns 404 for a missing risk', async () => {
      const res = await request(app).get('/api/risks/99');
      expect(res.status).toBe(404);
      expect(res.body.error.code).toBe('NOT_FOUND');
    });

    it('accepts a risk and records the history', async () => {
      await createRisk({ title: 'Legacy signalling', likelihood: 2, consequence: 3 });

      const accepted = await request(app)
        .post('/api/risks/1/accept')
        .set(ACTOR_HEADER, '42')
        .send({ rationale: 'Compensating controls in place', validUntil: '2025-12-31' });
      expect(accepted.status).toBe(200);
      expect(accepted.body.data).toMatchObject({
        status: 'accepted',
        acceptedById: 42,
        acceptanceValidUntil: '2025-12-31',
      });

      const again = await request(app)
        .post('/api/risks/1/accept')
        .set(ACTOR_HEADER, '42')
        .send({ rationale: 'Still fine' });
      expect(again.status).toBe(409);

      const history = await request(app).get('/api/audit/entity/risk/1');
      expect(history.body.data.map((entry: { action: string }) => entry.action)).toEqual([
        'update',
        'approve',
        'create',
      ]);
      expect(history.body.pagination).toMatchObject({ total: 3 });
    });

    it('exports the register as CSV and audits the export', async () => {
      await createRisk({ title: 'Fibre cut, north ring', likelihood: 4, consequence: 5 });

      const res = await request(app).get('/api/risks/export').set(ACTOR_HEADER, '42');
      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toMatch(/^text\/csv/);
      expect(res.headers['content-disposition']).toBe('attachment; filename="risk-register.csv"');
      expect(res.text.split('\n')).toEqual([
        'ID,Title,Project,Status,Likelihood,Consequence,Score,Band,Target Score,Accepted Until,NSM Principles,Ekom Principles',
        '1,"Fibre cut, north ring",,identified,4,5,20,high,,,,',
      ]);

      const exports = await request(app).get('/api/audit/recent').query({ action: 'export' });
      expect(exports.body.data).toHaveLength(1);
      expect(exports.body.data[0]).toMatchObject({ entityType: 'risk', actorId: 42 });
    });
  });

  describe('assets', () => {
    const createAsset = (body: Record<string, unknown>) =>
      request(app).post('/api/assets').set(ACTOR_HEADER, '42').send(body);

    it('creates assets, links them to a risk and lists the asset risks', async () => {
      const site = await createAsset({ name: 'Site Stavanger', assetType: 'location', criticality: 4 });
      expect(site.status).toBe(201);
      expect(site.body.data).toMatchObject({ id: 1, category: 'other', criticality: 4, isManual: true });

      const router = await createAsset({ name: 'PE router', assetType: 'physical', category: 'core_network', parentId: 1 });
      expect(router.status).toBe(201);

      const risk = await createRisk({ title: 'Power outage at site', likelihood: 2, consequence: 4, assetIds: [2, 1] });
      expect(risk.body.data.assetIds).toEqual([1, 2]);

      const linked = await request(app).get('/api/assets/2/risks');
      expect(linked.status).toBe(200);
      expect(linked.body.data.map((row: { title: string }) => row.title)).toEqual(['Power outage at site']);

      const blocked = await request(app).delete('/api/assets/1').set(ACTOR_HEADER, '42');
      expect(blocked.status).toBe(409);
    });

    it('validates the asset body', async () => {
      const res = await createAsset({ name: 'Mast', assetType: 'tower', criticality: 9 });
      expect(res.status).toBe(400);
      expect(res.body.error.details).toEqual([
        { field: 'assetType', message: 'assetType must be one of: physical, virtual, service, network, location' },
        { field: 'criticality', message: 'Criticality must be between 1 and 5' },
      ]);
    });

    it('rejects a cycle through PUT with 400', async () => {
      await createAsset({ name: 'Site', assetType: 'location' });
      await createAsset({ name: 'Rack', assetType: 'physical', parentId: 1 });
      const res = await request(app).put('/api/assets/1').set(ACTOR_HEADER, '42').send({ parentId: 2 });
      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('compliance', () => {
    it('reports coverage and gaps for a framework', async () => {
      const [covered] = await addPrinciples(ctx.store, [
        principle('nsm', '1.1', 'identify', { sortOrder: 1 }),
        principle('nsm', '1.2', 'identify', { sortOrder: 2 }),
      ]);
      await createRisk({ title: 'Asset inventory drift', likelihood: 3, consequence: 3, nsmPrincipleIds: [covered.id] });

      const coverage = await request(app).get('/api/compliance/nsm/coverage');
      expect(coverage.status).toBe(200);
      expect(coverage.body.data.summary).toMatchObject({
        totalPrinciples: 2,
        coveredPrinciples: 1,
        notAssessed: 1,
        coveragePercentage: 0,
      });

      const patched = await request(app)
        .patch('/api/compliance/nsm/mappings/1')
        .set(ACTOR_HEADER, '42')
        .send({ complianceStatus: 'compliant' });
      expect(patched.status).toBe(200);

      const after = await request(app).get('/api/compliance/nsm/coverage');
      expect(after.body.data.summary.coveragePercentage).toBe(100);

      const gaps = await request(app).get('/api/compliance/nsm/gaps');
      expect(gaps.body.data.map((gap: { code: string }) => gap.code)).toEqual(['1.2']);
    });

    it('rejects an unknown framework', async () => {
      const res = await request(app).get('/api/compliance/iso/coverage');
      expect(res.status).toBe(400);
      expect(res.body.error.details).toEqual([{ field: 'framework', message: 'framework must be one of: nsm, ekom' }]);
    });
  });

  describe('dashboard', () => {
    it('lists alerts filtered by severity', async () => {
      await createRisk({ title: 'Core outage', likelihood: 5, consequence: 5 });

      const res = await request(app).get('/api/dashboard/alerts').query({ includeInfo: 'false' });
      expect(res.status).toBe(200);
      expect(res.body.data).toEqual([
        {
          severity: 'danger',
          category: 'high_risk',
          message: 'High risk requires action: Core outage',
          entityType: 'risk',
          entityId: 1,
          details: { riskScore: 25 },
        },
      ]);

      const count = await request(app).get('/api/dashboard/alerts/count');
      expect(count.body.data).toMatchObject({ total: 2, bySeverity: { danger: 1, warning: 0, info: 1 } });
    });
  });
});
