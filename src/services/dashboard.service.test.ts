import { describe, it, expect } from 'vitest';
import { addDays } from '../utils/dates.js';
import { ACTOR, createTestContext } from '../testing/fixtures.js';
import { contractTierSeverity, sortAlerts, type Alert } from './dashboard.service.js';

const TODAY = '2025-03-10';

const alert = (severity: Alert['severity'], entityId: number): Alert => ({
  severity,
  category: 'high_risk',
  message: `alert ${entityId}`,
  entityType: 'risk',
  entityId,
  details: {},
});

describe('DashboardService', () => {
  describe('sortAlerts', () => {
    it('orders by severity and keeps generation order within a severity', () => {
      const generated = [alert('info', 1), alert('info', 2), alert('warning', 3), alert('danger', 4)];
      const sorted = sortAlerts(generated);
      expect(sorted.map((entry) => [entry.severity, entry.entityId])).toEqual([
        ['danger', 4],
        ['warning', 3],
        ['info', 1],
        ['info', 2],
      ]);
      expect(generated.map((entry) => entry.entityId)).toEqual([1, 2, 3, 4]);
    });

    it('assigns danger, warning and info to the contract tiers in order', () => {
      expect([0, 1, 2, 3].map(contractTierSeverity)).toEqual(['danger', 'warning', 'info', 'info']);
    });
  });

  describe('getAlerts', () => {
    it('puts each expiring contract in its tightest tier', async () => {
      const { services } = createTestContext();
      for (const days of [0, 30, 31, 60, 61, 90, 91, -1]) {
        await services.suppliers.createSupplier(
          { name: `Carrier +${days}`, criticality: 2, contractEndDate: addDays(TODAY, days) },
          ACTOR,
        );
      }

      const alerts = await services.dashboard.getAlerts();
      expect(alerts.map((entry) => [entry.entityId, entry.severity])).toEqual([
        [1, 'danger'],
        [2, 'danger'],
        [3, 'warning'],
        [4, 'warning'],
        [5, 'info'],
        [6, 'info'],
      ]);
      expect(alerts[1].message).toBe('Contract expires in 30 days: Carrier +30');
      expect(alerts[1].details).toEqual({ contractEndDate: '2025-04-09', daysUntilExpiry: 30, criticality: 2 });
    });

    it('generates every rule and sorts by severity', async () => {
      const { services } = createTestContext();
      await services.actions.createAction({ title: 'Patch edge routers', dueDate: '2025-03-07' }, ACTOR);
      await services.risks.createRisk({ title: 'Core network outage', likelihood: 5, consequence: 4 }, ACTOR);
      await services.reviews.scheduleReview({ title: 'Quarterly review', scheduledDate: '2025-03-12' }, ACTOR);
      await services.reviews.scheduleReview({ title: 'Annual review', scheduledDate: '2025-03-01' }, ACTOR);
      await services.suppliers.createSupplier(
        { name: 'Transit provider', criticality: 5, contractEndDate: '2025-03-20' },
        ACTOR,
      );

      const alerts = await services.dashboard.getAlerts();
      expect(alerts.map((entry) => entry.category)).toEqual([
        'high_risk',
        'contract_expiry',
        'action_overdue',
        'review_overdue',
        'critical_supplier',
        'review_upcoming',
        'nsm_coverage',
      ]);
      expect(alerts.map((entry) => entry.message)).toEqual([
        'High risk requires action: Core network outage',
        'Contract expires in 10 days: Transit provider',
        'Action overdue (3 days): Patch edge routers',
        'Review overdue (9 days): Annual review',
        'Critical supplier has never been assessed: Transit provider',
        'Review scheduled in 2 days: Quarterly review',
        'Risk has no NSM principle mapping: Core network outage',
      ]);

      expect(await services.dashboard.countAlerts()).toEqual({
        total: 7,
        bySeverity: { danger: 2, warning: 3, info: 2 },
        byCategory: {
          action_overdue: 1,
          high_risk: 1,
          review_upcoming: 1,
          review_overdue: 1,
          contract_expiry: 1,
          nsm_coverage: 1,
          critical_supplier: 1,
        },
      });

      const withoutInfo = await services.dashboard.getAlerts({ includeInfo: false });
      expect(withoutInfo.map((entry) => entry.severity)).toEqual(['danger', 'danger', 'warning', 'warning', 'warning']);
    });

    it('treats reviews from today through the look-ahead window as upcoming', async () => {
      const { services } = createTestContext();
      for (const days of [0, 7, 8, -1]) {
        await services.reviews.scheduleReview({ title: `Review ${days}`, scheduledDate: addDays(TODAY, days) }, ACTOR);
      }
      const conducted = await services.reviews.scheduleReview({ title: 'Done', scheduledDate: TODAY }, ACTOR);
      await services.reviews.completeReview(conducted.id, {}, ACTOR);

      const alerts = await services.dashboard.getAlerts();
      expect(alerts.map((entry) => [entry.category, entry.entityId])).toEqual([
        ['review_overdue', 4],
        ['review_upcoming', 1],
        ['review_upcoming', 2],
      ]);
    });

    it('flags critical suppliers not assessed within the allowed age', async () => {
      const { services } = createTestContext();
      await services.suppliers.createSupplier({ name: 'Stale', criticality: 4, lastAssessedAt: '2024-01-15' }, ACTOR);
      await services.suppliers.createSupplier({ name: 'Fresh', criticality: 5, lastAssessedAt: '2024-12-01' }, ACTOR);
      await services.suppliers.createSupplier({ name: 'Minor', criticality: 3 }, ACTOR);

      const alerts = await services.dashboard.getAlerts();
      expect(alerts).toHaveLength(1);
      expect(alerts[0]).toMatchObject({
        severity: 'warning',
        message: 'Critical supplier not assessed since 2024-01-15: Stale',
        details: { criticality: 4, lastAssessedAt: '2024-01-15' },
      });

      await services.suppliers.recordAssessment(1, undefined, ACTOR);
      expect(await services.dashboard.getAlerts()).toEqual([]);
    });

    it('caps unmapped-risk alerts and skips settled risks', async () => {
      const { services } = createTestContext({ env: { ALERT_UNMAPPED_RISK_LIMIT: '2' } });
      const accepted = await services.risks.createRisk({ title: 'Tolerated', likelihood: 1, consequence: 1 }, ACTOR);
      await services.risks.acceptRisk(accepted.id, { rationale: 'Low impact' }, ACTOR);
      for (const title of ['First', 'Second', 'Third']) {
        await services.risks.createRisk({ title, likelihood: 2, consequence: 2 }, ACTOR);
      }

      const alerts = await services.dashboard.getAlerts();
      expect(alerts.map((entry) => [entry.category, entry.entityId])).toEqual([
        ['nsm_coverage', 2],
        ['nsm_coverage', 3],
      ]);
    });
  });

  describe('getSummary', () => {
    it('rolls up totals, progress, top risks and recent activity', async () => {
      const { services } = createTestContext();
      await services.risks.createRisk({ title: 'Core outage', likelihood: 5, consequence: 4 }, ACTOR);
      await services.risks.createRisk({ title: 'Minor', likelihood: 1, consequence: 2 }, ACTOR);
      await services.risks.createRisk({ title: 'Fraud', likelihood: 4, consequence: 5 }, ACTOR);
      await services.actions.createAction({ title: 'Overdue', dueDate: '2025-03-01' }, ACTOR);
      await services.actions.createAction({ title: 'Finished', status: 'done', dueDate: '2025-03-01' }, ACTOR);
      await services.reviews.scheduleReview({ title: 'Soon', scheduledDate: '2025-03-20' }, ACTOR);
      await services.reviews.scheduleReview({ title: 'Later', scheduledDate: '2025-05-01' }, ACTOR);
      await services.reviews.scheduleReview({ title: 'Missed', scheduledDate: '2025-02-01' }, ACTOR);

      const summary = await services.dashboard.getSummary();

      expect(summary.totals).toEqual({ risks: 3, actions: 2, overdueActions: 1, upcomingReviews: 2 });
      expect(summary.riskDistribution).toEqual({ acceptable: 1, low: 0, medium: 0, high: 2, total: 3 });
      expect(summary.actionProgress).toEqual({
        planned: 1,
        in_progress: 0,
        done: 1,
        cancelled: 0,
        overdue: 1,
        total: 2,
      });
      expect(summary.recentRisks.map((risk) => risk.id)).toEqual([3, 2, 1]);
      expect(summary.criticalRisks.map((risk) => [risk.id, risk.score])).toEqual([
        [1, 20],
        [3, 20],
      ]);
      expect(summary.compliance.nsm).toMatchObject({ totalPrinciples: 0, coveragePercentage: 0 });
      expect(summary.recentActivity).toHaveLength(8);
      expect(summary.recentActivity[0]).toMatchObject({ action: 'create', entityType: 'review', entityId: 3 });
    });
  });
});
