import type { AlertConfig } from '../config/index.js';
import {
  CRITICALITY_LABELS,
  SETTLED_RISK_STATUSES,
  type ActionStatus,
  type AlertCategory,
  type AlertSeverity,
  type RiskStatus,
} from '../constants/enums.js';
import type { EntityStore } from '../store/types.js';
import { addDays, daysBetween, toIsoDate, type IsoDate } from '../utils/dates.js';
import { isOverdue } from './action.service.js';
import type { AuditEntry, AuditService } from './audit.service.js';
import type { ComplianceService, CoverageSummary } from './compliance.service.js';
import {
  HIGH_RISK_THRESHOLD,
  assessRisk,
  riskDistribution,
  type RiskBand,
  type RiskDistribution,
} from './riskScoring.service.js';

export interface Alert {
  severity: AlertSeverity;
  category: AlertCategory;
  message: string;
  entityType: 'action' | 'risk' | 'review' | 'supplier';
  entityId: number;
  details: Record<string, string | number | null>;
}

export interface AlertFilter {
  includeInfo?: boolean;
  includeWarning?: boolean;
  includeDanger?: boolean;
}

export interface AlertCounts {
  total: number;
  bySeverity: Record<AlertSeverity, number>;
  byCategory: Record<AlertCategory, number>;
}

export interface DashboardSummary {
  totals: { risks: number; actions: number; overdueActions: number; upcomingReviews: number };
  riskDistribution: RiskDistribution & { total: number };
  actionProgress: Record<ActionStatus, number> & { overdue: number; total: number };
  recentRisks: { id: number; title: string; score: number; band: RiskBand; createdAt: string }[];
  criticalRisks: { id: number; title: string; score: number; band: RiskBand; status: RiskStatus }[];
  compliance: { nsm: CoverageSummary; ekom: CoverageSummary };
  recentActivity: AuditEntry[];
}

// Reviews due within this window count as upcoming on the summary
const SUMMARY_REVIEW_WINDOW_DAYS = 30;

const SEVERITY_RANK: Record<AlertSeverity, number> = { danger: 0, warning: 1, info: 2 };

/** Stable sort: danger, then warning, then info; generation order is kept within a severity. */
export const sortAlerts = (alerts: readonly Alert[]): Alert[] =>
  alerts
    .map((alert, index) => ({ alert, index }))
    .sort((a, b) => SEVERITY_RANK[a.alert.severity] - SEVERITY_RANK[b.alert.severity] || a.index - b.index)
    .map(({ alert }) => alert);

/** Tier i covers (tier[i-1], tier[i]] days from today; the first tier starts at today inclusive. */
export const contractTierSeverity = (index: number): AlertSeverity =>
  index === 0 ? 'danger' : index === 1 ? 'warning' : 'info';

const plural = (count: number, word: string): string => `${count} ${word}${count === 1 ? '' : 's'}`;

export class DashboardService {
  constructor(
    private readonly store: EntityStore,
    private readonly compliance: ComplianceService,
    private readonly audit: AuditService,
    private readonly config: AlertConfig,
    private readonly clock: () => Date,
  ) {}

  private today(): IsoDate {
    return toIsoDate(this.clock());
  }

  async getAlerts(filter: AlertFilter = {}): Promise<Alert[]> {
    const include: Record<AlertSeverity, boolean> = {
      info: filter.includeInfo ?? true,
      warning: filter.includeWarning ?? true,
      danger: filter.includeDanger ?? true,
    };
    const today = this.today();
    const alerts: Alert[] = [];
    const push = (alert: Alert) => {
      if (include[alert.severity]) alerts.push(alert);
    };

    const [actions, risks, reviews, suppliers, nsmMappings] = await Promise.all([
      this.store.actions.findMany(),
      this.store.risks.findMany(),
      this.store.reviews.findAll(),
      this.store.suppliers.findAll(),
      this.store.riskMappings.findAll('nsm'),
    ]);
    const openRisks = risks.filter((risk) => !SETTLED_RISK_STATUSES.includes(risk.status));

    for (const action of actions) {
      if (action.dueDate === null || !isOverdue(action, today)) continue;
      const daysOverdue = daysBetween(action.dueDate, today);
      push({
        severity: 'warning',
        category: 'action_overdue',
        message: `Action overdue (${plural(daysOverdue, 'day')}): ${action.title}`,
        entityType: 'action',
        entityId: action.id,
        details: { dueDate: action.dueDate, daysOverdue },
      });
    }

    for (const risk of openRisks) {
      const { score } = assessRisk(risk);
      if (score < HIGH_RISK_THRESHOLD) continue;
      push({
        severity: 'danger',
        category: 'high_risk',
        message: `High risk requires action: ${risk.title}`,
        entityType: 'risk',
        entityId: risk.id,
        details: { riskScore: score },
      });
    }

    const pending = reviews.filter((review) => review.conductedDate === null);
    const horizon = addDays(today, this.config.upcomingReviewDays);
    for (const review of pending) {
      if (review.scheduledDate < today || review.scheduledDate > horizon) continue;
      const daysUntil = daysBetween(today, review.scheduledDate);
      push({
        severity: 'info',
        category: 'review_upcoming',
        message: `Review scheduled in ${plural(daysUntil, 'day')}: ${review.title}`,
        entityType: 'review',
        entityId: review.id,
        details: { scheduledDate: review.scheduledDate, daysUntil },
      });
    }
    for (const review of pending) {
      if (review.scheduledDate >= today) continue;
      const daysOverdue = daysBetween(review.scheduledDate, today);
      push({
        severity: 'warning',
        category: 'review_overdue',
        message: `Review overdue (${plural(daysOverdue, 'day')}): ${review.title}`,
        entityType: 'review',
        entityId: review.id,
        details: { scheduledDate: review.scheduledDate, daysOverdue },
      });
    }

    this.config.contractExpiryTiersDays.forEach((tierDays, index) => {
      const severity = contractTierSeverity(index);
      const lower = index === 0 ? null : this.config.contractExpiryTiersDays[index - 1];
      for (const supplier of suppliers) {
        if (supplier.contractEndDate === null) continue;
        const daysUntil = daysBetween(today, supplier.contractEndDate);
        const inTier = lower === null ? daysUntil >= 0 && daysUntil <= tierDays : daysUntil > lower && daysUntil <= tierDays;
        if (!inTier) continue;
        push({
          severity,
          category: 'contract_expiry',
          message: `Contract expires in ${plural(daysUntil, 'day')}: ${supplier.name}`,
          entityType: 'supplier',
          entityId: supplier.id,
          details: { contractEndDate: supplier.contractEndDate, daysUntilExpiry: daysUntil, criticality: supplier.criticality },
        });
      }
    });

    const mapped = new Set(nsmMappings.map((mapping) => mapping.riskId));
    const unmapped = openRisks.filter((risk) => !mapped.has(risk.id)).slice(0, this.config.unmappedRiskAlertLimit);
    for (const risk of unmapped) {
      push({
        severity: 'info',
        category: 'nsm_coverage',
        message: `Risk has no NSM principle mapping: ${risk.title}`,
        entityType: 'risk',
        entityId: risk.id,
        details: { riskScore: assessRisk(risk).score },
      });
    }

    const assessmentCutoff = addDays(today, -this.config.supplierAssessmentMaxAgeDays);
    for (const supplier of suppliers) {
      if (supplier.criticality < this.config.criticalSupplierThreshold) continue;
      if (supplier.lastAssessedAt !== null && supplier.lastAssessedAt >= assessmentCutoff) continue;
      push({
        severity: 'warning',
        category: 'critical_supplier',
        message:
          supplier.lastAssessedAt === null
            ? `Critical supplier has never been assessed: ${supplier.name}`
            : `Critical supplier not assessed since ${supplier.lastAssessedAt}: ${supplier.name}`,
        entityType: 'supplier',
        entityId: supplier.id,
        details: {
          criticality: supplier.criticality,
          criticalityLabel: CRITICALITY_LABELS[supplier.criticality] ?? null,
          lastAssessedAt: supplier.lastAssessedAt,
        },
      });
    }

    return sortAlerts(alerts);
  }

  async countAlerts(): Promise<AlertCounts> {
    const alerts = await this.getAlerts();
    const counts: AlertCounts = {
      total: alerts.length,
      bySeverity: { danger: 0, warning: 0, info: 0 },
      byCategory: {
        action_overdue: 0,
        high_risk: 0,
        review_upcoming: 0,
        review_overdue: 0,
        contract_expiry: 0,
        nsm_coverage: 0,
        critical_supplier: 0,
      },
    };
    for (const alert of alerts) {
      counts.bySeverity[alert.severity]++;
      counts.byCategory[alert.category]++;
    }
    return counts;
  }

  async getSummary(): Promise<DashboardSummary> {
    const today = this.today();
    const reviewHorizon = addDays(today, SUMMARY_REVIEW_WINDOW_DAYS);
    const [risks, actions, reviews, nsm, ekom, activity] = await Promise.all([
      this.store.risks.findMany(),
      this.store.actions.findMany(),
      this.store.reviews.findAll(),
      this.compliance.getSummary('nsm'),
      this.compliance.getSummary('ekom'),
      this.audit.recent({ limit: 10 }),
    ]);

    const overdueActions = actions.filter((action) => isOverdue(action, today)).length;
    const upcomingReviews = reviews.filter(
      (review) => review.conductedDate === null && review.scheduledDate <= reviewHorizon,
    ).length;

    const actionProgress: DashboardSummary['actionProgress'] = {
      planned: 0,
      in_progress: 0,
      done: 0,
      cancelled: 0,
      overdue: overdueActions,
      total: actions.length,
    };
    for (const action of actions) actionProgress[action.status]++;

    const assessed = risks.map((risk) => ({ risk, assessment: assessRisk(risk) }));
    const recentRisks = [...assessed]
      .sort((a, b) => b.risk.createdAt.localeCompare(a.risk.createdAt) || b.risk.id - a.risk.id)
      .slice(0, 5)
      .map(({ risk, assessment }) => ({
        id: risk.id,
        title: risk.title,
        score: assessment.score,
        band: assessment.band,
        createdAt: risk.createdAt,
      }));
    const criticalRisks = assessed
      .filter(({ assessment }) => assessment.score >= HIGH_RISK_THRESHOLD)
      .sort((a, b) => b.assessment.score - a.assessment.score || a.risk.id - b.risk.id)
      .slice(0, 5)
      .map(({ risk, assessment }) => ({
        id: risk.id,
        title: risk.title,
        score: assessment.score,
        band: assessment.band,
        status: risk.status,
      }));

    return {
      totals: { risks: risks.length, actions: actions.length, overdueActions, upcomingReviews },
      riskDistribution: { ...riskDistribution(risks), total: risks.length },
      actionProgress,
      recentRisks,
      criticalRisks,
      compliance: { nsm, ekom },
      recentActivity: activity.entries,
    };
  }
}
