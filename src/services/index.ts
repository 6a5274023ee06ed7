import type { Config } from '../config/index.js';
import type { EntityStore } from '../store/types.js';
import type { Logger } from '../utils/logger.js';
import { ActionService } from './action.service.js';
import { AssetService } from './asset.service.js';
import { AuditService } from './audit.service.js';
import { ComplianceService } from './compliance.service.js';
import { DashboardService } from './dashboard.service.js';
import { ProjectService } from './project.service.js';
import { ReviewService } from './review.service.js';
import { RiskService } from './risk.service.js';
import { SupplierService } from './supplier.service.js';

export interface Services {
  audit: AuditService;
  projects: ProjectService;
  risks: RiskService;
  compliance: ComplianceService;
  actions: ActionService;
  suppliers: SupplierService;
  assets: AssetService;
  reviews: ReviewService;
  dashboard: DashboardService;
}

export interface ServiceDeps {
  store: EntityStore;
  config: Config;
  logger: Logger;
  clock?: () => Date;
}

export function createServices({ store, config, logger, clock = () => new Date() }: ServiceDeps): Services {
  const audit = new AuditService(store, config.audit, clock);
  const compliance = new ComplianceService(store, audit, clock, logger);
  return {
    audit,
    compliance,
    projects: new ProjectService(store, audit),
    risks: new RiskService(store, audit, compliance, clock, logger),
    actions: new ActionService(store, audit, clock),
    suppliers: new SupplierService(store, audit, clock),
    assets: new AssetService(store, audit),
    reviews: new ReviewService(store, audit, clock),
    dashboard: new DashboardService(store, compliance, audit, config.alerts, clock),
  };
}
