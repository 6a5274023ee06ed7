import { ValidationError } from '../utils/errors.js';

// ============================================
// Reference enumerations
// ============================================
// Closed sets with display labels. Values arriving from callers or from the
// database go through parseEnum() before they reach a service.

export const RISK_STATUSES = [
  'identified',
  'under_assessment',
  'accepted',
  'mitigated',
  'transferred',
  'closed',
] as const;
export type RiskStatus = (typeof RISK_STATUSES)[number];

export const RISK_STATUS_LABELS: Record<RiskStatus, string> = {
  identified: 'Identified',
  under_assessment: 'Under assessment',
  accepted: 'Accepted',
  mitigated: 'Mitigated',
  transferred: 'Transferred',
  closed: 'Closed',
};

// Statuses from which a risk can be formally accepted
export const ACCEPTABLE_FROM: readonly RiskStatus[] = ['identified', 'under_assessment'];

// Risks in these statuses no longer need attention on the dashboard
export const SETTLED_RISK_STATUSES: readonly RiskStatus[] = ['closed', 'accepted'];

export const ACTION_STATUSES = ['planned', 'in_progress', 'done', 'cancelled'] as const;
export type ActionStatus = (typeof ACTION_STATUSES)[number];

export const ACTION_STATUS_LABELS: Record<ActionStatus, string> = {
  planned: 'Planned',
  in_progress: 'In progress',
  done: 'Done',
  cancelled: 'Cancelled',
};

export const CLOSED_ACTION_STATUSES: readonly ActionStatus[] = ['done', 'cancelled'];

export const ACTION_PRIORITIES = ['low', 'medium', 'high', 'critical'] as const;
export type ActionPriority = (typeof ACTION_PRIORITIES)[number];

export const ACTION_PRIORITY_LABELS: Record<ActionPriority, string> = {
  low: 'Low',
  medium: 'Medium',
  high: 'High',
  critical: 'Critical',
};

export const COMPLIANCE_STATUSES = ['compliant', 'partial', 'non_compliant', 'not_assessed'] as const;
export type ComplianceStatus = (typeof COMPLIANCE_STATUSES)[number];

export const COMPLIANCE_STATUS_LABELS: Record<ComplianceStatus, string> = {
  compliant: 'Compliant',
  partial: 'Partially compliant',
  non_compliant: 'Non-compliant',
  not_assessed: 'Not assessed',
};

export const FRAMEWORKS = ['nsm', 'ekom'] as const;
export type Framework = (typeof FRAMEWORKS)[number];

export const FRAMEWORK_LABELS: Record<Framework, string> = {
  nsm: 'NSM Grunnprinsipper for IKT-sikkerhet',
  ekom: 'Ekomforskriften',
};

export const NSM_CATEGORIES = ['identify', 'protect', 'detect', 'respond'] as const;
export type NsmCategory = (typeof NSM_CATEGORIES)[number];

export const NSM_CATEGORY_LABELS: Record<NsmCategory, string> = {
  identify: '1. Identifisere',
  protect: '2. Beskytte',
  detect: '3. Oppdage',
  respond: '4. Håndtere og gjenopprette',
};

export const EKOM_CATEGORIES = ['security', 'confidentiality', 'documentation', 'notification'] as const;
export type EkomCategory = (typeof EKOM_CATEGORIES)[number];

export const EKOM_CATEGORY_LABELS: Record<EkomCategory, string> = {
  security: 'Sikkerhet og beredskap',
  confidentiality: 'Konfidensialitet',
  documentation: 'Dokumentasjon',
  notification: 'Varsling',
};

export type PrincipleCategory = NsmCategory | EkomCategory;

export const FRAMEWORK_CATEGORIES: Record<Framework, readonly PrincipleCategory[]> = {
  nsm: NSM_CATEGORIES,
  ekom: EKOM_CATEGORIES,
};

export const categoryLabel = (framework: Framework, category: PrincipleCategory): string => {
  if (framework === 'nsm' && isOneOf(NSM_CATEGORIES, category)) return NSM_CATEGORY_LABELS[category];
  if (framework === 'ekom' && isOneOf(EKOM_CATEGORIES, category)) return EKOM_CATEGORY_LABELS[category];
  return category;
};

export const AUDIT_ACTIONS = ['create', 'update', 'delete', 'login', 'logout', 'export', 'approve'] as const;
export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export const ALERT_SEVERITIES = ['danger', 'warning', 'info'] as const;
export type AlertSeverity = (typeof ALERT_SEVERITIES)[number];

export const ALERT_CATEGORIES = [
  'action_overdue',
  'high_risk',
  'review_upcoming',
  'review_overdue',
  'contract_expiry',
  'nsm_coverage',
  'critical_supplier',
] as const;
export type AlertCategory = (typeof ALERT_CATEGORIES)[number];

export const ASSET_TYPES = ['physical', 'virtual', 'service', 'network', 'location'] as const;
export type AssetType = (typeof ASSET_TYPES)[number];

export const ASSET_TYPE_LABELS: Record<AssetType, string> = {
  physical: 'Physical',
  virtual: 'Virtual',
  service: 'Service',
  network: 'Network',
  location: 'Location',
};

export const ASSET_CATEGORIES = [
  'core_network',
  'access_network',
  'radio',
  'customer_segment',
  'data_center',
  'transport',
  'power',
  'other',
] as const;
export type AssetCategory = (typeof ASSET_CATEGORIES)[number];

export const ASSET_CATEGORY_LABELS: Record<AssetCategory, string> = {
  core_network: 'Core network',
  access_network: 'Access network',
  radio: 'Radio',
  customer_segment: 'Customer segment',
  data_center: 'Data center',
  transport: 'Transport',
  power: 'Power',
  other: 'Other',
};

export const RATING_LABELS: Record<number, string> = {
  1: 'Very low',
  2: 'Low',
  3: 'Medium',
  4: 'High',
  5: 'Very high',
};

export const CRITICALITY_LABELS: Record<number, string> = {
  1: 'Very low',
  2: 'Low',
  3: 'Medium',
  4: 'High',
  5: 'Critical',
};

// ============================================
// Guards
// ============================================

export function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return typeof value === 'string' && values.some((candidate) => candidate === value);
}

export function parseEnum<T extends string>(values: readonly T[], value: unknown, field: string): T {
  if (isOneOf(values, value)) return value;
  throw ValidationError.field(field, `Invalid value for ${field}: '${String(value)}'. Allowed: ${values.join(', ')}`);
}

