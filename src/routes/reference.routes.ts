import { Router } from 'express';
import {
  ACTION_PRIORITIES,
  ACTION_PRIORITY_LABELS,
  ACTION_STATUSES,
  ACTION_STATUS_LABELS,
  ASSET_CATEGORIES,
  ASSET_CATEGORY_LABELS,
  ASSET_TYPES,
  ASSET_TYPE_LABELS,
  COMPLIANCE_STATUSES,
  COMPLIANCE_STATUS_LABELS,
  CRITICALITY_LABELS,
  FRAMEWORKS,
  FRAMEWORK_CATEGORIES,
  FRAMEWORK_LABELS,
  RATING_LABELS,
  RISK_STATUSES,
  RISK_STATUS_LABELS,
  categoryLabel,
} from '../constants/enums.js';
import { BAND_LABELS, RISK_BANDS, bandColor } from '../services/riskScoring.service.js';

interface Option {
  value: string | number;
  label: string;
}

const options = <T extends string>(values: readonly T[], labels: Record<T, string>): Option[] =>
  values.map((value) => ({ value, label: labels[value] }));

const scale = (labels: Record<number, string>): Option[] =>
  [1, 2, 3, 4, 5].map((value) => ({ value, label: labels[value] ?? String(value) }));

// Enumerations with their display labels, for building forms and legends
const REFERENCE = {
  riskStatuses: options(RISK_STATUSES, RISK_STATUS_LABELS),
  actionStatuses: options(ACTION_STATUSES, ACTION_STATUS_LABELS),
  actionPriorities: options(ACTION_PRIORITIES, ACTION_PRIORITY_LABELS),
  complianceStatuses: options(COMPLIANCE_STATUSES, COMPLIANCE_STATUS_LABELS),
  assetTypes: options(ASSET_TYPES, ASSET_TYPE_LABELS),
  assetCategories: options(ASSET_CATEGORIES, ASSET_CATEGORY_LABELS),
  bands: RISK_BANDS.map((band) => ({ value: band, label: BAND_LABELS[band], color: bandColor(band) })),
  ratings: scale(RATING_LABELS),
  criticality: scale(CRITICALITY_LABELS),
  frameworks: FRAMEWORKS.map((framework) => ({
    value: framework,
    label: FRAMEWORK_LABELS[framework],
    categories: FRAMEWORK_CATEGORIES[framework].map((category) => ({
      value: category,
      label: categoryLabel(framework, category),
    })),
  })),
};

export function createReferenceRouter(): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ success: true, data: REFERENCE });
  });

  return router;
}
