import { ValidationError } from '../utils/errors.js';
import type { RiskRecord } from '../store/types.js';

// ============================================
// Bands
// ============================================

export const RISK_BANDS = ['acceptable', 'low', 'medium', 'high'] as const;
export type RiskBand = (typeof RISK_BANDS)[number];

export type BandColor = 'green' | 'yellow' | 'orange' | 'red';

export const BAND_COLORS: Record<RiskBand, BandColor> = {
  acceptable: 'green',
  low: 'yellow',
  medium: 'orange',
  high: 'red',
};

export const BAND_LABELS: Record<RiskBand, string> = {
  acceptable: 'Acceptable',
  low: 'Low',
  medium: 'Medium',
  high: 'High',
};

export const MIN_RATING = 1;
export const MAX_RATING = 5;

export const HIGH_RISK_THRESHOLD = 17;

export type MatrixView = 'current' | 'target';

type Ratings = Pick<RiskRecord, 'likelihood' | 'consequence' | 'targetLikelihood' | 'targetConsequence'>;

export function assertRating(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < MIN_RATING || value > MAX_RATING) {
    throw ValidationError.field(field, `${field} must be an integer between ${MIN_RATING} and ${MAX_RATING}`);
  }
  return value;
}

export const riskScore = (likelihood: number, consequence: number): number =>
  assertRating(likelihood, 'likelihood') * assertRating(consequence, 'consequence');

export function riskBand(score: number): RiskBand {
  if (!Number.isInteger(score) || score < 1 || score > MAX_RATING * MAX_RATING) {
    throw ValidationError.field('score', `Risk score out of range: ${score}`);
  }
  if (score <= 4) return 'acceptable';
  if (score <= 9) return 'low';
  if (score <= 16) return 'medium';
  return 'high';
}

export const bandColor = (band: RiskBand): BandColor => BAND_COLORS[band];

/** Null unless both target ratings are present; never falls back to current ratings. */
export const targetScore = (targetLikelihood: number | null, targetConsequence: number | null): number | null =>
  targetLikelihood === null || targetConsequence === null
    ? null
    : assertRating(targetLikelihood, 'targetLikelihood') * assertRating(targetConsequence, 'targetConsequence');

export interface RiskAssessment {
  score: number;
  band: RiskBand;
  color: BandColor;
  targetScore: number | null;
  targetBand: RiskBand | null;
  targetColor: BandColor | null;
}

export function assessRisk(risk: Ratings): RiskAssessment {
  const score = riskScore(risk.likelihood, risk.consequence);
  const band = riskBand(score);
  const target = targetScore(risk.targetLikelihood, risk.targetConsequence);
  const targetBand = target === null ? null : riskBand(target);
  return {
    score,
    band,
    color: bandColor(band),
    targetScore: target,
    targetBand,
    targetColor: targetBand === null ? null : bandColor(targetBand),
  };
}

// ============================================
// Matrix
// ============================================

export interface RiskSummary {
  id: number;
  title: string;
  projectName: string | null;
}

export interface RiskMatrixCell {
  likelihood: number;
  consequence: number;
  score: number;
  band: RiskBand;
  color: BandColor;
  risks: RiskSummary[];
}

export interface RiskMatrix {
  view: MatrixView;
  /** Likelihood 5 first; within a row, consequence 1 first. */
  rows: RiskMatrixCell[][];
  total: number;
}

type MatrixRisk = Ratings & Pick<RiskRecord, 'id' | 'title' | 'projectName'>;

/** The target view places each coordinate at its target rating, or the current one when unset. */
export function placement(risk: Ratings, view: MatrixView): { likelihood: number; consequence: number } {
  const likelihood = assertRating(risk.likelihood, 'likelihood');
  const consequence = assertRating(risk.consequence, 'consequence');
  if (view === 'current') return { likelihood, consequence };
  return {
    likelihood: risk.targetLikelihood === null ? likelihood : assertRating(risk.targetLikelihood, 'targetLikelihood'),
    consequence:
      risk.targetConsequence === null ? consequence : assertRating(risk.targetConsequence, 'targetConsequence'),
  };
}

export function emptyMatrix(view: MatrixView): RiskMatrix {
  const rows: RiskMatrixCell[][] = [];
  for (let likelihood = MAX_RATING; likelihood >= MIN_RATING; likelihood--) {
    const row: RiskMatrixCell[] = [];
    for (let consequence = MIN_RATING; consequence <= MAX_RATING; consequence++) {
      const score = likelihood * consequence;
      const band = riskBand(score);
      row.push({ likelihood, consequence, score, band, color: bandColor(band), risks: [] });
    }
    rows.push(row);
  }
  return { view, rows, total: 0 };
}

export function buildRiskMatrix(risks: readonly MatrixRisk[], view: MatrixView = 'current'): RiskMatrix {
  const matrix = emptyMatrix(view);
  for (const risk of risks) {
    const { likelihood, consequence } = placement(risk, view);
    matrix.rows[MAX_RATING - likelihood][consequence - MIN_RATING].risks.push({
      id: risk.id,
      title: risk.title,
      projectName: risk.projectName,
    });
    matrix.total++;
  }
  return matrix;
}

export type RiskDistribution = Record<RiskBand, number>;

export function riskDistribution(risks: readonly Ratings[], view: MatrixView = 'current'): RiskDistribution {
  const distribution: RiskDistribution = { acceptable: 0, low: 0, medium: 0, high: 0 };
  for (const risk of risks) {
    const { likelihood, consequence } = placement(risk, view);
    distribution[riskBand(likelihood * consequence)]++;
  }
  return distribution;
}
