/**
 * Maps a rugcheck report to a 0..1 risk score, where 0 is safest.
 */
export type RiskScorer = (report: Readonly<Record<string, unknown>>) => number;

export interface RiskScorerOptions {
  normalisedScale: number; // full-safety value of `score_normalised`
  rawScale: number; // full-safety value of `score`
  fallbackScore: number; // when the report carries nothing usable
}

const DEFAULT_SCORER_OPTIONS: RiskScorerOptions = {
  normalisedScale: 1,
  rawScale: 100,
  fallbackScore: 0.5
};

export function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

function finiteNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Upstream scores are safety scores (higher = safer), so risk is their inverse.
 * The scales are configurable because the upstream bounds are not documented.
 */
export function createRiskScorer(options: Partial<RiskScorerOptions> = {}): RiskScorer {
  const { normalisedScale, rawScale, fallbackScore } = { ...DEFAULT_SCORER_OPTIONS, ...options };

  return report => {
    const normalised = finiteNumber(report.score_normalised);
    if (normalised !== null) {
      return clamp01(1 - normalised / normalisedScale);
    }

    const raw = finiteNumber(report.score);
    if (raw !== null) {
      return clamp01(1 - raw / rawScale);
    }

    if (report.rugged === true) return 1;

    const risks = report.risks;
    if (Array.isArray(risks)) {
      return Math.min(1, risks.length / 10);
    }

    return fallbackScore;
  };
}

export const defaultRiskScorer = createRiskScorer();

export type RiskLevel = 'low' | 'medium' | 'high';

export interface RiskBand {
  level: RiskLevel;
  label: string;
  icon: string;
}

const RISK_BANDS: ReadonlyArray<RiskBand & { max: number }> = [
  { level: 'low', label: 'Low Risk', icon: '✅', max: 0.2 },
  { level: 'medium', label: 'Medium Risk', icon: '⚠️', max: 0.5 },
  { level: 'high', label: 'High Risk', icon: '🚨', max: Infinity }
];

/**
 * Bands are inclusive at the top: 0.2 is low, 0.5 is medium.
 */
export function riskBand(riskScore: number): RiskBand {
  const band = RISK_BANDS.find(b => riskScore <= b.max) ?? RISK_BANDS[RISK_BANDS.length - 1];
  if (!band) {
    throw new RangeError('No risk bands defined');
  }
  return { level: band.level, label: band.label, icon: band.icon };
}
