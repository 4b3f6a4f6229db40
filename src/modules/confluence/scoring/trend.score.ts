import type { TrendFeatures } from '../../../domain/types/features.type';
import { clamp, clampScore, finiteOr } from '../utilities';
import { neutralResult, type ScoreResult } from './score-result';

const WEIGHTS = { alignment: 0.35, persistence: 0.3, extension: 0.2, slope: 0.15 } as const;

export function maAlignmentScore(alignment: number) {
  return clampScore((clamp(alignment, -1, 1) + 1) * 50);
}

export function persistenceScore(persistence: number) {
  return clampScore(persistence * 100);
}

/** 100 inside the ideal band, then 5 points off per extra % of distance. */
export function extensionScore(distancePct: number, idealBand = 5) {
  const dist = Math.abs(distancePct);
  if (dist <= idealBand) return 100;
  return clampScore(100 - (dist - idealBand) * 5);
}

export function maSlopeScore(slopePct: number, maxAbs = 5) {
  const s = clamp(slopePct, -maxAbs, maxAbs);
  return ((s + maxAbs) / (2 * maxAbs)) * 100;
}

export function computeTrendScore(features: TrendFeatures): ScoreResult {
  const alignment = finiteOr(features.trend_ma_alignment, 0);
  const persistence = finiteOr(features.trend_persistence, 0.5);
  const distance = finiteOr(features.trend_distance_from_ma_pct, 0);
  const slope = finiteOr(features.trend_ma_slope_pct, 0);
  const raw = {
    trend_ma_alignment: alignment,
    trend_persistence: persistence,
    trend_distance_from_ma_pct: distance,
    trend_ma_slope_pct: slope,
    has_trend_data: features.has_trend_data,
  };

  if (!features.has_trend_data) return neutralResult(raw);

  const sAlign = maAlignmentScore(alignment);
  const sPersist = persistenceScore(persistence);
  const sExt = extensionScore(distance);
  const sSlope = maSlopeScore(slope);

  const score =
    WEIGHTS.alignment * sAlign +
    WEIGHTS.persistence * sPersist +
    WEIGHTS.extension * sExt +
    WEIGHTS.slope * sSlope;

  return {
    score: clampScore(score),
    available: true,
    features: {
      ...raw,
      trend_ma_alignment_score: sAlign,
      trend_persistence_score: sPersist,
      trend_extension_score: sExt,
      trend_ma_slope_score: sSlope,
    },
  };
}
