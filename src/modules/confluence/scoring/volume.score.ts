import type { VolumeFeatures } from '../../../domain/types/features.type';
import { clamp, clampScore, finiteOr } from '../utilities';
import { neutralResult, type ScoreResult } from './score-result';

const WEIGHTS = { rvol: 0.45, slope: 0.25, percentile: 0.3 } as const;

/**
 * Piecewise RVOL ramp: 0-60 below 1x, 60-80 up to 1.5x, 80-100 in the
 * 1.5x-3x sweet spot, then tapering 100 -> 70 by 7x and flat beyond.
 */
export function rvolScore(rvol: number, idealLow = 1.5, idealHigh = 3) {
  if (rvol <= 0) return 0;
  if (rvol < 1) return clamp(rvol * 60, 0, 60);
  if (rvol < idealLow) return 60 + ((rvol - 1) / (idealLow - 1)) * 20;
  if (rvol <= idealHigh) return 80 + ((rvol - idealLow) / (idealHigh - idealLow)) * 20;

  const extra = rvol - idealHigh;
  if (extra >= 4) return 70;
  return 100 - (extra / 4) * 30;
}

export function volumeSlopeScore(slopePct: number, maxAbs = 20) {
  const s = clamp(slopePct, -maxAbs, maxAbs);
  return ((s + maxAbs) / (2 * maxAbs)) * 100;
}

export function volumePercentileScore(pct: number) {
  return clampScore(pct * 100);
}

export function computeVolumeScore(features: VolumeFeatures): ScoreResult {
  const rvol = finiteOr(features.volume_rvol_20_1, 1);
  const slope = finiteOr(features.volume_trend_slope_pct_20_10, 0);
  const pct = finiteOr(features.volume_percentile_60, 0.5);
  const raw = {
    volume_rvol_20_1: rvol,
    volume_trend_slope_pct_20_10: slope,
    volume_percentile_60: pct,
    has_volume_data: features.has_volume_data,
  };

  if (!features.has_volume_data) return neutralResult(raw);

  const sRvol = rvolScore(rvol);
  const sSlope = volumeSlopeScore(slope);
  const sPct = volumePercentileScore(pct);
  const score = WEIGHTS.rvol * sRvol + WEIGHTS.slope * sSlope + WEIGHTS.percentile * sPct;

  return {
    score: clampScore(score),
    available: true,
    features: {
      ...raw,
      volume_rvol_score: sRvol,
      volume_slope_score: sSlope,
      volume_percentile_score: sPct,
    },
  };
}
