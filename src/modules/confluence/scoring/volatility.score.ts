import type { VolatilityFeatures } from '../../../domain/types/features.type';
import { clampScore, finiteOr } from '../utilities';
import { neutralResult, type ScoreResult } from './score-result';

// Quiet, compressed markets score high.
const WEIGHTS = { atr: 0.3, bbWidth: 0.35, contraction: 0.35 } as const;

export function atrScore(atrPct: number) {
  if (atrPct <= 0) return 100;
  return clampScore(100 / (1 + atrPct / 5));
}

export function bbWidthScore(bbWidthPct: number) {
  if (bbWidthPct <= 0) return 100;
  return clampScore(100 / (1 + bbWidthPct / 10));
}

export function contractionScore(ratio: number) {
  if (ratio <= 0) return 100;
  if (ratio >= 2) return 0;
  return clampScore(((2 - ratio) / 2) * 100);
}

export function computeVolatilityScore(features: VolatilityFeatures): ScoreResult {
  const atrPct = finiteOr(features.volatility_atr_pct_14, 0);
  const bbw = finiteOr(features.volatility_bb_width_pct_20, 0);
  const ratio = finiteOr(features.volatility_contraction_ratio_60_20, 1);
  const raw = {
    volatility_atr_pct_14: atrPct,
    volatility_bb_width_pct_20: bbw,
    volatility_contraction_ratio_60_20: ratio,
    has_volatility_data: features.has_volatility_data,
  };

  if (!features.has_volatility_data) return neutralResult(raw);

  const sAtr = atrScore(atrPct);
  const sBbw = bbWidthScore(bbw);
  const sContraction = contractionScore(ratio);
  const score = WEIGHTS.atr * sAtr + WEIGHTS.bbWidth * sBbw + WEIGHTS.contraction * sContraction;

  return {
    score: clampScore(score),
    available: true,
    features: {
      ...raw,
      volatility_atr_score: sAtr,
      volatility_bb_width_score: sBbw,
      volatility_contraction_score: sContraction,
    },
  };
}
