import type { DebugFeatures, RelativeStrengthFeatures } from '../../../domain/types/features.type';
import { rankFeatureKey, returnFeatureKey, RS_HORIZONS, type RsHorizon } from '../features/relative-strength.features';
import { clampScore } from '../utilities';
import { neutralResult, type ScoreResult } from './score-result';

const HORIZON_WEIGHTS: Record<RsHorizon, number> = { 20: 0.45, 60: 0.35, 120: 0.2 };

/** Linear map of a raw % return: <= -50% -> 0, >= 150% -> 100. */
export function returnScore(retPct: number, negCap = -50, posCap = 150) {
  if (retPct <= negCap) return 0;
  if (retPct >= posCap) return 100;
  return clampScore(((retPct - negCap) / (posCap - negCap)) * 100);
}

function finite(v: number | undefined): v is number {
  return v !== undefined && Number.isFinite(v);
}

/**
 * Per horizon the universe percentile rank wins over the raw-return mapping.
 * Horizon weights are renormalized over the horizons that have a value.
 */
export function computeRelativeStrengthScore(features: RelativeStrengthFeatures): ScoreResult {
  const raw: DebugFeatures = { has_rs_data: features.has_rs_data };
  for (const h of RS_HORIZONS) {
    const ret = features[returnFeatureKey(h)];
    const rank = features[rankFeatureKey(h)];
    if (finite(ret)) raw[returnFeatureKey(h)] = ret;
    if (finite(rank)) raw[rankFeatureKey(h)] = rank;
  }

  if (!features.has_rs_data) return neutralResult(raw);

  const debug: DebugFeatures = { ...raw };
  let weighted = 0;
  let weightSum = 0;
  for (const h of RS_HORIZONS) {
    const rank = features[rankFeatureKey(h)];
    const ret = features[returnFeatureKey(h)];
    let component: number;
    if (finite(rank)) component = clampScore(rank);
    else if (finite(ret)) component = returnScore(ret);
    else continue;

    debug[`rs_${h}_score`] = component;
    weighted += HORIZON_WEIGHTS[h] * component;
    weightSum += HORIZON_WEIGHTS[h];
  }

  if (weightSum === 0) return neutralResult(raw);
  return { score: clampScore(weighted / weightSum), available: true, features: debug };
}
