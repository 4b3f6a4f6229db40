import type { PositioningFeatures } from '../../../domain/types/features.type';
import { clamp, clampScore, finiteOr } from '../utilities';
import { neutralResult, type ScoreResult } from './score-result';

const WEIGHTS = { funding: 0.7, oi: 0.3 } as const;

// |funding| breakpoints (fraction per interval) and the score at each.
const FUNDING_CURVE: ReadonlyArray<readonly [number, number]> = [
  [0.0001, 100],
  [0.0005, 70],
  [0.001, 40],
  [0.002, 10],
];

/** Near-zero funding scores 100; crowding in either direction decays to 10 at 0.2%. */
export function fundingCrowdingScore(fundingRate: number) {
  const f = Math.abs(fundingRate);
  if (f <= FUNDING_CURVE[0][0]) return FUNDING_CURVE[0][1];

  for (let i = 1; i < FUNDING_CURVE.length; i++) {
    const [xPrev, yPrev] = FUNDING_CURVE[i - 1];
    const [x, y] = FUNDING_CURVE[i];
    if (f <= x) return yPrev + ((f - xPrev) / (x - xPrev)) * (y - yPrev);
  }
  return FUNDING_CURVE[FUNDING_CURVE.length - 1][1];
}

/** -100%..+100% open-interest change -> 0..100. */
export function oiBuildUpScore(oiChangePct: number) {
  const c = clamp(oiChangePct, -100, 100);
  return (c + 100) / 2;
}

export function computePositioningScore(features: PositioningFeatures): ScoreResult {
  const funding = finiteOr(features.positioning_funding_rate, 0);
  const oiChange = finiteOr(features.positioning_oi_change_pct, 0);
  const raw = {
    positioning_funding_rate: funding,
    positioning_oi_change_pct: oiChange,
    has_positioning_data: features.has_positioning_data,
  };

  if (!features.has_positioning_data) return neutralResult(raw);

  const sFunding = fundingCrowdingScore(funding);
  const sOi = oiBuildUpScore(oiChange);

  return {
    score: clampScore(WEIGHTS.funding * sFunding + WEIGHTS.oi * sOi),
    available: true,
    features: {
      ...raw,
      positioning_funding_crowding_score: sFunding,
      positioning_oi_build_up_score: sOi,
    },
  };
}
