import type { DebugFeatures } from '../../../domain/types/features.type';

/**
 * Output of every score normalizer. `features` keeps the raw inputs and,
 * when the family had data, the intermediate component scores.
 */
export interface ScoreResult {
  score: number;
  available: boolean;
  features: DebugFeatures;
}

export const NEUTRAL_SCORE = 50;

export function neutralResult(features: DebugFeatures): ScoreResult {
  return { score: NEUTRAL_SCORE, available: false, features };
}
