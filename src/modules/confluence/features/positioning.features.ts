import type { DerivativesMetrics } from '../../../domain/entities/bar.entity';
import type { PositioningFeatures } from '../../../domain/types/features.type';
import { finiteOr } from '../utilities';

export const NEUTRAL_POSITIONING_FEATURES: Readonly<PositioningFeatures> = {
  positioning_funding_rate: 0,
  positioning_oi_change_pct: 0,
  has_positioning_data: 0,
};

function isPresent(v: number | undefined) {
  return v !== undefined && Number.isFinite(v);
}

export function computePositioningFeatures(derivatives?: DerivativesMetrics | null): PositioningFeatures {
  if (!derivatives) return { ...NEUTRAL_POSITIONING_FEATURES };
  if (!isPresent(derivatives.fundingRate) && !isPresent(derivatives.oiChangePct)) {
    return { ...NEUTRAL_POSITIONING_FEATURES };
  }

  return {
    positioning_funding_rate: finiteOr(derivatives.fundingRate, 0),
    positioning_oi_change_pct: finiteOr(derivatives.oiChangePct, 0),
    has_positioning_data: 1,
  };
}
