import type { MarketHealth, Regime } from '../../../domain/entities/market-health.entity';

export interface RegimeThresholds {
  bullMinRiskOn: number;
  bullMinBreadth: number;
  bullMinTrend: number;
  bearMaxRiskOn: number;
  bearMaxBreadth: number;
  bearMaxTrend: number;
}

export const DEFAULT_REGIME_THRESHOLDS: Readonly<RegimeThresholds> = {
  bullMinRiskOn: 65,
  bullMinBreadth: 60,
  bullMinTrend: 60,
  bearMaxRiskOn: 35,
  bearMaxBreadth: 40,
  bearMaxTrend: 40,
};

function known(v: number | undefined): v is number {
  return v !== undefined && Number.isFinite(v);
}

/**
 * bull needs all three bull floors, bear all three bear ceilings, anything else is sideways.
 * `unknown` only when trend, breadth and risk-on are all missing.
 */
export function classifyRegime(
  health: Pick<MarketHealth, 'btcTrend' | 'breadth' | 'riskOn'>,
  thresholds: Partial<RegimeThresholds> = {},
): Regime {
  const t = { ...DEFAULT_REGIME_THRESHOLDS, ...thresholds };
  if (!known(health.btcTrend) && !known(health.breadth) && !known(health.riskOn)) return 'unknown';

  const trend = known(health.btcTrend) ? health.btcTrend : 50;
  const breadth = known(health.breadth) ? health.breadth : 50;
  const riskOn = known(health.riskOn) ? health.riskOn : (trend + breadth) / 2;

  if (riskOn >= t.bullMinRiskOn && breadth >= t.bullMinBreadth && trend >= t.bullMinTrend) return 'bull';
  if (riskOn <= t.bearMaxRiskOn && breadth <= t.bearMaxBreadth && trend <= t.bearMaxTrend) return 'bear';
  return 'sideways';
}
