export type Regime = 'bull' | 'bear' | 'sideways' | 'unknown';

export const REGIMES: readonly Regime[] = ['bull', 'bear', 'sideways', 'unknown'];

export function isRegime(value: unknown): value is Regime {
  return typeof value === 'string' && REGIMES.some((r) => r === value);
}

export interface MarketHealth {
  regime: Regime;
  benchmark?: string;
  btcTrend?: number;
  btcVolatility?: number;
  breadth?: number; // % of the universe in an uptrend
  avgPositioning?: number;
  riskOn?: number;
}
