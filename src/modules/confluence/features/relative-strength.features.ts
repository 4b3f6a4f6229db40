import type { Bar } from '../../../domain/entities/bar.entity';
import type { RelativeStrengthFeatures } from '../../../domain/types/features.type';
import { pctChange, percentileRank } from '../utilities';

export const RS_HORIZONS = [20, 60, 120] as const;
export type RsHorizon = (typeof RS_HORIZONS)[number];

export const MIN_RS_BARS = 40;

/** symbol -> horizon -> % return; a horizon is missing when the symbol lacks `h + 1` bars. */
export type UniverseReturns = Record<string, Partial<Record<RsHorizon, number>>>;

const RETURN_KEYS = {
  20: 'rs_ret_20_pct',
  60: 'rs_ret_60_pct',
  120: 'rs_ret_120_pct',
} as const satisfies Record<RsHorizon, keyof RelativeStrengthFeatures>;

const RANK_KEYS = {
  20: 'rs_20_rank_pct',
  60: 'rs_60_rank_pct',
  120: 'rs_120_rank_pct',
} as const satisfies Record<RsHorizon, keyof RelativeStrengthFeatures>;

export function returnFeatureKey(h: RsHorizon) {
  return RETURN_KEYS[h];
}

export function rankFeatureKey(h: RsHorizon) {
  return RANK_KEYS[h];
}

/** % return over the last `lookback` bars, or undefined without `lookback + 1` closes. */
export function computeReturnPct(closes: readonly number[], lookback: number): number | undefined {
  if (closes.length <= lookback) return undefined;
  return pctChange(closes[closes.length - 1], closes[closes.length - 1 - lookback]);
}

export function computeHorizonReturns(bars: readonly Bar[]): Partial<Record<RsHorizon, number>> {
  const closes = bars.map((b) => b.close);
  const out: Partial<Record<RsHorizon, number>> = {};
  for (const h of RS_HORIZONS) {
    const ret = computeReturnPct(closes, h);
    if (ret !== undefined && Number.isFinite(ret)) out[h] = ret;
  }
  return out;
}

/**
 * Cross-sectional return context for one scan. Every symbol's returns must be
 * collected here before any percentile rank can be taken.
 */
export function computeUniverseReturns(barsBySymbol: ReadonlyMap<string, readonly Bar[]>): UniverseReturns {
  const universe: UniverseReturns = {};
  for (const [symbol, bars] of barsBySymbol) {
    const returns = computeHorizonReturns(bars);
    if (Object.keys(returns).length) universe[symbol] = returns;
  }
  return universe;
}

function horizonPopulation(universe: UniverseReturns, h: RsHorizon) {
  const values: number[] = [];
  for (const returns of Object.values(universe)) {
    const v = returns[h];
    if (v !== undefined && Number.isFinite(v)) values.push(v);
  }
  return values;
}

export function computeRsFeatures(
  symbol: string,
  bars: readonly Bar[],
  universe?: UniverseReturns,
  minBars = MIN_RS_BARS,
): RelativeStrengthFeatures {
  if (bars.length < minBars) return { has_rs_data: 0 };

  const features: RelativeStrengthFeatures = { has_rs_data: 1 };
  const own = universe?.[symbol] ?? computeHorizonReturns(bars);

  for (const h of RS_HORIZONS) {
    const ret = own[h];
    if (ret === undefined) continue;
    features[returnFeatureKey(h)] = ret;

    if (!universe || !(symbol in universe)) continue;
    const population = horizonPopulation(universe, h);
    if (population.length) features[rankFeatureKey(h)] = percentileRank(ret, population);
  }

  // Enough bars for the family but not for the shortest horizon.
  if (!RS_HORIZONS.some((h) => features[returnFeatureKey(h)] !== undefined)) return { has_rs_data: 0 };
  return features;
}
