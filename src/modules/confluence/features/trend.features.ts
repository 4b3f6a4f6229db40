import type { Bar } from '../../../domain/entities/bar.entity';
import type { TrendFeatures } from '../../../domain/types/features.type';
import { mean, takeLast } from '../utilities';

export const MIN_TREND_BARS = 60;

export const NEUTRAL_TREND_FEATURES: Readonly<TrendFeatures> = {
  trend_ma_alignment: 0,
  trend_persistence: 0.5,
  trend_distance_from_ma_pct: 0,
  trend_ma_slope_pct: 0,
  has_trend_data: 0,
};

const EPS = 1e-8;

/** +1 when the short SMA is above the long SMA, -1 below, 0 when equal or short of data. */
export function computeMaAlignment(closes: readonly number[], shortPeriod = 20, longPeriod = 50) {
  if (closes.length < Math.max(shortPeriod, longPeriod)) return 0;
  const shortMa = mean(takeLast(closes, shortPeriod));
  const longMa = mean(takeLast(closes, longPeriod));
  if (Math.abs(shortMa - longMa) <= EPS) return 0;
  return shortMa > longMa ? 1 : -1;
}

/** Fraction of the last `lookback` bars that closed above the previous close. */
export function computeTrendPersistence(closes: readonly number[], lookback = 20) {
  if (closes.length < lookback + 1) return 0.5;
  const recent = takeLast(closes, lookback + 1);
  let up = 0;
  for (let i = 1; i < recent.length; i++) {
    if (recent[i] > recent[i - 1]) up++;
  }
  return up / lookback;
}

/** Signed % distance of the last close from its SMA. */
export function computeDistanceFromMa(closes: readonly number[], period = 50) {
  if (closes.length < period) return 0;
  const ma = mean(takeLast(closes, period));
  if (ma === 0) return 0;
  return ((closes[closes.length - 1] - ma) / ma) * 100;
}

/** % change of the SMA between `lookback` bars ago and now. */
export function computeMaSlopePct(closes: readonly number[], period = 50, lookback = 5) {
  const needed = period + lookback;
  if (closes.length < needed) return 0;
  const recent = takeLast(closes, needed);
  const maStart = mean(recent.slice(0, period));
  const maEnd = mean(recent.slice(-period));
  if (maStart === 0) return 0;
  return ((maEnd - maStart) / maStart) * 100;
}

export function computeTrendFeatures(bars: readonly Bar[], minBars = MIN_TREND_BARS): TrendFeatures {
  if (bars.length < minBars) return { ...NEUTRAL_TREND_FEATURES };

  const closes = bars.map((b) => b.close);
  return {
    trend_ma_alignment: computeMaAlignment(closes, 20, 50),
    trend_persistence: computeTrendPersistence(closes, 20),
    trend_distance_from_ma_pct: computeDistanceFromMa(closes, 50),
    trend_ma_slope_pct: computeMaSlopePct(closes, 50, 5),
    has_trend_data: 1,
  };
}
