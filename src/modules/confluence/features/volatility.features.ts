import type { Bar } from '../../../domain/entities/bar.entity';
import type { VolatilityFeatures } from '../../../domain/types/features.type';
import { mean, stddev, takeLast } from '../utilities';

export const MIN_VOLATILITY_BARS = 80;

export const NEUTRAL_VOLATILITY_FEATURES: Readonly<VolatilityFeatures> = {
  volatility_atr_pct_14: 0,
  volatility_bb_width_pct_20: 0,
  volatility_contraction_ratio_60_20: 1,
  has_volatility_data: 0,
};

function trueRange(prevClose: number, high: number, low: number) {
  return Math.max(high - low, Math.abs(high - prevClose), Math.abs(low - prevClose));
}

/** Wilder-smoothed ATR; 0 when there are not more than `period` bars. */
export function computeAtr(bars: readonly Bar[], period = 14) {
  if (period <= 0 || bars.length <= period) return 0;

  const trs: number[] = [];
  for (let i = 1; i < bars.length; i++) {
    trs.push(trueRange(bars[i - 1].close, bars[i].high, bars[i].low));
  }

  let atr = mean(trs.slice(0, period));
  for (const tr of trs.slice(period)) {
    atr = (atr * (period - 1) + tr) / period;
  }
  return atr;
}

export function computeAtrPercent(bars: readonly Bar[], period = 14) {
  if (bars.length < period + 1) return 0;
  const lastClose = bars[bars.length - 1].close;
  if (lastClose === 0) return 0;
  return (computeAtr(bars, period) / lastClose) * 100;
}

/** (upper - lower) / middle * 100 for Bollinger bands of `stdDev` population deviations. */
export function computeBbWidthPercent(bars: readonly Bar[], period = 20, stdDev = 2) {
  if (bars.length < period) return 0;
  const closes = takeLast(bars, period).map((b) => b.close);
  const middle = mean(closes);
  if (middle === 0) return 0;
  return ((2 * stdDev * stddev(closes)) / middle) * 100;
}

/**
 * Recent ATR% over earlier ATR%, measured on disjoint windows.
 * Below 1 means contraction; 1 when there is not enough data or the earlier ATR% is zero.
 */
export function computeContractionRatio(bars: readonly Bar[], windowLong = 60, windowShort = 20) {
  if (bars.length < windowLong + 1) return 1;

  const earlier = bars.slice(-(windowLong + windowShort), -windowShort);
  const recent = bars.slice(-(windowShort + 1));

  const earlierAtrPct = computeAtrPercent(earlier, Math.min(14, earlier.length - 1));
  const recentAtrPct = computeAtrPercent(recent, Math.min(14, recent.length - 1));
  if (earlierAtrPct <= 0) return 1;
  return recentAtrPct / earlierAtrPct;
}

export function computeVolatilityFeatures(bars: readonly Bar[], minBars = MIN_VOLATILITY_BARS): VolatilityFeatures {
  if (bars.length < minBars) return { ...NEUTRAL_VOLATILITY_FEATURES };

  return {
    volatility_atr_pct_14: computeAtrPercent(bars, 14),
    volatility_bb_width_pct_20: computeBbWidthPercent(bars, 20, 2),
    volatility_contraction_ratio_60_20: computeContractionRatio(bars, 60, 20),
    has_volatility_data: 1,
  };
}
