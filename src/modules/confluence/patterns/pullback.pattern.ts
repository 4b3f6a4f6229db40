import type { PatternSignal } from '../../../domain/entities/pattern-signal.entity';
import { clampScore, pctChange, takeLast, wilderRsi } from '../utilities';
import { feature, score, type PatternContext, type PullbackParams } from './pattern.types';

export const DEFAULT_PULLBACK_PARAMS: Readonly<PullbackParams> = {
  lookback: 15,
  minTrendScore: 60,
  minPullbackPct: 2,
  maxPullbackPct: 10,
  maProximityPct: 5,
  maxRvol: 2,
  minRsScore: 40,
  // softer than classic oversold so strong trends still qualify
  maxRsiInTrend: 55,
};

const RSI_WINDOW = 30;

/** Latest 14-period RSI over the last 30 closes, or undefined when it cannot be computed. */
export function latestRsi(closes: readonly number[], period = 14): number | undefined {
  const series = wilderRsi(takeLast(closes, RSI_WINDOW), period);
  const last = series[series.length - 1];
  return last !== undefined && Number.isFinite(last) ? last : undefined;
}

/** A healthy dip inside an established uptrend. */
export function detectPullback(ctx: PatternContext, overrides: Partial<PullbackParams> = {}): PatternSignal | null {
  const p = { ...DEFAULT_PULLBACK_PARAMS, ...overrides };
  const { bars } = ctx;
  if (bars.length < p.lookback + 1) return null;

  const closes = bars.map((b) => b.close);
  const window = closes.slice(-(p.lookback + 1));
  const recentHigh = Math.max(...window.slice(0, -1));
  const lastClose = window[window.length - 1];
  if (recentHigh === 0) return null;

  const pullbackPct = -pctChange(lastClose, recentHigh);
  if (pullbackPct < p.minPullbackPct || pullbackPct > p.maxPullbackPct) return null;

  const trendScore = score(ctx, 'trend');
  const rsScore = score(ctx, 'rs');
  if (trendScore < p.minTrendScore || rsScore < p.minRsScore) return null;

  const distFromMa = Math.abs(feature(ctx, 'trend_distance_from_ma_pct', 0));
  if (distFromMa > p.maProximityPct) return null;

  const rvol = feature(ctx, 'volume_rvol_20_1', 1);
  if (rvol > p.maxRvol) return null;

  const rsi = latestRsi(closes);
  if (rsi !== undefined && rsi > p.maxRsiInTrend) return null;

  const pullbackScore = clampScore(((p.maxPullbackPct - pullbackPct) / Math.max(p.maxPullbackPct, 1e-6)) * 100);
  const proximityScore = clampScore(((p.maProximityPct - distFromMa) / Math.max(p.maProximityPct, 1e-6)) * 100);
  const strength = clampScore(0.4 * pullbackScore + 0.4 * trendScore + 0.2 * rsScore);
  const confidence = clampScore((strength + proximityScore) / 2);

  return {
    patternName: 'pullback',
    symbol: ctx.symbol,
    timeframe: ctx.timeframe,
    triggered: true,
    direction: 'bullish',
    strength,
    confidence,
    notes: `Bullish pullback: off ${pullbackPct.toFixed(2)}% from recent high, ${distFromMa.toFixed(2)}% from MA; RVOL ${rvol.toFixed(2)}`,
    extras: {
      pullback_pct: pullbackPct,
      dist_from_ma_pct: distFromMa,
      rsi: rsi ?? null,
      trend_score: trendScore,
      rs_score: rsScore,
    },
  };
}
