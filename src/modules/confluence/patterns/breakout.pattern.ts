import type { PatternDirection, PatternSignal } from '../../../domain/entities/pattern-signal.entity';
import { clampScore, pctChange } from '../utilities';
import { feature, highestHigh, lowestLow, score, type BreakoutParams, type PatternContext } from './pattern.types';

export const DEFAULT_BREAKOUT_PARAMS: Readonly<BreakoutParams> = {
  lookback: 20,
  minRvol: 1.5,
  minTrendScore: 50,
  minVolumeScore: 50,
  minRsScore: 0,
  minConfluence: 0,
  allowBearish: false,
  breakBufferPct: 0.1,
};

function buildSignal(
  ctx: PatternContext,
  direction: PatternDirection,
  pivot: number,
  breakoutPct: number,
  rvol: number,
): PatternSignal {
  const trendScore = score(ctx, 'trend');
  const volumeScore = score(ctx, 'volume');
  const rsScore = score(ctx, 'rs');
  const confluence = ctx.confluenceScore ?? 0;

  const distanceScore = clampScore(breakoutPct * 10);
  const supportScore = clampScore(0.4 * trendScore + 0.3 * volumeScore + 0.2 * rsScore + 0.1 * confluence);
  const strength = clampScore(0.5 * distanceScore + 0.5 * supportScore);
  const confidence = clampScore(strength * 0.6 + rvol * 10);

  const verb = direction === 'bullish' ? 'Bullish breakout above' : 'Bearish breakdown below';
  return {
    patternName: 'breakout',
    symbol: ctx.symbol,
    timeframe: ctx.timeframe,
    triggered: true,
    direction,
    strength,
    confidence,
    notes: `${verb} ${pivot.toFixed(4)} by ${breakoutPct.toFixed(2)}% (RVOL ${rvol.toFixed(2)})`,
    extras: {
      pivot,
      breakout_pct: breakoutPct,
      rvol,
      trend_score: trendScore,
      volume_score: volumeScore,
      rs_score: rsScore,
    },
  };
}

/**
 * Close beyond the prior `lookback`-bar range by more than the buffer, on
 * elevated relative volume, with trend/volume/RS support. The bearish
 * breakdown mirrors it when `allowBearish` is set.
 */
export function detectBreakout(ctx: PatternContext, overrides: Partial<BreakoutParams> = {}): PatternSignal | null {
  const p = { ...DEFAULT_BREAKOUT_PARAMS, ...overrides };
  const { bars } = ctx;
  if (bars.length < p.lookback + 1) return null;

  const pivotHigh = highestHigh(bars, p.lookback);
  const pivotLow = lowestLow(bars, p.lookback);
  if (pivotHigh === undefined || pivotLow === undefined) return null;

  const lastClose = bars[bars.length - 1].close;
  const rvol = feature(ctx, 'volume_rvol_20_1', 1);
  const trendScore = score(ctx, 'trend');
  const volumeScore = score(ctx, 'volume');
  const rsScore = score(ctx, 'rs');
  const confluence = ctx.confluenceScore ?? 0;

  const bullishBreak = pivotHigh > 0 && lastClose >= pivotHigh * (1 + p.breakBufferPct / 100);
  if (
    bullishBreak &&
    rvol >= p.minRvol &&
    trendScore >= p.minTrendScore &&
    volumeScore >= p.minVolumeScore &&
    rsScore >= p.minRsScore &&
    confluence >= p.minConfluence
  ) {
    return buildSignal(ctx, 'bullish', pivotHigh, pctChange(lastClose, pivotHigh), rvol);
  }

  if (!p.allowBearish) return null;

  const bearishBreak = pivotLow > 0 && lastClose <= pivotLow * (1 - p.breakBufferPct / 100);
  if (
    bearishBreak &&
    rvol >= p.minRvol &&
    trendScore <= 100 - p.minTrendScore &&
    volumeScore >= p.minVolumeScore &&
    confluence >= p.minConfluence
  ) {
    return buildSignal(ctx, 'bearish', pivotLow, -pctChange(lastClose, pivotLow), rvol);
  }
  return null;
}
