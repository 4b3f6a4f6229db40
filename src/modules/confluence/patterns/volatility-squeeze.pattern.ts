import type { PatternSignal } from '../../../domain/entities/pattern-signal.entity';
import { clampScore } from '../utilities';
import { feature, score, type PatternContext, type VolatilitySqueezeParams } from './pattern.types';

export const DEFAULT_SQUEEZE_PARAMS: Readonly<VolatilitySqueezeParams> = {
  maxBbWidthPct: 6,
  maxContractionRatio: 1,
  minVolatilityScore: 60,
  minTrendScore: 0,
  minRsScore: 0,
};

/** Compressed Bollinger width with contracting ATR, primed for expansion. Direction-neutral. */
export function detectVolatilitySqueeze(
  ctx: PatternContext,
  overrides: Partial<VolatilitySqueezeParams> = {},
): PatternSignal | null {
  const p = { ...DEFAULT_SQUEEZE_PARAMS, ...overrides };

  const bbWidth = feature(ctx, 'volatility_bb_width_pct_20', 0);
  const contraction = feature(ctx, 'volatility_contraction_ratio_60_20', 1);
  const volScore = score(ctx, 'volatility');
  const trendScore = score(ctx, 'trend');
  const rsScore = score(ctx, 'rs');
  const rvol = feature(ctx, 'volume_rvol_20_1', 1);

  if (bbWidth <= 0 || bbWidth > p.maxBbWidthPct) return null;
  if (contraction > p.maxContractionRatio) return null;
  if (volScore < p.minVolatilityScore) return null;
  if (trendScore < p.minTrendScore || rsScore < p.minRsScore) return null;

  const compressionScore = clampScore(((p.maxBbWidthPct - bbWidth) / p.maxBbWidthPct) * 100);
  const contractionScore = clampScore(
    ((p.maxContractionRatio - contraction) / Math.max(p.maxContractionRatio, 1e-6)) * 100,
  );
  const strength = clampScore(0.4 * compressionScore + 0.3 * contractionScore + 0.3 * volScore);
  const confidence = clampScore((strength + trendScore * 0.3 + rsScore * 0.2 + rvol * 10) / 2);

  return {
    patternName: 'volatility_squeeze',
    symbol: ctx.symbol,
    timeframe: ctx.timeframe,
    triggered: true,
    direction: null,
    strength,
    confidence,
    notes: `Squeeze: BBW ${bbWidth.toFixed(2)}%, ratio ${contraction.toFixed(2)}, vol_score ${volScore.toFixed(1)}`,
    extras: {
      bb_width_pct: bbWidth,
      contraction_ratio: contraction,
      volatility_score: volScore,
      trend_score: trendScore,
      rs_score: rsScore,
      rvol,
    },
  };
}
