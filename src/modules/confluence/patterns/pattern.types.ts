import type { Bar } from '../../../domain/entities/bar.entity';
import type { Regime } from '../../../domain/entities/market-health.entity';
import type { PatternSignal } from '../../../domain/entities/pattern-signal.entity';
import type { ComponentKey, ComponentScores } from '../../../domain/entities/score-bundle.entity';
import type { FeatureBundle } from '../../../domain/types/features.type';

export interface PatternContext {
  symbol: string;
  timeframe: string;
  bars: readonly Bar[];
  features: Partial<FeatureBundle>;
  scores: Partial<ComponentScores>;
  confluenceScore?: number;
  regime?: Regime;
}

export interface BreakoutParams {
  lookback: number;
  minRvol: number;
  minTrendScore: number;
  minVolumeScore: number;
  minRsScore: number;
  minConfluence: number;
  allowBearish: boolean;
  /** Close must clear the pivot by this many percent. */
  breakBufferPct: number;
}

export interface PullbackParams {
  lookback: number;
  minTrendScore: number;
  minPullbackPct: number;
  maxPullbackPct: number;
  maProximityPct: number;
  maxRvol: number;
  minRsScore: number;
  maxRsiInTrend: number;
}

export interface VolatilitySqueezeParams {
  maxBbWidthPct: number;
  maxContractionRatio: number;
  minVolatilityScore: number;
  minTrendScore: number;
  minRsScore: number;
}

export interface RsiDivergenceParams {
  period: number;
  lookback: number;
  pivotLookback: number;
  minStrength: number;
  maxBarsFromLast: number;
}

/** Per-detector overrides nested under the detector's name. */
export interface PatternParamsByName {
  breakout?: Partial<BreakoutParams>;
  pullback?: Partial<PullbackParams>;
  volatility_squeeze?: Partial<VolatilitySqueezeParams>;
  rsi_divergence?: Partial<RsiDivergenceParams>;
}

export type PatternDetector = (ctx: PatternContext, params: PatternParamsByName) => PatternSignal | null;

export function score(ctx: PatternContext, key: ComponentKey, fallback = 0) {
  const v = ctx.scores[key];
  return v !== undefined && Number.isFinite(v) ? v : fallback;
}

export function feature<K extends keyof FeatureBundle>(ctx: PatternContext, key: K, fallback = 0): number {
  const v = ctx.features[key];
  return typeof v === 'number' && Number.isFinite(v) ? v : fallback;
}

/** Highest high over the `lookback` bars before the last one. */
export function highestHigh(bars: readonly Bar[], lookback: number): number | undefined {
  if (lookback <= 0 || bars.length < lookback + 1) return undefined;
  return Math.max(...bars.slice(-(lookback + 1), -1).map((b) => b.high));
}

export function lowestLow(bars: readonly Bar[], lookback: number): number | undefined {
  if (lookback <= 0 || bars.length < lookback + 1) return undefined;
  return Math.min(...bars.slice(-(lookback + 1), -1).map((b) => b.low));
}
