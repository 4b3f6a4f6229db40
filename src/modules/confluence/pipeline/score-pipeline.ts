import type { Bar, DerivativesMetrics } from '../../../domain/entities/bar.entity';
import type { Regime } from '../../../domain/entities/market-health.entity';
import { patternLabel } from '../../../domain/entities/pattern-signal.entity';
import type { ComponentScores, ScoreBundle } from '../../../domain/entities/score-bundle.entity';
import type { FeatureBundle } from '../../../domain/types/features.type';
import { Logger } from '../../../shared/logger';
import {
  computePositioningFeatures,
  computeRsFeatures,
  computeTrendFeatures,
  computeVolatilityFeatures,
  computeVolumeFeatures,
  type UniverseReturns,
} from '../features';
import { runPatterns, type PatternsSettings } from '../patterns';
import {
  computeConfluenceScore,
  computePositioningScore,
  computeRelativeStrengthScore,
  computeTrendScore,
  computeVolatilityScore,
  computeVolumeScore,
  type RegimeWeightTable,
} from '../scoring';

const logger = new Logger('ScorePipeline');

export interface ScoreContext {
  regime: Regime;
  universe?: UniverseReturns;
  derivatives?: ReadonlyMap<string, DerivativesMetrics>;
  regimeWeights?: RegimeWeightTable;
  patterns?: PatternsSettings;
}

export function buildFeatureBundle(
  symbol: string,
  bars: readonly Bar[],
  derivatives: DerivativesMetrics | undefined,
  universe?: UniverseReturns,
): FeatureBundle {
  return {
    ...computeTrendFeatures(bars),
    ...computeVolatilityFeatures(bars),
    ...computeVolumeFeatures(bars),
    ...computeRsFeatures(symbol, bars, universe),
    ...computePositioningFeatures(derivatives),
  };
}

export function scoreFeatures(features: FeatureBundle): ComponentScores {
  return {
    trend: computeTrendScore(features).score,
    volume: computeVolumeScore(features).score,
    volatility: computeVolatilityScore(features).score,
    rs: computeRelativeStrengthScore(features).score,
    positioning: computePositioningScore(features).score,
  };
}

/** features -> scores -> confluence -> patterns for one symbol. */
export function buildScoreBundle(
  symbol: string,
  timeframe: string,
  bars: readonly Bar[],
  ctx: ScoreContext,
): ScoreBundle {
  const features = buildFeatureBundle(symbol, bars, ctx.derivatives?.get(symbol), ctx.universe);
  const scores = scoreFeatures(features);
  const confluence = computeConfluenceScore(scores, {
    regime: ctx.regime,
    regimeWeights: ctx.regimeWeights,
    features,
  });

  const patternSignals = runPatterns(
    {
      symbol,
      timeframe,
      bars,
      features,
      scores,
      confluenceScore: confluence.confluenceScore,
      regime: ctx.regime,
    },
    ctx.patterns,
  );

  return {
    symbol,
    timeframe,
    features,
    scores,
    confluenceScore: confluence.confluenceScore,
    confidence: confluence.confidence,
    regime: confluence.regime,
    weights: confluence.weights,
    patterns: patternSignals.map(patternLabel),
    patternSignals,
  };
}

/** One bundle per symbol with bars; symbols without bars are skipped. */
export function compileScoreBundles(
  barsBySymbol: ReadonlyMap<string, readonly Bar[]>,
  timeframe: string,
  ctx: ScoreContext,
): ScoreBundle[] {
  const bundles: ScoreBundle[] = [];
  for (const [symbol, bars] of barsBySymbol) {
    if (!bars.length) {
      logger.debug(`No bars for ${symbol}, skipping`);
      continue;
    }
    bundles.push(buildScoreBundle(symbol, timeframe, bars, ctx));
  }
  return bundles;
}
