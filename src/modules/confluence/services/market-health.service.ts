import type { Bar, DerivativesMetrics } from '../../../domain/entities/bar.entity';
import type { MarketHealth } from '../../../domain/entities/market-health.entity';
import { Logger } from '../../../shared/logger';
import { computePositioningFeatures } from '../features/positioning.features';
import { computeTrendFeatures } from '../features/trend.features';
import { computeVolatilityFeatures } from '../features/volatility.features';
import { computePositioningScore } from '../scoring/positioning.score';
import { classifyRegime, type RegimeThresholds } from '../scoring/regime.classifier';
import { computeTrendScore } from '../scoring/trend.score';
import { computeVolatilityScore } from '../scoring/volatility.score';
import { clampScore, mean } from '../utilities';

const BENCHMARK_CANDIDATES = ['BTCUSDT', 'BTC/USDT', 'BTC/USDT:USDT'];

export interface MarketHealthConfig {
  /** Trend score at or above which a symbol counts toward breadth. */
  uptrendScore: number;
  weights: { trend: number; breadth: number; volComfort: number; positioning: number };
}

export class MarketHealthService {
  private readonly logger = new Logger(MarketHealthService.name);
  private cfg: MarketHealthConfig = {
    uptrendScore: 60,
    weights: { trend: 0.4, breadth: 0.3, volComfort: 0.15, positioning: 0.15 },
  };

  constructor(cfg?: Partial<MarketHealthConfig>) {
    if (cfg) Object.assign(this.cfg, cfg);
  }

  static pickBenchmark(symbols: readonly string[]): string | undefined {
    return BENCHMARK_CANDIDATES.find((c) => symbols.includes(c)) ?? symbols[0];
  }

  /** 100 when the benchmark volatility score is neutral, falling 2 points per point away from 50. */
  static volatilityComfort(volScore: number) {
    return 100 - Math.min(100, 2 * Math.abs(volScore - 50));
  }

  compute(
    barsBySymbol: ReadonlyMap<string, readonly Bar[]>,
    derivativesBySymbol: ReadonlyMap<string, DerivativesMetrics> = new Map(),
    thresholds: Partial<RegimeThresholds> = {},
  ): MarketHealth {
    const symbols = [...barsBySymbol.keys()];
    const benchmark = MarketHealthService.pickBenchmark(symbols);
    if (!benchmark) {
      this.logger.warn('Empty universe, market regime is unknown');
      return { regime: 'unknown' };
    }

    const benchBars = barsBySymbol.get(benchmark) ?? [];
    const btcTrend = benchBars.length ? computeTrendScore(computeTrendFeatures(benchBars)).score : 50;
    const btcVolatility = benchBars.length ? computeVolatilityScore(computeVolatilityFeatures(benchBars)).score : 50;

    const withBars = symbols.filter((s) => (barsBySymbol.get(s) ?? []).length > 0);
    const uptrending = withBars.filter(
      (s) => computeTrendScore(computeTrendFeatures(barsBySymbol.get(s) ?? [])).score >= this.cfg.uptrendScore,
    );
    const breadth = withBars.length ? (uptrending.length / withBars.length) * 100 : 50;

    const positioningScores: number[] = [];
    for (const s of symbols) {
      const result = computePositioningScore(computePositioningFeatures(derivativesBySymbol.get(s)));
      if (result.available) positioningScores.push(result.score);
    }
    const avgPositioning = positioningScores.length ? mean(positioningScores) : 50;

    const w = this.cfg.weights;
    const riskOn = clampScore(
      w.trend * btcTrend +
        w.breadth * breadth +
        w.volComfort * MarketHealthService.volatilityComfort(btcVolatility) +
        w.positioning * avgPositioning,
    );

    const regime = classifyRegime({ btcTrend, breadth, riskOn }, thresholds);
    this.logger.info('Market health computed', {
      benchmark,
      regime,
      btcTrend: +btcTrend.toFixed(2),
      breadth: +breadth.toFixed(2),
      riskOn: +riskOn.toFixed(2),
    });

    return { regime, benchmark, btcTrend, btcVolatility, breadth, avgPositioning, riskOn };
  }
}
