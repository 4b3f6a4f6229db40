import type { Bar } from '../../../domain/entities/bar.entity';
import type { AlertEvent, AlertReason } from '../../../domain/entities/alert.entity';
import type { MarketHealth } from '../../../domain/entities/market-health.entity';
import type { ScoreBundle } from '../../../domain/entities/score-bundle.entity';
import { Logger } from '../../../shared/logger';
import { detectRsiDivergenceFromBars } from '../patterns/rsi-divergence.pattern';
import type { AlertSettings } from './alert.settings';

const logger = new Logger('AlertEngine');

/** symbol -> timeframe -> bars used for the divergence alerts. */
export type DivergenceBars = ReadonlyMap<string, ReadonlyMap<string, readonly Bar[]>>;

function fmt(v: number | undefined, digits = 1) {
  return v !== undefined && Number.isFinite(v) ? v.toFixed(digits) : 'n/a';
}

export function describeMarket(health: MarketHealth) {
  return `${health.regime.toUpperCase()} (BTC trend ${fmt(health.btcTrend)}, breadth ${fmt(health.breadth)}%)`;
}

export function makeSymbolAlert(bundle: ScoreBundle, health: MarketHealth, reason: AlertReason, now: Date): AlertEvent {
  const s = bundle.scores;
  const message =
    `CS: ${fmt(bundle.confluenceScore)} | Trend: ${fmt(s.trend)} | Vol: ${fmt(s.volatility)} | ` +
    `Volu: ${fmt(s.volume)} | RS: ${fmt(s.rs)} | Pos: ${fmt(s.positioning)} | ` +
    `Regime: ${describeMarket(health)}`;

  return {
    symbol: bundle.symbol,
    createdAt: now,
    reason,
    message,
    confluenceScore: bundle.confluenceScore,
    scores: { ...s },
    regime: health.regime,
  };
}

/**
 * Candidate events for every ranked bundle. Reasons are independent, so one
 * symbol can raise several in a scan. Nothing here consults alert state.
 */
export function buildSymbolAlerts(
  ranked: readonly ScoreBundle[],
  health: MarketHealth,
  settings: AlertSettings,
  divergenceBars: DivergenceBars = new Map(),
  now: Date = new Date(),
): AlertEvent[] {
  if (settings.requireUptrendRegime && health.regime !== 'bull' && health.regime !== 'sideways') {
    logger.info(`Global regime is ${health.regime}; symbol alerts disabled by requireUptrendRegime`);
    return [];
  }

  const { types } = settings;
  const div = settings.rsiDivergence;
  const events: AlertEvent[] = [];

  for (const bundle of ranked) {
    const s = bundle.scores;
    const cs = bundle.confluenceScore;

    if (
      types.highConfluence &&
      cs >= settings.minConfluenceScore &&
      s.trend >= settings.minTrendScore &&
      s.volume >= settings.minVolumeScore &&
      s.positioning >= settings.minPositioningScore
    ) {
      events.push(makeSymbolAlert(bundle, health, 'HIGH_CONFLUENCE', now));
    }

    if (types.volumeSpike && s.volume >= settings.volumeSpikeMinVolumeScore) {
      events.push(makeSymbolAlert(bundle, health, 'VOLUME_SPIKE', now));
    }

    const bbw = bundle.features.volatility_bb_width_pct_20;
    if (
      types.squeezeCandidate &&
      Number.isFinite(bbw) &&
      s.volatility <= settings.squeezeMaxVolScore &&
      bbw <= settings.squeezeMaxBbwPct
    ) {
      events.push(makeSymbolAlert(bundle, health, 'SQUEEZE_CANDIDATE', now));
    }

    if (!types.rsiDivergence) continue;
    for (const tf of div.timeframes) {
      const bars = divergenceBars.get(bundle.symbol)?.get(tf);
      if (!bars || !bars.length) continue;

      const signal = detectRsiDivergenceFromBars(bars, tf, {
        period: 14,
        lookback: div.lookback,
        pivotLookback: div.pivotLookback,
        minStrength: div.minStrength,
        maxBarsFromLast: div.maxBarsFromLast,
      });
      if (signal?.direction === 'bullish') {
        events.push(makeSymbolAlert(bundle, health, `RSI_BULLISH_DIVERGENCE_${tf}`, now));
      } else if (signal?.direction === 'bearish') {
        events.push(makeSymbolAlert(bundle, health, `RSI_BEARISH_DIVERGENCE_${tf}`, now));
      }
    }
  }

  return events;
}
