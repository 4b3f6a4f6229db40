import type { Bar } from '../../../domain/entities/bar.entity';
import type { PatternDirection, PatternSignal } from '../../../domain/entities/pattern-signal.entity';
import { clampScore, takeLast, wilderRsi } from '../utilities';
import type { PatternContext, RsiDivergenceParams } from './pattern.types';

export const DEFAULT_RSI_DIVERGENCE_PARAMS: Readonly<RsiDivergenceParams> = {
  period: 14,
  lookback: 150,
  pivotLookback: 3,
  minStrength: 1,
  maxBarsFromLast: 5,
};

type PivotMode = 'high' | 'low';

/**
 * Indices whose value is the extreme of the `2 * lookback + 1` window centred on them.
 * Windows holding a non-finite value never produce a pivot.
 */
export function findPivots(values: readonly number[], lookback: number, mode: PivotMode): number[] {
  const pivots: number[] = [];
  for (let i = lookback; i < values.length - lookback; i++) {
    const window = values.slice(i - lookback, i + lookback + 1);
    if (!window.every((v) => Number.isFinite(v))) continue;
    const extreme = mode === 'high' ? Math.max(...window) : Math.min(...window);
    if (values[i] === extreme) pivots.push(i);
  }
  return pivots;
}

function lastTwo(indices: readonly number[]): [number, number] | undefined {
  if (indices.length < 2) return undefined;
  return [indices[indices.length - 2], indices[indices.length - 1]];
}

function formatBarTime(bar: Bar | undefined) {
  if (!bar) return 'n/a';
  return new Date(bar.openTime).toISOString().slice(0, 16).replace('T', ' ');
}

interface PivotPair {
  price: [number, number];
  rsi: [number, number];
}

function buildSignal(
  ctx: PatternContext,
  window: readonly Bar[],
  direction: PatternDirection,
  pivots: PivotPair,
  prices: readonly number[],
  rsi: readonly number[],
): PatternSignal {
  const [p1, p2] = pivots.price;
  const [r1, r2] = pivots.rsi;
  const barsSince = prices.length - 1 - p2;
  const rsiDelta = rsi[r2] - rsi[r1];
  const strength = clampScore(Math.abs(rsiDelta) * 5);
  const recency = clampScore(100 - barsSince * 10);
  const label = direction === 'bullish' ? 'Bullish' : 'Bearish';

  return {
    patternName: 'rsi_divergence',
    symbol: ctx.symbol,
    timeframe: ctx.timeframe,
    triggered: true,
    direction,
    strength,
    confidence: clampScore(0.6 * strength + 0.4 * recency),
    notes:
      `${label} divergence: price ${prices[p1].toFixed(4)}->${prices[p2].toFixed(4)}, ` +
      `RSI ${rsi[r1].toFixed(1)}->${rsi[r2].toFixed(1)}`,
    extras: {
      price_pivots: [p1, p2],
      rsi_pivots: [r1, r2],
      rsi_delta: rsiDelta,
      bars_since: barsSince,
      pivot_times: [formatBarTime(window[p1]), formatBarTime(window[p2])],
    },
  };
}

/**
 * Regular divergence on the last two pivots of the window.
 * Bullish: lower price low with a higher RSI low. Bearish mirrors it on highs.
 * The latest price pivot must sit within `maxBarsFromLast` bars of the window's end;
 * when both directions qualify the stronger one wins. Fewer bars than a full
 * lookback window yields nothing.
 */
export function detectRsiDivergence(
  ctx: PatternContext,
  overrides: Partial<RsiDivergenceParams> = {},
): PatternSignal | null {
  const p = { ...DEFAULT_RSI_DIVERGENCE_PARAMS, ...overrides };
  if (ctx.bars.length < Math.max(p.lookback, p.period + 2)) return null;
  const window = takeLast(ctx.bars, p.lookback);

  const closes = window.map((b) => b.close);
  const highs = window.map((b) => b.high);
  const lows = window.map((b) => b.low);
  const rsi = wilderRsi(closes, p.period);
  const latest = window.length - 1;

  let bull: PatternSignal | null = null;
  const priceLows = lastTwo(findPivots(lows, p.pivotLookback, 'low'));
  const rsiLows = lastTwo(findPivots(rsi, p.pivotLookback, 'low'));
  if (priceLows && rsiLows) {
    const [p1, p2] = priceLows;
    const [r1, r2] = rsiLows;
    if (latest - p2 <= p.maxBarsFromLast && lows[p2] < lows[p1] && rsi[r2] > rsi[r1] + p.minStrength) {
      bull = buildSignal(ctx, window, 'bullish', { price: priceLows, rsi: rsiLows }, lows, rsi);
    }
  }

  let bear: PatternSignal | null = null;
  const priceHighs = lastTwo(findPivots(highs, p.pivotLookback, 'high'));
  const rsiHighs = lastTwo(findPivots(rsi, p.pivotLookback, 'high'));
  if (priceHighs && rsiHighs) {
    const [h1, h2] = priceHighs;
    const [r1, r2] = rsiHighs;
    if (latest - h2 <= p.maxBarsFromLast && highs[h2] > highs[h1] && rsi[r2] < rsi[r1] - p.minStrength) {
      bear = buildSignal(ctx, window, 'bearish', { price: priceHighs, rsi: rsiHighs }, highs, rsi);
    }
  }

  if (bull && bear) return bull.strength >= bear.strength ? bull : bear;
  return bull ?? bear;
}

/** Detection on a bare bar series, for callers without features or scores. */
export function detectRsiDivergenceFromBars(
  bars: readonly Bar[],
  timeframe: string,
  overrides: Partial<RsiDivergenceParams> = {},
): PatternSignal | null {
  const symbol = bars.length ? bars[bars.length - 1].symbol : 'UNKNOWN';
  return detectRsiDivergence({ symbol, timeframe, bars, features: {}, scores: {} }, overrides);
}
