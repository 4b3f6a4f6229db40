import { describe, expect, it } from 'vitest';
import { GLOBAL_ALERT_SYMBOL, type AlertEvent, type AlertState } from '../../../domain/entities/alert.entity';
import type { MarketHealth } from '../../../domain/entities/market-health.entity';
import {
  applyAlertState,
  buildSymbolAlerts,
  checkRegimeChange,
  DEFAULT_ALERT_SETTINGS,
  emptyAlertState,
  formatStateTimestamp,
  makeSymbolAlert,
  parseStateTimestamp,
  type AlertSettings,
} from '../alerts';
import { DIVERGENCE_CLOSES, makeBars } from './bars.fixture';
import { makeBundle } from './bundle.fixture';

const T0 = new Date('2024-05-01T12:00:00Z');
const minutesAfter = (minutes: number) => new Date(T0.getTime() + minutes * 60_000);

const bull: MarketHealth = { regime: 'bull', btcTrend: 72.345, breadth: 64 };

function settings(overrides: Partial<AlertSettings> = {}): AlertSettings {
  return { ...DEFAULT_ALERT_SETTINGS, ...overrides };
}

function event(symbol: string, confluenceScore: number, at: Date): AlertEvent {
  return makeSymbolAlert(makeBundle(symbol, { confluenceScore }), bull, 'HIGH_CONFLUENCE', at);
}

describe('buildSymbolAlerts', () => {
  const hot = makeBundle('AAAUSDT', {
    confluenceScore: 70,
    scores: { trend: 60, volume: 80, positioning: 55, volatility: 30 },
    features: { volatility_bb_width_pct_20: 4 },
  });

  it('raises every reason a bundle qualifies for', () => {
    const events = buildSymbolAlerts([hot], bull, settings(), new Map(), T0);
    expect(events.map((e) => e.reason)).toEqual(['HIGH_CONFLUENCE', 'VOLUME_SPIKE', 'SQUEEZE_CANDIDATE']);
  });

  it('formats the score summary with the market context', () => {
    const [first] = buildSymbolAlerts([hot], bull, settings(), new Map(), T0);
    expect(first.message).toBe(
      'CS: 70.0 | Trend: 60.0 | Vol: 30.0 | Volu: 80.0 | RS: 50.0 | Pos: 55.0 | Regime: BULL (BTC trend 72.3, breadth 64.0%)',
    );
    expect(first.createdAt).toBe(T0);
    expect(first.regime).toBe('bull');
  });

  it('honours the per-type toggles', () => {
    const events = buildSymbolAlerts(
      [hot],
      bull,
      settings({ types: { ...DEFAULT_ALERT_SETTINGS.types, volumeSpike: false, squeezeCandidate: false } }),
      new Map(),
      T0,
    );
    expect(events.map((e) => e.reason)).toEqual(['HIGH_CONFLUENCE']);
  });

  it('suppresses symbol alerts outside bull and sideways when required', () => {
    const bear: MarketHealth = { regime: 'bear', btcTrend: 30, breadth: 20 };
    expect(buildSymbolAlerts([hot], bear, settings({ requireUptrendRegime: true }), new Map(), T0)).toEqual([]);
    expect(buildSymbolAlerts([hot], bear, settings(), new Map(), T0)).toHaveLength(3);
  });

  it('adds divergence alerts per configured timeframe', () => {
    const quiet = makeBundle('AAAUSDT', { confluenceScore: 40 });
    const bars = new Map([['AAAUSDT', new Map([['4h', makeBars(DIVERGENCE_CLOSES, { spread: 0, timeframe: '4h' })]])]]);

    const fullWindow = { ...DEFAULT_ALERT_SETTINGS.rsiDivergence, lookback: DIVERGENCE_CLOSES.length };

    const loose = settings({ rsiDivergence: { ...fullWindow, minStrength: 1 } });
    expect(buildSymbolAlerts([quiet], bull, loose, bars, T0).map((e) => e.reason)).toEqual([
      'RSI_BULLISH_DIVERGENCE_4h',
    ]);
    // The RSI gap here is about 4 points, under the default alert minimum of 5.
    expect(buildSymbolAlerts([quiet], bull, settings({ rsiDivergence: fullWindow }), bars, T0)).toEqual([]);
    // 46 bars never fill the default 150-bar lookback.
    const shortHistory = settings({ rsiDivergence: { ...DEFAULT_ALERT_SETTINGS.rsiDivergence, minStrength: 1 } });
    expect(buildSymbolAlerts([quiet], bull, shortHistory, bars, T0)).toEqual([]);
  });
});

describe('applyAlertState', () => {
  const dedup = { cooldownMinutes: 60, minCsDelta: 3 };

  it('records the first alert for a cold symbol', () => {
    const { kept, state } = applyAlertState([event('AAAUSDT', 70, T0)], emptyAlertState(), dedup, T0);
    expect(kept).toHaveLength(1);
    expect(state.symbols.AAAUSDT).toEqual({ last_cs: 70, last_ts: '2024-05-01T12:00:00Z' });
  });

  it('suppresses a second alert inside the cooldown', () => {
    const first = applyAlertState([event('AAAUSDT', 70, T0)], emptyAlertState(), dedup, T0);
    const later = minutesAfter(9);
    const second = applyAlertState([event('AAAUSDT', 71, later)], first.state, dedup, later);
    expect(second.kept).toEqual([]);
    expect(second.state.symbols.AAAUSDT.last_cs).toBe(70);
  });

  it('needs both the cooldown and the score delta', () => {
    const state: AlertState = { symbols: { AAAUSDT: { last_cs: 70, last_ts: '2024-05-01T12:00:00Z' } } };
    const later = minutesAfter(61);
    expect(applyAlertState([event('AAAUSDT', 72, later)], state, dedup, later).kept).toEqual([]);

    const { kept, state: next } = applyAlertState([event('AAAUSDT', 74, later)], state, dedup, later);
    expect(kept).toHaveLength(1);
    expect(next.symbols.AAAUSDT).toEqual({ last_cs: 74, last_ts: '2024-05-01T13:01:00Z' });
  });

  it('lets only the first of several same-scan events through per symbol', () => {
    const events = [event('AAAUSDT', 70, T0), event('AAAUSDT', 80, T0), event('BBBUSDT', 65, T0)];
    const { kept } = applyAlertState(events, emptyAlertState(), dedup, T0);
    expect(kept.map((e) => [e.symbol, e.confluenceScore])).toEqual([
      ['AAAUSDT', 70],
      ['BBBUSDT', 65],
    ]);
  });

  it('leaves the input state untouched', () => {
    const state = emptyAlertState();
    applyAlertState([event('AAAUSDT', 70, T0)], state, dedup, T0);
    expect(state).toEqual({ symbols: {} });
  });

  it('treats an unparseable timestamp as no cooldown', () => {
    const state: AlertState = { symbols: { AAAUSDT: { last_cs: 70, last_ts: 'yesterday' } } };
    expect(applyAlertState([event('AAAUSDT', 73, T0)], state, dedup, T0).kept).toHaveLength(1);
  });
});

describe('checkRegimeChange', () => {
  const bear: MarketHealth = { regime: 'bear', btcTrend: 30, breadth: 20 };

  it('only records the regime on the first run', () => {
    const { event: first, state } = checkRegimeChange(bull, emptyAlertState(), true, T0);
    expect(first).toBeNull();
    expect(state.global_regime).toBe('bull');
  });

  it('alerts exactly once when the regime flips', () => {
    const start: AlertState = { symbols: {}, global_regime: 'bull' };
    const flipped = checkRegimeChange(bear, start, true, T0);
    expect(flipped.event).toEqual({
      symbol: GLOBAL_ALERT_SYMBOL,
      createdAt: T0,
      reason: 'REGIME_CHANGE',
      message: 'Market regime changed from BULL to BEAR (BTC trend 30.0, breadth 20.0%).',
      confluenceScore: 0,
      regime: 'bear',
    });
    expect(flipped.state.global_regime).toBe('bear');
    expect(checkRegimeChange(bear, flipped.state, true, minutesAfter(60)).event).toBeNull();
  });

  it('does nothing when disabled', () => {
    const start: AlertState = { symbols: {}, global_regime: 'bull' };
    const result = checkRegimeChange(bear, start, false, T0);
    expect(result.event).toBeNull();
    expect(result.state).toBe(start);
  });
});

describe('state timestamps', () => {
  it('formats to whole seconds in UTC', () => {
    expect(formatStateTimestamp(new Date(Date.UTC(2024, 4, 6, 7, 8, 9, 500)))).toBe('2024-05-06T07:08:09Z');
  });

  it('parses only the stored format', () => {
    expect(parseStateTimestamp('2024-05-06T07:08:09Z')?.getTime()).toBe(Date.UTC(2024, 4, 6, 7, 8, 9));
    expect(parseStateTimestamp('2024-05-06 07:08')).toBeUndefined();
  });
});
