import { GLOBAL_ALERT_SYMBOL, type AlertEvent, type AlertState } from '../../../domain/entities/alert.entity';
import type { MarketHealth } from '../../../domain/entities/market-health.entity';
import { describeMarket } from './alert.engine';

const STATE_TS = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;

export function emptyAlertState(): AlertState {
  return { symbols: {} };
}

/** `YYYY-MM-DDTHH:MM:SSZ` in UTC. */
export function formatStateTimestamp(date: Date) {
  return `${date.toISOString().slice(0, 19)}Z`;
}

export function parseStateTimestamp(value: string): Date | undefined {
  if (!STATE_TS.test(value)) return undefined;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? undefined : new Date(ms);
}

export interface DedupSettings {
  cooldownMinutes: number;
  minCsDelta: number;
}

export interface AppliedAlerts {
  kept: AlertEvent[];
  state: AlertState;
}

function cloneState(state: AlertState): AlertState {
  const symbols: AlertState['symbols'] = {};
  for (const [symbol, entry] of Object.entries(state.symbols)) symbols[symbol] = { ...entry };
  return state.global_regime ? { symbols, global_regime: state.global_regime } : { symbols };
}

/**
 * Per-symbol dedup. An event passes only when the cooldown since the symbol's
 * last alert has elapsed and its score beats the last one by `minCsDelta`.
 * Events are taken in order; a passing event advances the symbol's state
 * before the next event is checked. The input state is left untouched.
 */
export function applyAlertState(
  events: readonly AlertEvent[],
  state: AlertState,
  settings: DedupSettings,
  now: Date = new Date(),
): AppliedAlerts {
  const next = cloneState(state);
  const cooldownMs = settings.cooldownMinutes * 60_000;
  const kept: AlertEvent[] = [];

  for (const event of events) {
    const prev = next.symbols[event.symbol];
    const lastTs = prev ? parseStateTimestamp(prev.last_ts) : undefined;

    if (lastTs && now.getTime() - lastTs.getTime() < cooldownMs) continue;
    if (prev && Number.isFinite(prev.last_cs) && event.confluenceScore < prev.last_cs + settings.minCsDelta) continue;

    kept.push(event);
    next.symbols[event.symbol] = { last_cs: event.confluenceScore, last_ts: formatStateTimestamp(now) };
  }

  return { kept, state: next };
}

export interface RegimeCheck {
  event: AlertEvent | null;
  state: AlertState;
}

/**
 * First run only records the regime. Afterwards a differing regime yields one
 * global event and overwrites the stored value.
 */
export function checkRegimeChange(
  health: MarketHealth,
  state: AlertState,
  enabled = true,
  now: Date = new Date(),
): RegimeCheck {
  if (!enabled) return { event: null, state };

  const prev = state.global_regime;
  const current = health.regime;
  if (prev === current) return { event: null, state };

  const next: AlertState = { ...cloneState(state), global_regime: current };
  if (prev === undefined) return { event: null, state: next };

  return {
    event: {
      symbol: GLOBAL_ALERT_SYMBOL,
      createdAt: now,
      reason: 'REGIME_CHANGE',
      message: `Market regime changed from ${prev.toUpperCase()} to ${describeMarket(health)}.`,
      confluenceScore: 0,
      regime: current,
    },
    state: next,
  };
}
