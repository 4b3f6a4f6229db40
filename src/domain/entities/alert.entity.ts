import type { ComponentScores } from './score-bundle.entity';
import type { Regime } from './market-health.entity';

export const GLOBAL_ALERT_SYMBOL = '__GLOBAL__';

export type AlertReason =
  | 'HIGH_CONFLUENCE'
  | 'VOLUME_SPIKE'
  | 'SQUEEZE_CANDIDATE'
  | 'REGIME_CHANGE'
  | `RSI_BULLISH_DIVERGENCE_${string}`
  | `RSI_BEARISH_DIVERGENCE_${string}`;

export interface AlertEvent {
  symbol: string;
  createdAt: Date;
  reason: AlertReason;
  message: string;
  confluenceScore: number;
  scores?: ComponentScores;
  regime: Regime;
}

export interface SymbolAlertState {
  last_cs: number;
  last_ts: string; // YYYY-MM-DDTHH:MM:SSZ
}

/** Persisted alert state; key names are the on-disk format. */
export interface AlertState {
  symbols: Record<string, SymbolAlertState>;
  global_regime?: Regime;
}
