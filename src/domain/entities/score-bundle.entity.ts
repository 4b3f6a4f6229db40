import type { FeatureBundle } from '../types/features.type';
import type { Regime } from './market-health.entity';
import type { PatternSignal } from './pattern-signal.entity';

export type ComponentKey = 'trend' | 'volume' | 'volatility' | 'rs' | 'positioning';

export const COMPONENT_KEYS: readonly ComponentKey[] = ['trend', 'volume', 'volatility', 'rs', 'positioning'];

export type ComponentScores = Record<ComponentKey, number>;

export type ComponentWeights = Partial<Record<ComponentKey, number>>;

export interface ScoreBundle {
  symbol: string;
  timeframe: string;
  features: FeatureBundle;
  scores: ComponentScores;
  confluenceScore: number;
  confidence: number;
  regime: Regime;
  weights: ComponentWeights;
  /** `<pattern>` or `<pattern>:<direction>` for every triggered detector. */
  patterns: string[];
  patternSignals: PatternSignal[];
}
