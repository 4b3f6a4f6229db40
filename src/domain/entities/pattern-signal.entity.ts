export type PatternDirection = 'bullish' | 'bearish';

export type BuiltinPatternName = 'breakout' | 'pullback' | 'volatility_squeeze' | 'rsi_divergence';

export const BUILTIN_PATTERNS: readonly BuiltinPatternName[] = [
  'breakout',
  'pullback',
  'volatility_squeeze',
  'rsi_divergence',
];

export type PatternExtraValue = number | string | null | readonly number[] | readonly string[];

export interface PatternSignal {
  /** A built-in name or one registered at runtime. */
  patternName: string;
  symbol: string;
  timeframe: string;
  triggered: boolean;
  direction: PatternDirection | null;
  strength: number; // 0..100
  confidence: number; // 0..100
  notes: string;
  extras: Record<string, PatternExtraValue>;
}

export function patternLabel(signal: PatternSignal): string {
  return signal.direction ? `${signal.patternName}:${signal.direction}` : signal.patternName;
}
