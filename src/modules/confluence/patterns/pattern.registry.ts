import { Logger } from '../../../shared/logger';
import type { PatternSignal } from '../../../domain/entities/pattern-signal.entity';
import { detectBreakout } from './breakout.pattern';
import { detectPullback } from './pullback.pattern';
import { detectRsiDivergence } from './rsi-divergence.pattern';
import { detectVolatilitySqueeze } from './volatility-squeeze.pattern';
import type { PatternContext, PatternDetector, PatternParamsByName } from './pattern.types';

const logger = new Logger('PatternRegistry');

const registry = new Map<string, PatternDetector>([
  ['breakout', (ctx, params) => detectBreakout(ctx, params.breakout)],
  ['pullback', (ctx, params) => detectPullback(ctx, params.pullback)],
  ['volatility_squeeze', (ctx, params) => detectVolatilitySqueeze(ctx, params.volatility_squeeze)],
  ['rsi_divergence', (ctx, params) => detectRsiDivergence(ctx, params.rsi_divergence)],
]);

export function registerPattern(name: string, detector: PatternDetector): void {
  registry.set(name, detector);
}

export function getPattern(name: string): PatternDetector | undefined {
  return registry.get(name);
}

export function registeredPatterns(): string[] {
  return [...registry.keys()];
}

/** Detectors named in `enabled`, or every registered detector when it is empty or absent. */
export function getEnabledPatterns(enabled?: readonly string[]): Map<string, PatternDetector> {
  if (!enabled || !enabled.length) return new Map(registry);
  const wanted = new Set(enabled);
  return new Map([...registry].filter(([name]) => wanted.has(name)));
}

export interface PatternsSettings {
  enabled?: readonly string[];
  params?: PatternParamsByName;
}

/** Runs every enabled detector; a detector that throws is logged and skipped. */
export function runPatterns(ctx: PatternContext, settings: PatternsSettings = {}): PatternSignal[] {
  const signals: PatternSignal[] = [];
  for (const [name, detect] of getEnabledPatterns(settings.enabled)) {
    try {
      const signal = detect(ctx, settings.params ?? {});
      if (signal?.triggered) signals.push(signal);
    } catch (error) {
      logger.warn(`Pattern ${name} failed for ${ctx.symbol}`, error);
    }
  }
  return signals;
}
