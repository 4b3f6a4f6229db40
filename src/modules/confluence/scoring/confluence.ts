import type { Regime } from '../../../domain/entities/market-health.entity';
import {
  COMPONENT_KEYS,
  type ComponentKey,
  type ComponentScores,
  type ComponentWeights,
} from '../../../domain/entities/score-bundle.entity';
import type { AvailabilityFlagKey, FeatureBundle } from '../../../domain/types/features.type';
import { Logger } from '../../../shared/logger';
import { clampScore } from '../utilities';

const logger = new Logger('ConfluenceBlender');

export type RegimeWeightTable = Partial<Record<Regime, ComponentWeights>>;

const AVAILABILITY_FLAGS: Record<ComponentKey, AvailabilityFlagKey> = {
  trend: 'has_trend_data',
  volume: 'has_volume_data',
  volatility: 'has_volatility_data',
  rs: 'has_rs_data',
  positioning: 'has_positioning_data',
};

const WEIGHT_KEY_ALIASES: Record<string, ComponentKey> = {
  trend: 'trend',
  trend_score: 'trend',
  volume: 'volume',
  volume_score: 'volume',
  volatility: 'volatility',
  volatility_score: 'volatility',
  rs: 'rs',
  rs_score: 'rs',
  positioning: 'positioning',
  positioning_score: 'positioning',
};

export function canonicalComponentKey(key: string): ComponentKey | undefined {
  return WEIGHT_KEY_ALIASES[key.trim().toLowerCase()];
}

export function equalWeights(): ComponentWeights {
  const w = 1 / COMPONENT_KEYS.length;
  const out: ComponentWeights = {};
  for (const k of COMPONENT_KEYS) out[k] = w;
  return out;
}

// Unconfigured regimes are warned about once per process.
const warnedRegimes = new Set<string>();

export function resolveWeights(regime: Regime, table?: RegimeWeightTable): ComponentWeights {
  const configured = table?.[regime];
  if (configured && Object.keys(configured).length) return { ...configured };

  if (!warnedRegimes.has(regime)) {
    warnedRegimes.add(regime);
    logger.warn(`No confluence weights configured for regime "${regime}", using equal weights`);
  }
  return equalWeights();
}

export interface ConfluenceOptions {
  regime?: Regime;
  /** Takes precedence over the regime table. */
  weights?: ComponentWeights;
  regimeWeights?: RegimeWeightTable;
  availability?: Partial<Record<ComponentKey, boolean>>;
  features?: Partial<FeatureBundle>;
}

export interface ConfluenceResult {
  confluenceScore: number;
  confidence: number;
  regime: Regime;
  weights: ComponentWeights;
}

function isAvailable(key: ComponentKey, options: ConfluenceOptions) {
  const flag = options.features?.[AVAILABILITY_FLAGS[key]];
  if (flag !== undefined) return flag >= 1;
  return options.availability?.[key] ?? true;
}

/**
 * Availability-aware weighted mean of the component scores. Components without
 * data are skipped rather than counted as zero; confidence is the share of the
 * configured weight that was actually usable.
 */
export function computeConfluenceScore(
  scores: Partial<ComponentScores>,
  options: ConfluenceOptions = {},
): ConfluenceResult {
  const regime = options.regime ?? 'sideways';
  const weights = options.weights ? { ...options.weights } : resolveWeights(regime, options.regimeWeights);

  let num = 0;
  let used = 0;
  let total = 0;

  for (const key of COMPONENT_KEYS) {
    const w = weights[key];
    if (w === undefined || !Number.isFinite(w)) continue;
    total += w;

    const value = scores[key];
    if (value === undefined || !Number.isFinite(value)) continue;
    if (!isAvailable(key, options)) continue;

    num += w * value;
    used += w;
  }

  return {
    confluenceScore: used ? clampScore(num / used, 0) : 0,
    confidence: total > 0 ? clampScore((used / total) * 100, 0) : 0,
    regime,
    weights,
  };
}
