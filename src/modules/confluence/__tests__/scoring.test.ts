import { describe, expect, it } from 'vitest';
import {
  atrScore,
  bbWidthScore,
  canonicalComponentKey,
  classifyRegime,
  computeConfluenceScore,
  computePositioningScore,
  computeRelativeStrengthScore,
  computeTrendScore,
  computeVolatilityScore,
  computeVolumeScore,
  contractionScore,
  equalWeights,
  extensionScore,
  fundingCrowdingScore,
  maSlopeScore,
  oiBuildUpScore,
  resolveWeights,
  returnScore,
  rvolScore,
} from '../scoring';
import { computeTrendFeatures, NEUTRAL_TREND_FEATURES } from '../features';
import { makeBars, rising } from './bars.fixture';

describe('trend score', () => {
  it('is a neutral 50 with too little history', () => {
    const result = computeTrendScore(computeTrendFeatures(makeBars(rising(55))));
    expect(result.score).toBe(50);
    expect(result.available).toBe(false);
    expect(result.features.trend_ma_alignment).toBe(0);
  });

  it('scores a steady uptrend above neutral and exposes component scores', () => {
    const result = computeTrendScore(computeTrendFeatures(makeBars(rising(100))));
    expect(result.available).toBe(true);
    expect(result.score).toBeGreaterThan(50);
    expect(result.features.trend_ma_alignment_score).toBe(100);
    expect(result.features.trend_persistence_score).toBe(100);
  });

  it('maps extension and slope on their curves', () => {
    expect(extensionScore(3)).toBe(100);
    expect(extensionScore(-10)).toBe(75);
    expect(extensionScore(40)).toBe(0);
    expect(maSlopeScore(0)).toBe(50);
    expect(maSlopeScore(12)).toBe(100);
  });

  it('treats non-finite inputs as neutral values', () => {
    const result = computeTrendScore({ ...NEUTRAL_TREND_FEATURES, trend_persistence: Number.NaN, has_trend_data: 1 });
    expect(result.features.trend_persistence).toBe(0.5);
    expect(result.score).toBeGreaterThanOrEqual(0);
    expect(result.score).toBeLessThanOrEqual(100);
  });
});

describe('volatility score', () => {
  it('puts the half-way points of each curve at 50', () => {
    expect(atrScore(5)).toBe(50);
    expect(bbWidthScore(10)).toBe(50);
    expect(contractionScore(1)).toBe(50);
    expect(contractionScore(2.5)).toBe(0);
    expect(atrScore(0)).toBe(100);
  });

  it('blends the three components', () => {
    const result = computeVolatilityScore({
      volatility_atr_pct_14: 5,
      volatility_bb_width_pct_20: 10,
      volatility_contraction_ratio_60_20: 1,
      has_volatility_data: 1,
    });
    expect(result.score).toBeCloseTo(50, 10);
  });
});

describe('volume score', () => {
  it('maps RVOL on the piecewise ramp', () => {
    expect(rvolScore(0)).toBe(0);
    expect(rvolScore(0.5)).toBe(30);
    expect(rvolScore(1.25)).toBe(70);
    expect(rvolScore(2.2)).toBeCloseTo(89.333, 3);
    expect(rvolScore(5)).toBe(85);
    expect(rvolScore(10)).toBe(70);
  });

  it('blends RVOL, slope and percentile', () => {
    const result = computeVolumeScore({
      volume_rvol_20_1: 2.2,
      volume_trend_slope_pct_20_10: 0,
      volume_percentile_60: 0.5,
      has_volume_data: 1,
    });
    expect(result.score).toBeCloseTo(67.7, 6);
    expect(result.features.volume_rvol_score).toBeCloseTo(89.333, 3);
  });
});

describe('relative strength score', () => {
  it('maps raw returns linearly between the caps', () => {
    expect(returnScore(50)).toBe(50);
    expect(returnScore(-60)).toBe(0);
    expect(returnScore(200)).toBe(100);
  });

  it('prefers the universe rank over the raw return', () => {
    const result = computeRelativeStrengthScore({ has_rs_data: 1, rs_ret_20_pct: 50, rs_20_rank_pct: 80 });
    expect(result.score).toBeCloseTo(80, 10);
    expect(result.features.rs_20_score).toBe(80);
  });

  it('renormalizes horizon weights over the horizons present', () => {
    const result = computeRelativeStrengthScore({ has_rs_data: 1, rs_ret_20_pct: 50, rs_ret_60_pct: 150 });
    expect(result.score).toBeCloseTo(71.875, 10);
  });

  it('is neutral when the family has no data', () => {
    const result = computeRelativeStrengthScore({ has_rs_data: 0 });
    expect(result).toEqual({ score: 50, available: false, features: { has_rs_data: 0 } });
  });
});

describe('positioning score', () => {
  it('follows the funding crowding curve in both directions', () => {
    expect(fundingCrowdingScore(0)).toBe(100);
    expect(fundingCrowdingScore(-0.0001)).toBe(100);
    expect(fundingCrowdingScore(0.0005)).toBeCloseTo(70, 10);
    expect(fundingCrowdingScore(-0.00075)).toBeCloseTo(55, 10);
    expect(fundingCrowdingScore(0.003)).toBe(10);
  });

  it('maps open-interest change onto 0-100', () => {
    expect(oiBuildUpScore(20)).toBe(60);
    expect(oiBuildUpScore(-150)).toBe(0);
  });

  it('weights funding 0.7 and open interest 0.3', () => {
    const result = computePositioningScore({
      positioning_funding_rate: 0.0001,
      positioning_oi_change_pct: 20,
      has_positioning_data: 1,
    });
    expect(result.score).toBeCloseTo(88, 10);
  });
});

describe('regime classifier', () => {
  it('needs every bull floor for bull', () => {
    expect(classifyRegime({ btcTrend: 70, breadth: 65, riskOn: 70 })).toBe('bull');
    expect(classifyRegime({ btcTrend: 70, breadth: 55, riskOn: 70 })).toBe('sideways');
  });

  it('needs every bear ceiling for bear', () => {
    expect(classifyRegime({ btcTrend: 30, breadth: 30, riskOn: 30 })).toBe('bear');
  });

  it('derives risk-on from trend and breadth when it is missing', () => {
    expect(classifyRegime({ btcTrend: 70, breadth: 70 })).toBe('bull');
    expect(classifyRegime({ btcTrend: 50 })).toBe('sideways');
  });

  it('is unknown only without any input', () => {
    expect(classifyRegime({})).toBe('unknown');
  });

  it('accepts custom thresholds', () => {
    expect(classifyRegime({ btcTrend: 55, breadth: 55, riskOn: 55 }, { bullMinRiskOn: 50, bullMinBreadth: 50, bullMinTrend: 50 })).toBe(
      'bull',
    );
  });
});

describe('confluence blend', () => {
  const allAvailable = {
    has_trend_data: 1,
    has_volume_data: 1,
    has_volatility_data: 1,
    has_rs_data: 1,
    has_positioning_data: 1,
  } as const;

  it('is the plain mean under equal weights', () => {
    const result = computeConfluenceScore(
      { trend: 80, volume: 80, volatility: 80, rs: 80, positioning: 80 },
      { regime: 'bull', regimeWeights: { bull: equalWeights() } },
    );
    expect(result.confluenceScore).toBeCloseTo(80, 10);
    expect(result.confidence).toBeCloseTo(100, 10);
    expect(result.regime).toBe('bull');
  });

  it('skips unavailable components instead of counting them as zero', () => {
    const result = computeConfluenceScore(
      { trend: 80, volume: 60, volatility: 50, rs: 70, positioning: 50 },
      { regime: 'bull', regimeWeights: { bull: equalWeights() }, features: { ...allAvailable, has_positioning_data: 0 } },
    );
    expect(result.confluenceScore).toBeCloseTo(65, 10);
    expect(result.confidence).toBeCloseTo(80, 10);
  });

  it('drops confidence as components go missing', () => {
    const scores = { trend: 60, volume: 60, volatility: 60, rs: 60, positioning: 60 };
    const weights = { trend: 0.3, volume: 0.2, volatility: 0.1, rs: 0.25, positioning: 0.15 };
    const full = computeConfluenceScore(scores, { weights });
    const fewer = computeConfluenceScore(scores, { weights, availability: { rs: false } });
    const fewest = computeConfluenceScore(scores, { weights, availability: { rs: false, trend: false } });
    expect(full.confidence).toBeGreaterThan(fewer.confidence);
    expect(fewer.confidence).toBeGreaterThan(fewest.confidence);
  });

  it('scores 0 with zero confidence when nothing is usable', () => {
    const result = computeConfluenceScore({}, { weights: { trend: 1 } });
    expect(result.confluenceScore).toBe(0);
    expect(result.confidence).toBe(0);
  });

  it('lets explicit weights win over the regime table', () => {
    const result = computeConfluenceScore(
      { trend: 90, volume: 10 },
      { regime: 'bull', weights: { trend: 1 }, regimeWeights: { bull: { volume: 1 } } },
    );
    expect(result.confluenceScore).toBe(90);
  });

  it('falls back to equal weights for an unconfigured regime', () => {
    expect(resolveWeights('bear', { bull: { trend: 1 } })).toEqual(equalWeights());
    expect(resolveWeights('bull', { bull: { trend: 1 } })).toEqual({ trend: 1 });
  });

  it('accepts score-suffixed weight keys', () => {
    expect(canonicalComponentKey(' Trend_Score ')).toBe('trend');
    expect(canonicalComponentKey('momentum')).toBeUndefined();
  });
});
