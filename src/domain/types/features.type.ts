// Stable feature keys. Every family carries its own availability flag.

export type FeatureFlag = 0 | 1;

export interface TrendFeatures {
  trend_ma_alignment: number; // -1 | 0 | 1
  trend_persistence: number; // 0..1
  trend_distance_from_ma_pct: number;
  trend_ma_slope_pct: number;
  has_trend_data: FeatureFlag;
}

export interface VolatilityFeatures {
  volatility_atr_pct_14: number;
  volatility_bb_width_pct_20: number;
  volatility_contraction_ratio_60_20: number;
  has_volatility_data: FeatureFlag;
}

export interface VolumeFeatures {
  volume_rvol_20_1: number;
  volume_trend_slope_pct_20_10: number;
  volume_percentile_60: number; // 0..1
  has_volume_data: FeatureFlag;
}

/** Returns are absent for horizons without enough history; ranks only when a universe context was supplied. */
export interface RelativeStrengthFeatures {
  rs_ret_20_pct?: number;
  rs_ret_60_pct?: number;
  rs_ret_120_pct?: number;
  rs_20_rank_pct?: number;
  rs_60_rank_pct?: number;
  rs_120_rank_pct?: number;
  has_rs_data: FeatureFlag;
}

export interface PositioningFeatures {
  positioning_funding_rate: number;
  positioning_oi_change_pct: number;
  has_positioning_data: FeatureFlag;
}

export type FeatureBundle = TrendFeatures &
  VolatilityFeatures &
  VolumeFeatures &
  RelativeStrengthFeatures &
  PositioningFeatures;

export type AvailabilityFlagKey =
  | 'has_trend_data'
  | 'has_volatility_data'
  | 'has_volume_data'
  | 'has_rs_data'
  | 'has_positioning_data';

/** Debug mapping a normalizer returns: raw inputs plus intermediate component scores. */
export type DebugFeatures = Record<string, number>;
