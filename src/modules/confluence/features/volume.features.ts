import type { Bar } from '../../../domain/entities/bar.entity';
import type { VolumeFeatures } from '../../../domain/types/features.type';
import { mean, takeLast } from '../utilities';

export const MIN_VOLUME_BARS = 40;

export const NEUTRAL_VOLUME_FEATURES: Readonly<VolumeFeatures> = {
  volume_rvol_20_1: 1,
  volume_trend_slope_pct_20_10: 0,
  volume_percentile_60: 0.5,
  has_volume_data: 0,
};

/** Mean of the last `recentWindow` volumes over the mean of the `lookback` volumes before them. */
export function computeRvol(volumes: readonly number[], lookback = 20, recentWindow = 1) {
  const needed = lookback + recentWindow;
  if (volumes.length < needed) return 1;
  const recent = takeLast(volumes, recentWindow);
  const base = volumes.slice(-needed, -recentWindow);
  const avgBase = mean(base);
  if (avgBase <= 0) return 1;
  return mean(recent) / avgBase;
}

export function computeVolumeTrendSlope(volumes: readonly number[], maPeriod = 20, lookback = 10) {
  const needed = maPeriod + lookback;
  if (volumes.length < needed) return 0;
  const recent = takeLast(volumes, needed);
  const maStart = mean(recent.slice(0, maPeriod));
  const maEnd = mean(recent.slice(-maPeriod));
  if (maStart <= 0) return 0;
  return ((maEnd - maStart) / maStart) * 100;
}

/**
 * Share of the trailing window (up to `lookback` volumes before the last) that the
 * last volume is greater than or equal to; 0.5 without any history.
 */
export function computeVolumePercentile(volumes: readonly number[], lookback = 60) {
  if (volumes.length < 2) return 0.5;
  const window = volumes.slice(-(lookback + 1), -1);
  const last = volumes[volumes.length - 1];
  return window.filter((v) => v <= last).length / window.length;
}

export function computeVolumeFeatures(bars: readonly Bar[], minBars = MIN_VOLUME_BARS): VolumeFeatures {
  if (bars.length < minBars) return { ...NEUTRAL_VOLUME_FEATURES };

  const volumes = bars.map((b) => b.volume);
  return {
    volume_rvol_20_1: computeRvol(volumes, 20, 1),
    volume_trend_slope_pct_20_10: computeVolumeTrendSlope(volumes, 20, 10),
    volume_percentile_60: computeVolumePercentile(volumes, 60),
    has_volume_data: 1,
  };
}
