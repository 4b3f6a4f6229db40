import type { ScoreBundle } from '../../../domain/entities/score-bundle.entity';

export interface FilterSettings {
  minTrendScore: number;
  minRsScore: number;
  minVolumeScore: number;
  minVolatilityScore: number;
  /** 0 disables the ceiling. */
  maxAtrPct: number;
  /** 0 disables the ceiling. */
  maxBbWidthPct: number;
}

export const DEFAULT_FILTER_SETTINGS: Readonly<FilterSettings> = {
  minTrendScore: 0,
  minRsScore: 0,
  minVolumeScore: 0,
  minVolatilityScore: 0,
  maxAtrPct: 0,
  maxBbWidthPct: 0,
};

export interface FilterVerdict {
  pass: boolean;
  reasons: string[];
}

export class RankingFilter {
  cfg: FilterSettings;

  constructor(cfg: Partial<FilterSettings> = {}) {
    this.cfg = { ...DEFAULT_FILTER_SETTINGS, ...cfg };
  }

  check(bundle: ScoreBundle): FilterVerdict {
    const { scores, features } = bundle;
    const reasons: string[] = [];

    if (scores.trend < this.cfg.minTrendScore) reasons.push(`trend<${this.cfg.minTrendScore}`);
    if (scores.rs < this.cfg.minRsScore) reasons.push(`rs<${this.cfg.minRsScore}`);
    if (scores.volume < this.cfg.minVolumeScore) reasons.push(`volume<${this.cfg.minVolumeScore}`);
    if (scores.volatility < this.cfg.minVolatilityScore) reasons.push(`volatility<${this.cfg.minVolatilityScore}`);

    if (this.cfg.maxAtrPct > 0) {
      const atr = features.volatility_atr_pct_14;
      if (!Number.isFinite(atr)) reasons.push('atr_pct_unusable');
      else if (atr > this.cfg.maxAtrPct) reasons.push(`atr_pct>${this.cfg.maxAtrPct}`);
    }
    if (this.cfg.maxBbWidthPct > 0) {
      const bbw = features.volatility_bb_width_pct_20;
      if (!Number.isFinite(bbw)) reasons.push('bb_width_pct_unusable');
      else if (bbw > this.cfg.maxBbWidthPct) reasons.push(`bb_width_pct>${this.cfg.maxBbWidthPct}`);
    }

    return { pass: reasons.length === 0, reasons };
  }
}
