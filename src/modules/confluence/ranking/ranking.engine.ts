import type { ScoreBundle } from '../../../domain/entities/score-bundle.entity';
import { Logger } from '../../../shared/logger';
import { RankingFilter, type FilterSettings } from './ranking.filter';

export interface RankingSettings {
  topN?: number;
  /** Fallback for `topN` from the report settings. */
  reportsTopN?: number;
  applyFiltering: boolean;
  filters: Partial<FilterSettings>;
  volumeSurgeMinScore: number;
  squeezeMinVolatilityScore: number;
  watchlistMinConfluence: number;
  /** Pattern names that get a `pattern_<name>` leaderboard. */
  patternNames: readonly string[];
}

export const DEFAULT_RANKING_SETTINGS: Readonly<RankingSettings> = {
  applyFiltering: true,
  filters: {},
  volumeSurgeMinScore: 60,
  squeezeMinVolatilityScore: 60,
  watchlistMinConfluence: 70,
  patternNames: ['breakout', 'pullback', 'volatility_squeeze', 'rsi_divergence'],
};

export type Leaderboards = Record<string, ScoreBundle[]>;

export interface RankingOutput {
  filtered: ScoreBundle[];
  leaderboards: Leaderboards;
}

export function patternLeaderboardName(pattern: string) {
  return `pattern_${pattern}`;
}

const byDesc =
  (pick: (b: ScoreBundle) => number) =>
  (a: ScoreBundle, b: ScoreBundle): number =>
    pick(b) - pick(a);

export class RankingEngine {
  private readonly logger = new Logger(RankingEngine.name);
  private readonly settings: RankingSettings;
  private readonly filter: RankingFilter;

  constructor(settings: Partial<RankingSettings> = {}) {
    this.settings = { ...DEFAULT_RANKING_SETTINGS, ...settings };
    this.filter = new RankingFilter(this.settings.filters);
  }

  /** Explicit argument, then ranking.topN, then reports.topN, then everything. */
  resolveTopN(size: number, topN?: number): number {
    const n = topN ?? this.settings.topN ?? this.settings.reportsTopN ?? size;
    return Math.max(0, Math.floor(n));
  }

  applyFilters(bundles: readonly ScoreBundle[]): ScoreBundle[] {
    this.logger.info(`Filtering ${bundles.length} symbols`);
    const kept: ScoreBundle[] = [];
    for (const bundle of bundles) {
      const verdict = this.filter.check(bundle);
      if (verdict.pass) kept.push(bundle);
      else this.logger.debug(`Dropping ${bundle.symbol}: ${verdict.reasons.join(', ')}`);
    }
    this.logger.info(`${kept.length} symbols passed filters, ${bundles.length - kept.length} dropped`);
    return kept;
  }

  compileLeaderboards(filtered: readonly ScoreBundle[], topN?: number): Leaderboards {
    const n = this.resolveTopN(filtered.length, topN);
    const s = this.settings;
    const byConfluence = [...filtered].sort(byDesc((b) => b.confluenceScore));

    const boards: Leaderboards = {
      all_by_confluence: byConfluence,
      top_confluence: byConfluence.slice(0, n),
      top_relative_strength: [...filtered].sort(byDesc((b) => b.scores.rs)).slice(0, n),
      volume_surge: filtered
        .filter((b) => b.scores.volume >= s.volumeSurgeMinScore)
        .sort(byDesc((b) => b.scores.volume))
        .slice(0, n),
      volatility_squeeze: filtered
        .filter((b) => b.scores.volatility >= s.squeezeMinVolatilityScore)
        .sort(byDesc((b) => b.scores.volatility))
        .slice(0, n),
      watchlist: byConfluence.filter((b) => b.confluenceScore >= s.watchlistMinConfluence),
    };

    for (const pattern of s.patternNames) {
      const needle = pattern.toLowerCase();
      boards[patternLeaderboardName(pattern)] = byConfluence
        .filter((b) => b.patterns.some((label) => label.toLowerCase().includes(needle)))
        .slice(0, n);
    }
    return boards;
  }

  rank(bundles: readonly ScoreBundle[], topN?: number): RankingOutput {
    const filtered = this.settings.applyFiltering ? this.applyFilters(bundles) : [...bundles];
    return { filtered, leaderboards: this.compileLeaderboards(filtered, topN) };
  }
}
