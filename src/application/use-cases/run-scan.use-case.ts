import { Inject, Injectable } from '../../shared/decorators';
import { Logger } from '../../shared/logger';
import type { Bar, DerivativesMetrics, SymbolMeta } from '../../domain/entities/bar.entity';
import type { AlertEvent, AlertState } from '../../domain/entities/alert.entity';
import type { MarketHealth } from '../../domain/entities/market-health.entity';
import type { IMarketDataProvider } from '../../domain/interfaces/market-data-provider.interface';
import type { IAlertStateRepository } from '../../domain/interfaces/repositories.interface';
import type { INotificationService } from '../../domain/interfaces/services.interface';
import type { ScannerConfig } from '../../config/scanner.config';
import {
  applyAlertState,
  buildSymbolAlerts,
  checkRegimeChange,
  compileScoreBundles,
  computeUniverseReturns,
  getEnabledPatterns,
  MarketHealthService,
  RankingEngine,
  type DivergenceBars,
  type RankingOutput,
  type RankingSettings,
} from '../../modules/confluence';
import { ScanResultStore, type ScanResult } from '../services/scan-result.store';

export function rankingSettingsFrom(config: ScannerConfig): Partial<RankingSettings> {
  const { ranking, reports, patterns } = config;
  return {
    topN: ranking.topN ?? undefined,
    reportsTopN: reports.topN ?? undefined,
    applyFiltering: ranking.applyFiltering,
    filters: ranking.filters,
    volumeSurgeMinScore: ranking.volumeSurgeMinScore,
    squeezeMinVolatilityScore: ranking.squeezeMinVolatilityScore,
    watchlistMinConfluence: ranking.watchlistMinConfluence,
    patternNames: [...getEnabledPatterns(patterns.enabled).keys()],
  };
}

/**
 * One pass over the universe: fetch, score, rank, alert. A failing symbol is
 * skipped for the failing fetch only; the alert state is loaded once and saved
 * once per scan.
 */
@Injectable()
export class RunScanUseCase {
  private readonly logger = new Logger(RunScanUseCase.name);

  constructor(
    @Inject('IMarketDataProvider')
    private readonly provider: IMarketDataProvider,
    @Inject('IAlertStateRepository')
    private readonly stateRepository: IAlertStateRepository,
    @Inject('INotificationService')
    private readonly notifications: INotificationService,
    @Inject('MarketHealthService')
    private readonly marketHealth: MarketHealthService,
    @Inject('ScanResultStore')
    private readonly store: ScanResultStore,
    @Inject('ScannerConfig')
    private readonly config: ScannerConfig,
    private readonly now: () => Date = () => new Date(),
  ) {}

  public async execute(): Promise<ScanResult> {
    const startedAt = this.now();
    const timeframe = this.config.timeframes[0];
    const alertsEnabled = this.config.alerts.enabled;
    const state = alertsEnabled ? this.stateRepository.load() : undefined;

    const universe = await this.discover();
    if (!universe.length) {
      this.logger.warn('Universe is empty, no alerts generated');
      return this.publishWithoutData(startedAt, timeframe, 0, state);
    }

    const { barsBySymbol, derivativesBySymbol } = await this.fetchUniverse(universe, timeframe);
    if (!barsBySymbol.size) {
      this.logger.warn(`No ${timeframe} bars for any of ${universe.length} symbols, no alerts generated`);
      return this.publishWithoutData(startedAt, timeframe, universe.length, state);
    }

    const universeReturns = computeUniverseReturns(barsBySymbol);
    const health = this.marketHealth.compute(barsBySymbol, derivativesBySymbol, this.config.regimes);
    const bundles = compileScoreBundles(barsBySymbol, timeframe, {
      regime: health.regime,
      universe: universeReturns,
      derivatives: derivativesBySymbol,
      regimeWeights: this.config.confluence.regimeWeights,
      patterns: { enabled: this.config.patterns.enabled, params: this.config.patterns.params },
    });
    const ranking = new RankingEngine(rankingSettingsFrom(this.config)).rank(bundles);

    const alerts = state ? await this.runAlerts(ranking, health, state) : [];

    this.logger.info(
      `Scan finished: ${bundles.length}/${universe.length} symbols scored, ${ranking.filtered.length} ranked, ${alerts.length} alerts, regime ${health.regime}`,
    );
    return this.publish({
      startedAt,
      finishedAt: this.now(),
      timeframe,
      universeSize: universe.length,
      health,
      bundles,
      ranking,
      alerts,
    });
  }

  private async discover(): Promise<SymbolMeta[]> {
    try {
      return await this.provider.discoverUniverse();
    } catch (error) {
      this.logger.error('Universe discovery failed', error);
      return [];
    }
  }

  private async fetchUniverse(universe: readonly SymbolMeta[], timeframe: string) {
    const barsBySymbol = new Map<string, Bar[]>();
    const derivativesBySymbol = new Map<string, DerivativesMetrics>();
    const limit = this.config.exchange.barLimit;

    for (const { symbol } of universe) {
      try {
        const bars = await this.provider.fetchOhlcv(symbol, timeframe, limit);
        if (bars.length) barsBySymbol.set(symbol, bars);
        else this.logger.warn(`No ${timeframe} bars for ${symbol}`);
      } catch (error) {
        this.logger.warn(`Failed to fetch ${timeframe} bars for ${symbol}`, error);
        continue;
      }

      try {
        derivativesBySymbol.set(symbol, await this.provider.fetchDerivatives(symbol));
      } catch (error) {
        this.logger.warn(`Failed to fetch derivatives for ${symbol}`, error);
      }
    }
    return { barsBySymbol, derivativesBySymbol };
  }

  private async fetchDivergenceBars(symbols: readonly string[]): Promise<DivergenceBars> {
    const { timeframes, lookback } = this.config.alerts.rsiDivergence;
    const out = new Map<string, Map<string, Bar[]>>();

    for (const symbol of symbols) {
      const byTimeframe = new Map<string, Bar[]>();
      for (const tf of timeframes) {
        try {
          const bars = await this.provider.fetchOhlcv(symbol, tf, lookback);
          if (bars.length) byTimeframe.set(tf, bars);
        } catch (error) {
          this.logger.warn(`Failed to fetch ${tf} bars for divergence on ${symbol}`, error);
        }
      }
      out.set(symbol, byTimeframe);
    }
    return out;
  }

  private async runAlerts(ranking: RankingOutput, health: MarketHealth, state: AlertState): Promise<AlertEvent[]> {
    const settings = this.config.alerts;
    const now = this.now();
    const ranked = (ranking.leaderboards.all_by_confluence ?? []).slice(0, settings.scanTopN);
    if (!ranked.length) {
      this.logger.info('No ranked symbols available, no alerts generated');
      this.stateRepository.save(state);
      return [];
    }

    const divergenceBars: DivergenceBars = settings.types.rsiDivergence
      ? await this.fetchDivergenceBars(ranked.map((b) => b.symbol))
      : new Map<string, Map<string, Bar[]>>();

    const candidates = buildSymbolAlerts(ranked, health, settings, divergenceBars, now);
    const applied = applyAlertState(candidates, state, settings, now);
    const regime = checkRegimeChange(health, applied.state, settings.types.regimeChange, now);

    const events = regime.event ? [...applied.kept, regime.event] : applied.kept;
    this.stateRepository.save(regime.state);

    if (!events.length) {
      this.logger.info('No alerts after state filters and regime-change check');
      return [];
    }
    await this.notifications.dispatch(events);
    return events;
  }

  /** Nothing to score: the alert state is saved as loaded and no regime check runs. */
  private publishWithoutData(
    startedAt: Date,
    timeframe: string,
    universeSize: number,
    state: AlertState | undefined,
  ): ScanResult {
    if (state) this.stateRepository.save(state);
    return this.publish({
      startedAt,
      finishedAt: this.now(),
      timeframe,
      universeSize,
      health: { regime: 'unknown' },
      bundles: [],
      ranking: { filtered: [], leaderboards: {} },
      alerts: [],
    });
  }

  private publish(result: ScanResult): ScanResult {
    this.store.publish(result);
    return result;
  }
}
