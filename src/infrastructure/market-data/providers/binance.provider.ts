import { Logger } from '../../../shared/logger';
import type { Bar, DerivativesMetrics, SymbolMeta } from '../../../domain/entities/bar.entity';
import type { IMarketDataProvider, MarketType } from '../../../domain/interfaces/market-data-provider.interface';
import type { BinanceApiClient } from '../../http/binance-api.client';

export interface UniverseSettings {
  quoteAsset: string;
  /** Fixed universe; empty means discover. */
  symbols: readonly string[];
  maxSymbols: number;
}

// 24 hourly points: open-interest change over the last day.
const OI_PERIOD = '1h';
const OI_POINTS = 24;

type Raw = Record<string, unknown>;

function isRecord(value: unknown): value is Raw {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function num(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return Number.NaN;
}

function str(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

export class BinanceMarketDataProvider implements IMarketDataProvider {
  public readonly providerId: string;
  public readonly marketType: MarketType;
  private readonly logger: Logger;

  constructor(
    private readonly client: BinanceApiClient,
    private readonly universe: UniverseSettings,
  ) {
    this.marketType = client.market;
    this.providerId = `binance-${this.marketType}`;
    this.logger = new Logger(this.providerId);
  }

  async discoverUniverse(): Promise<SymbolMeta[]> {
    const { quoteAsset, symbols, maxSymbols } = this.universe;

    if (symbols.length) {
      return symbols.slice(0, maxSymbols).map((symbol) => ({
        symbol,
        base: symbol.endsWith(quoteAsset) ? symbol.slice(0, -quoteAsset.length) : symbol,
        quote: quoteAsset,
        exchange: 'binance',
        isPerp: this.marketType === 'futures',
      }));
    }

    this.logger.info(`Fetching ${quoteAsset} pairs from Binance ${this.marketType}...`);
    const info = await this.client.getExchangeInfo();
    const rows = isRecord(info) && Array.isArray(info.symbols) ? info.symbols : [];

    const metas: SymbolMeta[] = [];
    for (const row of rows) {
      if (!isRecord(row)) continue;
      if (str(row.status) !== 'TRADING' || str(row.quoteAsset) !== quoteAsset) continue;
      if (this.marketType === 'futures' && str(row.contractType) !== 'PERPETUAL') continue;
      const symbol = str(row.symbol);
      if (!symbol) continue;
      metas.push({
        symbol,
        base: str(row.baseAsset),
        quote: quoteAsset,
        exchange: 'binance',
        isPerp: this.marketType === 'futures',
      });
    }

    this.logger.info(`Found ${metas.length} active ${quoteAsset} pairs, using ${Math.min(metas.length, maxSymbols)}`);
    return metas.slice(0, maxSymbols);
  }

  async fetchOhlcv(symbol: string, timeframe: string, limit: number): Promise<Bar[]> {
    const rows = await this.client.getKlines(symbol, timeframe, limit);
    if (!Array.isArray(rows)) return [];
    return BinanceMarketDataProvider.parseKlines(symbol, timeframe, rows);
  }

  /** Drops malformed rows, sorts by open time and keeps the first row per open time. */
  static parseKlines(symbol: string, timeframe: string, rows: readonly unknown[]): Bar[] {
    const bars: Bar[] = [];
    for (const row of rows) {
      if (!Array.isArray(row) || row.length < 6) continue;
      const [openTime, open, high, low, close, volume] = row.slice(0, 6).map(num);
      if (![openTime, open, high, low, close, volume].every(Number.isFinite)) continue;
      bars.push({ symbol, timeframe, openTime, open, high, low, close, volume });
    }

    bars.sort((a, b) => a.openTime - b.openTime);
    return bars.filter((bar, i) => i === 0 || bar.openTime > bars[i - 1].openTime);
  }

  async fetchDerivatives(symbol: string): Promise<DerivativesMetrics> {
    if (this.marketType !== 'futures') return { symbol };

    const [premium, history] = await Promise.allSettled([
      this.client.getPremiumIndex(symbol),
      this.client.getOpenInterestHistory(symbol, OI_PERIOD, OI_POINTS),
    ]);

    let fundingRate: number | undefined;
    if (premium.status === 'fulfilled' && isRecord(premium.value)) {
      const f = num(premium.value.lastFundingRate);
      if (Number.isFinite(f)) fundingRate = f;
    } else if (premium.status === 'rejected') {
      this.logger.warn(`Funding fetch failed for ${symbol}`, premium.reason);
    }

    let openInterest: number | undefined;
    let oiChangePct: number | undefined;
    if (history.status === 'fulfilled' && Array.isArray(history.value)) {
      const points = history.value
        .filter(isRecord)
        .map((p) => ({ ts: num(p.timestamp), oi: num(p.sumOpenInterest) }))
        .filter((p) => Number.isFinite(p.ts) && Number.isFinite(p.oi))
        .sort((a, b) => a.ts - b.ts);

      if (points.length) {
        const first = points[0].oi;
        openInterest = points[points.length - 1].oi;
        if (points.length > 1 && first > 0) oiChangePct = ((openInterest - first) / first) * 100;
      }
    } else if (history.status === 'rejected') {
      this.logger.warn(`Open interest fetch failed for ${symbol}`, history.reason);
    }

    return { symbol, fundingRate, openInterest, oiChangePct };
  }
}
