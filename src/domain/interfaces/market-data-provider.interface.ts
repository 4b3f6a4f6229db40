import type { Bar, DerivativesMetrics, SymbolMeta } from '../entities/bar.entity';

export type MarketType = 'spot' | 'futures';

/**
 * Pull-based market data source used once per scan.
 */
export interface IMarketDataProvider {
  /** e.g. 'binance-futures' */
  readonly providerId: string;
  readonly marketType: MarketType;

  discoverUniverse(): Promise<SymbolMeta[]>;

  /** Oldest first, open time strictly increasing. May reject or resolve empty on failure. */
  fetchOhlcv(symbol: string, timeframe: string, limit: number): Promise<Bar[]>;

  /** Never rejects; fields are absent when the data is unavailable. */
  fetchDerivatives(symbol: string): Promise<DerivativesMetrics>;
}
