/** One OHLCV observation. `openTime` is epoch milliseconds, strictly increasing within a series. */
export interface Bar {
  readonly symbol: string;
  readonly timeframe: string;
  readonly openTime: number;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

export interface SymbolMeta {
  readonly symbol: string;
  readonly base: string;
  readonly quote: string;
  readonly exchange: string;
  readonly isPerp: boolean;
}

/** Derivatives snapshot. Every field is absent when the symbol has no derivatives market. */
export interface DerivativesMetrics {
  readonly symbol: string;
  readonly fundingRate?: number; // fraction per funding interval, 0.0001 = 0.01%
  readonly openInterest?: number;
  readonly oiChangePct?: number;
}
