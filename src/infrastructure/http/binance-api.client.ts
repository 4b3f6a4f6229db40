import { Logger } from '../../shared/logger';
import type { MarketType } from '../../domain/interfaces/market-data-provider.interface';
import { ExchangeRequestError } from './exchange-request.error';

export interface BinanceClientOptions {
  market: MarketType;
  baseUrl?: string;
  requestsPerSecond: number;
  timeoutMs: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

const BASE_URLS: Record<MarketType, string> = {
  futures: 'https://fapi.binance.com',
  spot: 'https://api.binance.com',
};

const PATHS: Record<MarketType, { exchangeInfo: string; klines: string }> = {
  futures: { exchangeInfo: '/fapi/v1/exchangeInfo', klines: '/fapi/v1/klines' },
  spot: { exchangeInfo: '/api/v3/exchangeInfo', klines: '/api/v3/klines' },
};

type QueuedRequest = () => Promise<void>;

/**
 * REST client with a serial request queue capped at `requestsPerSecond`.
 * HTTP 429 is retried after a delay; other non-2xx responses reject with ExchangeRequestError.
 * Bodies are returned unparsed for the caller to validate.
 */
export class BinanceApiClient {
  private readonly logger = new Logger(BinanceApiClient.name);
  private readonly baseUrl: string;
  private requestQueue: QueuedRequest[] = [];
  private isProcessing = false;
  private lastRequestTime = 0;

  constructor(private readonly options: BinanceClientOptions) {
    this.baseUrl = options.baseUrl ?? BASE_URLS[options.market];
  }

  get market(): MarketType {
    return this.options.market;
  }

  getExchangeInfo(): Promise<unknown> {
    return this.makeRequest(PATHS[this.options.market].exchangeInfo);
  }

  getKlines(symbol: string, interval: string, limit: number): Promise<unknown> {
    return this.makeRequest(PATHS[this.options.market].klines, { symbol, interval, limit: String(limit) });
  }

  getPremiumIndex(symbol: string): Promise<unknown> {
    return this.makeRequest('/fapi/v1/premiumIndex', { symbol });
  }

  getOpenInterestHistory(symbol: string, period: string, limit: number): Promise<unknown> {
    return this.makeRequest('/futures/data/openInterestHist', { symbol, period, limit: String(limit) });
  }

  private makeRequest(endpoint: string, params: Record<string, string> = {}): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${endpoint}`);
    Object.entries(params).forEach(([key, value]) => {
      url.searchParams.append(key, value);
    });

    const maxRetries = this.options.maxRetries ?? 3;
    const retryDelayMs = this.options.retryDelayMs ?? 2000;

    return new Promise((resolve, reject) => {
      const request = async (attempt: number): Promise<void> => {
        try {
          await this.rateLimit();
          this.logger.debug(`Making request to: ${url.toString()}`);
          const response = await fetch(url.toString(), { signal: AbortSignal.timeout(this.options.timeoutMs) });

          if (response.status === 429 && attempt < maxRetries) {
            this.logger.warn(`Rate limit hit on ${endpoint}, retrying (${attempt + 1}/${maxRetries})...`);
            await this.delay(retryDelayMs);
            return request(attempt + 1);
          }

          if (!response.ok) {
            throw new ExchangeRequestError(endpoint, response.status, response.statusText);
          }

          const data: unknown = await response.json();
          resolve(data);
        } catch (error) {
          reject(error);
        }
      };

      this.requestQueue.push(() => request(0));
      this.processQueue().catch((error) => this.logger.error('Error processing request queue:', error));
    });
  }

  private async rateLimit(): Promise<void> {
    const minInterval = 1000 / this.options.requestsPerSecond;
    const timeSinceLastRequest = Date.now() - this.lastRequestTime;

    if (timeSinceLastRequest < minInterval) {
      await this.delay(minInterval - timeSinceLastRequest);
    }
    this.lastRequestTime = Date.now();
  }

  private async processQueue(): Promise<void> {
    if (this.isProcessing || this.requestQueue.length === 0) {
      return;
    }

    this.isProcessing = true;
    try {
      while (this.requestQueue.length > 0) {
        const request = this.requestQueue.shift();
        if (request) await request();
      }
    } finally {
      this.isProcessing = false;
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
