import { afterEach, describe, expect, it, vi } from 'vitest';
import { BinanceApiClient } from '../binance-api.client';
import { ExchangeRequestError } from '../exchange-request.error';

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, statusText: status === 200 ? 'OK' : 'Error' });
}

function client(market: 'futures' | 'spot' = 'futures') {
  return new BinanceApiClient({ market, requestsPerSecond: 1000, timeoutMs: 1000, retryDelayMs: 0 });
}

describe('BinanceApiClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('builds market-specific kline URLs', async () => {
    const fetchMock = vi.fn(async (_url: string) => json([]));
    vi.stubGlobal('fetch', fetchMock);

    await client('futures').getKlines('BTCUSDT', '1d', 200);
    await client('spot').getKlines('ETHUSDT', '4h', 150);

    expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
      'https://fapi.binance.com/fapi/v1/klines?symbol=BTCUSDT&interval=1d&limit=200',
      'https://api.binance.com/api/v3/klines?symbol=ETHUSDT&interval=4h&limit=150',
    ]);
  });

  it('retries after a rate-limit response', async () => {
    const fetchMock = vi
      .fn(async (_url: string) => json({ lastFundingRate: '0.0001' }))
      .mockResolvedValueOnce(json({ code: -1003 }, 429));
    vi.stubGlobal('fetch', fetchMock);

    await expect(client().getPremiumIndex('BTCUSDT')).resolves.toEqual({ lastFundingRate: '0.0001' });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('rejects other failures with the endpoint and status', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async (_url: string) => json({}, 500)),
    );

    const error = await client()
      .getExchangeInfo()
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ExchangeRequestError);
    expect(error).toMatchObject({ endpoint: '/fapi/v1/exchangeInfo', status: 500 });
  });

  it('serves queued requests in order', async () => {
    const fetchMock = vi.fn(async (url: string) => json(new URL(url).searchParams.get('symbol')));
    vi.stubGlobal('fetch', fetchMock);

    const c = client();
    const results = await Promise.all([c.getPremiumIndex('A'), c.getPremiumIndex('B'), c.getPremiumIndex('C')]);
    expect(results).toEqual(['A', 'B', 'C']);
  });
});
