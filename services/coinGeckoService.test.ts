import { getApiConfig } from '../constants/api';
import { FormatFailure, LoadFailure } from './errors';
import { FetchOptions, HttpResponse } from './httpClient';
import {
  createCoinGeckoSource,
  fetchCoinHistory,
  fetchCoins,
  parseCoinList,
  parseMarketChart,
} from './coinGeckoService';

const config = getApiConfig({ baseUrl: 'https://api.test/v3' });

const jsonResponse = (body: unknown, status = 200): HttpResponse => ({
  ok: status >= 200 && status < 300,
  status,
  json: async () => body,
});

const fakeFetcher = (body: unknown, status = 200) =>
  jest.fn(async (_url: string, _options?: FetchOptions) => jsonResponse(body, status));

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('parseCoinList', () => {
  it('keeps id, symbol and name in response order', () => {
    const coins = parseCoinList([
      { id: 'btc', symbol: 'btc', name: 'Bitcoin', platforms: {} },
      { id: 'eth', symbol: 'eth', name: 'Ethereum' },
    ]);

    expect(coins).toEqual([
      { id: 'btc', symbol: 'btc', name: 'Bitcoin' },
      { id: 'eth', symbol: 'eth', name: 'Ethereum' },
    ]);
  });

  it('rejects an empty list', () => {
    expect(() => parseCoinList([])).toThrow(FormatFailure);
  });

  it('rejects a payload that is not a list', () => {
    expect(() => parseCoinList({ coins: [] })).toThrow(
      new FormatFailure('Failed to load coin list: empty or invalid response')
    );
  });

  it('rejects entries missing a required field', () => {
    expect(() => parseCoinList([{ id: 'btc', symbol: 'btc', name: 'Bitcoin' }, { id: 'eth', symbol: 'eth' }])).toThrow(
      new FormatFailure('Failed to load coin list: malformed entry at index 1')
    );
  });
});

describe('parseMarketChart', () => {
  it('keeps the raw samples and takes the current price from the last one', () => {
    const history = parseMarketChart('btc', {
      prices: [[0, 0], [1000, 100], [2000, 0]],
      market_caps: [],
    });

    expect(history).toEqual({ coinId: 'btc', prices: [[0, 0], [1000, 100], [2000, 0]], currentPrice: 0 });
  });

  it.each([
    ['an empty object', {}],
    ['a missing prices field', { market_caps: [[1000, 5]] }],
    ['an empty prices field', { prices: [] }],
    ['a non-object payload', [[1000, 100]]],
  ])('rejects %s', (_label, payload) => {
    expect(() => parseMarketChart('btc', payload)).toThrow(FormatFailure);
  });

  it('rejects samples that are not numeric pairs', () => {
    expect(() => parseMarketChart('btc', { prices: [[1000, 100], [2000, 'x']] })).toThrow(
      new FormatFailure('Failed to load coin details for "btc": malformed price sample at index 1')
    );
  });
});

describe('fetchCoins', () => {
  it('requests the coin list endpoint', async () => {
    const fetcher = fakeFetcher([{ id: 'btc', symbol: 'btc', name: 'Bitcoin' }]);

    await expect(fetchCoins({ fetcher, config })).resolves.toEqual([{ id: 'btc', symbol: 'btc', name: 'Bitcoin' }]);
    expect(fetcher).toHaveBeenCalledWith('https://api.test/v3/coins/list');
  });

  it('fails with a LoadFailure on a 404', async () => {
    const fetcher = fakeFetcher({ error: 'not found' }, 404);

    const error = await fetchCoins({ fetcher, config }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(LoadFailure);
    expect(error).toMatchObject({ message: 'Failed to load coins (status 404)', status: 404 });
  });

  it('fails with a FormatFailure on an empty list', async () => {
    await expect(fetchCoins({ fetcher: fakeFetcher([]), config })).rejects.toBeInstanceOf(FormatFailure);
  });

  it('passes an abort signal when a timeout is configured', async () => {
    const fetcher = fakeFetcher([{ id: 'btc', symbol: 'btc', name: 'Bitcoin' }]);

    await fetchCoins({ fetcher, config: { ...config, timeoutMs: 5000 } });
    expect(fetcher.mock.calls[0][1]?.signal).toBeInstanceOf(AbortSignal);
  });
});

describe('fetchCoinHistory', () => {
  it('requests one year of USD prices for the coin', async () => {
    const fetcher = fakeFetcher({ prices: [[1000, 100], [2000, 110]] });

    const history = await fetchCoinHistory('bitcoin', { fetcher, config });

    expect(fetcher).toHaveBeenCalledWith('https://api.test/v3/coins/bitcoin/market_chart?vs_currency=usd&days=365');
    expect(history.currentPrice).toBe(110);
  });

  it('fails with a LoadFailure on a server error', async () => {
    await expect(fetchCoinHistory('bitcoin', { fetcher: fakeFetcher({}, 500), config })).rejects.toThrow(
      new LoadFailure('Failed to load detail data for "bitcoin" (status 500)')
    );
  });

  it('fails with a FormatFailure on an empty payload', async () => {
    await expect(fetchCoinHistory('bitcoin', { fetcher: fakeFetcher({}), config })).rejects.toBeInstanceOf(FormatFailure);
  });

  it('refuses an empty coin id without fetching', async () => {
    const fetcher = fakeFetcher({ prices: [[1000, 1]] });

    await expect(fetchCoinHistory('', { fetcher, config })).rejects.toBeInstanceOf(RangeError);
    expect(fetcher).not.toHaveBeenCalled();
  });
});

describe('createCoinGeckoSource', () => {
  it('binds both requests to the same fetcher and config', async () => {
    const fetcher = jest.fn(async (url: string, _options?: FetchOptions) =>
      url.endsWith('/coins/list')
        ? jsonResponse([{ id: 'eth', symbol: 'eth', name: 'Ethereum' }])
        : jsonResponse({ prices: [[1000, 2500]] })
    );
    const source = createCoinGeckoSource({ fetcher, config });

    await expect(source.fetchCoins()).resolves.toHaveLength(1);
    await expect(source.fetchCoinHistory('eth')).resolves.toMatchObject({ coinId: 'eth', currentPrice: 2500 });
    expect(fetcher.mock.calls.map(call => call[0])).toEqual([
      'https://api.test/v3/coins/list',
      'https://api.test/v3/coins/eth/market_chart?vs_currency=usd&days=365',
    ]);
  });
});
