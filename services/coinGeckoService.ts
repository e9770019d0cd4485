// CoinGecko market data service
// Public v3 endpoints: /coins/list and /coins/{id}/market_chart

import { Coin, CoinDataSource, CoinHistory, RawPriceSample } from '../types';
import { ApiConfig, getApiConfig } from '../constants/api';
import { FormatFailure } from './errors';
import { Fetcher, defaultFetcher, getJson, withTimeout } from './httpClient';
import { deriveCurrentPrice } from './priceHistory';

export interface ServiceOptions {
  fetcher?: Fetcher;
  config?: ApiConfig;
}

const resolveOptions = ({ fetcher = defaultFetcher, config = getApiConfig() }: ServiceOptions) => ({
  config,
  fetcher: config.timeoutMs !== undefined ? withTimeout(fetcher, config.timeoutMs) : fetcher,
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isCoin = (value: unknown): value is Coin =>
  isRecord(value) &&
  typeof value.id === 'string' &&
  typeof value.symbol === 'string' &&
  typeof value.name === 'string';

const isRawPriceSample = (value: unknown): value is RawPriceSample =>
  Array.isArray(value) &&
  value.length === 2 &&
  typeof value[0] === 'number' &&
  typeof value[1] === 'number';

/**
 * Validates a /coins/list payload, keeping only id, symbol and name.
 */
export const parseCoinList = (payload: unknown): Coin[] => {
  if (!Array.isArray(payload) || payload.length === 0) {
    throw new FormatFailure('Failed to load coin list: empty or invalid response');
  }

  return payload.map((entry, idx) => {
    if (!isCoin(entry)) {
      throw new FormatFailure(`Failed to load coin list: malformed entry at index ${idx}`);
    }
    return { id: entry.id, symbol: entry.symbol, name: entry.name };
  });
};

/**
 * Validates a market_chart payload. Samples are kept exactly as sent,
 * zero-timestamp sentinels included.
 */
export const parseMarketChart = (coinId: string, payload: unknown): CoinHistory => {
  if (!isRecord(payload) || Object.keys(payload).length === 0) {
    throw new FormatFailure(`Failed to load coin details for "${coinId}"`);
  }

  const { prices } = payload;
  if (!Array.isArray(prices) || prices.length === 0) {
    throw new FormatFailure(`Failed to load coin details for "${coinId}": no price data`);
  }

  const samples = prices.map((sample, idx) => {
    if (!isRawPriceSample(sample)) {
      throw new FormatFailure(`Failed to load coin details for "${coinId}": malformed price sample at index ${idx}`);
    }
    return sample;
  });

  return {
    coinId,
    prices: samples,
    currentPrice: deriveCurrentPrice(samples),
  };
};

export const fetchCoins = async (options: ServiceOptions = {}): Promise<Coin[]> => {
  const { config, fetcher } = resolveOptions(options);
  console.log('🌐 Fetching coin list...');

  const payload = await getJson(fetcher, `${config.baseUrl}/coins/list`, 'Failed to load coins');
  const coins = parseCoinList(payload);

  console.log(`✅ Loaded ${coins.length} coins`);
  return coins;
};

export const fetchCoinHistory = async (coinId: string, options: ServiceOptions = {}): Promise<CoinHistory> => {
  // Precondition on the id handed over from the list, not a load error
  if (coinId.length === 0) {
    throw new RangeError('coinId must not be empty');
  }

  const { config, fetcher } = resolveOptions(options);
  const params = new URLSearchParams({
    vs_currency: config.quoteCurrency,
    days: String(config.historyDays),
  });
  const url = `${config.baseUrl}/coins/${encodeURIComponent(coinId)}/market_chart?${params.toString()}`;

  console.log(`📡 Fetching ${config.historyDays}d price history for ${coinId}`);
  const payload = await getJson(fetcher, url, `Failed to load detail data for "${coinId}"`);
  const history = parseMarketChart(coinId, payload);

  console.log(`✅ Received ${history.prices.length} price samples for ${coinId}`);
  return history;
};

export const createCoinGeckoSource = (options: ServiceOptions = {}): CoinDataSource => ({
  fetchCoins: () => fetchCoins(options),
  fetchCoinHistory: coinId => fetchCoinHistory(coinId, options),
});
