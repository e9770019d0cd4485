/**
 * CoinGecko API settings
 *
 * The public v3 API needs no key. A different base URL (a proxy, or the pro
 * endpoint) can be stored in localStorage under BASE_URL_STORAGE_KEY.
 */

export const DEFAULT_BASE_URL = 'https://api.coingecko.com/api/v3';
export const BASE_URL_STORAGE_KEY = 'coingecko_base_url';

export const HISTORY_DAYS = 365;
export const QUOTE_CURRENCY = 'usd';

export interface ApiConfig {
  baseUrl: string;
  historyDays: number;
  quoteCurrency: string;
  // No timeout unless one is asked for; see withTimeout
  timeoutMs?: number;
}

const readStoredBaseUrl = (): string | null => {
  if (typeof localStorage === 'undefined') return null;
  try {
    return localStorage.getItem(BASE_URL_STORAGE_KEY);
  } catch (e) {
    console.warn('⚠️ Could not read stored API base URL:', e);
    return null;
  }
};

export const getApiConfig = (overrides: Partial<ApiConfig> = {}): ApiConfig => {
  const stored = readStoredBaseUrl();
  const baseUrl = (overrides.baseUrl ?? (stored || DEFAULT_BASE_URL)).replace(/\/+$/, '');

  return {
    historyDays: HISTORY_DAYS,
    quoteCurrency: QUOTE_CURRENCY,
    ...overrides,
    baseUrl,
  };
};
