import { DEFAULT_BASE_URL, getApiConfig } from './api';

describe('getApiConfig', () => {
  it('defaults to the public CoinGecko API, one year, priced in USD', () => {
    expect(getApiConfig()).toEqual({
      baseUrl: DEFAULT_BASE_URL,
      historyDays: 365,
      quoteCurrency: 'usd',
    });
  });

  it('applies overrides and trims trailing slashes from the base URL', () => {
    expect(getApiConfig({ baseUrl: 'https://proxy.test/api/v3/', timeoutMs: 2000 })).toEqual({
      baseUrl: 'https://proxy.test/api/v3',
      historyDays: 365,
      quoteCurrency: 'usd',
      timeoutMs: 2000,
    });
  });
});
