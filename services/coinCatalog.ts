import { Coin } from '../types';

/**
 * Returns the coins whose symbol, name or id contains `query`.
 *
 * Matching is a case-sensitive substring check and keeps catalog order. The
 * list is ~1MB and growing; every entry is scanned on each call since all
 * three fields have to be checked anyway.
 */
export const filterCoins = (coins: readonly Coin[], query: string): readonly Coin[] => {
  if (query.length === 0) return coins;

  return coins.filter(coin =>
    coin.symbol.includes(query) ||
    coin.name.includes(query) ||
    coin.id.includes(query)
  );
};
