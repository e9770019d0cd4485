/**
 * Coin List Hook
 *
 * Loads the coin catalog once on mount and filters it locally as the
 * search query changes. Filtering runs on every change; there is no debounce.
 */

import { useState, useEffect, useMemo } from 'react';
import { Coin, CoinDataSource, LoadingState } from '../types';
import { filterCoins } from '../services/coinCatalog';
import { getErrorMessage } from '../services/errors';

export interface CoinListControls {
  status: LoadingState;
  error: string | null;
  coins: readonly Coin[];
  visibleCoins: readonly Coin[];
  query: string;
  setQuery: (query: string) => void;
}

export function useCoinList(source: CoinDataSource): CoinListControls {
  const [status, setStatus] = useState<LoadingState>(LoadingState.LOADING);
  const [error, setError] = useState<string | null>(null);
  const [coins, setCoins] = useState<readonly Coin[]>([]);
  const [query, setQuery] = useState('');

  useEffect(() => {
    let cancelled = false;
    setStatus(LoadingState.LOADING);
    setError(null);

    source.fetchCoins().then(
      loaded => {
        if (cancelled) return;
        setCoins(loaded);
        setStatus(LoadingState.SUCCESS);
      },
      (err: unknown) => {
        if (cancelled) return;
        console.error('❌ Failed to load coin list:', err);
        setError(getErrorMessage(err));
        setStatus(LoadingState.ERROR);
      }
    );

    return () => {
      cancelled = true;
    };
  }, [source]);

  const visibleCoins = useMemo(() => filterCoins(coins, query), [coins, query]);

  return { status, error, coins, visibleCoins, query, setQuery };
}
