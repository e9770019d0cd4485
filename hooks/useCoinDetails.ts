/**
 * Coin Details Hook
 *
 * One detail session per coin id: fetches the 1Y price history, derives the
 * chart series and owns the calculator state. A result that arrives after
 * the view unmounted (or switched coins) is ignored.
 */

import { useState, useEffect, useMemo, useReducer, useCallback } from 'react';
import { CalculatorState, CoinDataSource, CoinHistory, LoadingState, PricePoint } from '../types';
import { calculatorReducer, createCalculatorState } from '../services/calculator';
import { deriveChartSeries } from '../services/priceHistory';
import { getErrorMessage } from '../services/errors';

export interface CoinDetailsControls {
  status: LoadingState;
  error: string | null;
  history: CoinHistory | null;
  chartSeries: PricePoint[];
  calculator: CalculatorState;
  onUsdChange: (text: string) => void;
  onQuantityChange: (text: string) => void;
}

export function useCoinDetails(source: CoinDataSource, coinId: string): CoinDetailsControls {
  const [status, setStatus] = useState<LoadingState>(LoadingState.LOADING);
  const [error, setError] = useState<string | null>(null);
  const [history, setHistory] = useState<CoinHistory | null>(null);
  const [calculator, dispatch] = useReducer(calculatorReducer, createCalculatorState());

  useEffect(() => {
    let cancelled = false;
    setStatus(LoadingState.LOADING);
    setError(null);
    setHistory(null);

    source.fetchCoinHistory(coinId).then(
      loaded => {
        if (cancelled) return;
        setHistory(loaded);
        dispatch({ type: 'PRICE_LOADED', price: loaded.currentPrice });
        setStatus(LoadingState.SUCCESS);
      },
      (err: unknown) => {
        if (cancelled) return;
        console.error(`❌ Failed to load history for ${coinId}:`, err);
        setError(getErrorMessage(err));
        setStatus(LoadingState.ERROR);
      }
    );

    return () => {
      cancelled = true;
    };
  }, [source, coinId]);

  const chartSeries = useMemo(() => (history ? deriveChartSeries(history.prices) : []), [history]);

  const onUsdChange = useCallback((text: string) => dispatch({ type: 'USD_INPUT', text }), []);
  const onQuantityChange = useCallback((text: string) => dispatch({ type: 'QUANTITY_INPUT', text }), []);

  return { status, error, history, chartSeries, calculator, onUsdChange, onQuantityChange };
}
