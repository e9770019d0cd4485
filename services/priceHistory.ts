import { PricePoint, RawPriceSample } from '../types';

/**
 * Latest known price: the price of the last raw sample, even when that
 * sample's timestamp is the 0 sentinel. 0 when there are no samples.
 */
export const deriveCurrentPrice = (prices: readonly RawPriceSample[]): number => {
  if (prices.length === 0) return 0;
  return prices[prices.length - 1][1];
};

/**
 * Points to plot. The API occasionally sends [0, x] samples; those are dropped.
 */
export const deriveChartSeries = (prices: readonly RawPriceSample[]): PricePoint[] =>
  prices
    .filter(([timestampMillis]) => timestampMillis !== 0)
    .map(([timestampMillis, priceUsd]) => ({ timestampMillis, priceUsd }));
