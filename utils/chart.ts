/**
 * Chart geometry helpers
 *
 * Maps a price series onto a 100x100 SVG viewBox (stretched with
 * preserveAspectRatio="none") and picks x-axis tick positions.
 */

import { PricePoint } from '../types';

export const CHART_WIDTH = 100;
export const CHART_HEIGHT = 100;

// Roughly three months: 12 weeks in millis
export const X_TICK_INTERVAL_MS = 12 * 7 * 24 * 60 * 60 * 1000;

export interface ChartBounds {
  minTime: number;
  maxTime: number;
  minPrice: number;
  maxPrice: number;
}

export interface AxisTick {
  timestampMillis: number;
  x: number;
}

export function getChartBounds(points: readonly PricePoint[]): ChartBounds | null {
  if (points.length === 0) return null;

  let minPrice = Infinity;
  let maxPrice = -Infinity;
  points.forEach(p => {
    if (p.priceUsd < minPrice) minPrice = p.priceUsd;
    if (p.priceUsd > maxPrice) maxPrice = p.priceUsd;
  });

  return {
    minTime: points[0].timestampMillis,
    maxTime: points[points.length - 1].timestampMillis,
    minPrice,
    maxPrice,
  };
}

const scale = (value: number, min: number, max: number, size: number): number => {
  // A flat range (single point, constant price) is drawn in the middle
  if (max === min) return size / 2;
  return ((value - min) / (max - min)) * size;
};

/**
 * SVG path ("M x,y L x,y ...") for the series, or '' when there is nothing to draw.
 */
export function buildLinePath(points: readonly PricePoint[]): string {
  const bounds = getChartBounds(points);
  if (!bounds) return '';

  const coords = points.map(p => {
    const x = scale(p.timestampMillis, bounds.minTime, bounds.maxTime, CHART_WIDTH);
    const y = CHART_HEIGHT - scale(p.priceUsd, bounds.minPrice, bounds.maxPrice, CHART_HEIGHT);
    return `${x.toFixed(2)},${y.toFixed(2)}`;
  });

  return `M ${coords.join(' L ')}`;
}

/**
 * Tick every `interval` ms starting at the first point, as a percentage of the chart width.
 */
export function getXAxisTicks(points: readonly PricePoint[], interval: number = X_TICK_INTERVAL_MS): AxisTick[] {
  const bounds = getChartBounds(points);
  if (!bounds || interval <= 0) return [];

  const ticks: AxisTick[] = [];
  for (let t = bounds.minTime; t <= bounds.maxTime; t += interval) {
    ticks.push({ timestampMillis: t, x: scale(t, bounds.minTime, bounds.maxTime, CHART_WIDTH) });
  }
  return ticks;
}
