import React, { useMemo } from 'react';
import { PricePoint } from '../types';
import { CHART_HEIGHT, CHART_WIDTH, buildLinePath, getXAxisTicks } from '../utils/chart';
import { formatAxisLabel } from '../utils/formatters';

interface PriceChartProps {
  points: PricePoint[];
}

export const PriceChart: React.FC<PriceChartProps> = ({ points }) => {
  const { pathD, ticks } = useMemo(() => ({
    pathD: buildLinePath(points),
    ticks: getXAxisTicks(points),
  }), [points]);

  if (!pathD) {
    return (
      <div className="flex items-center justify-center h-full text-sm text-slate-500">
        No price data
      </div>
    );
  }

  return (
    <div className="flex flex-col h-full border border-slate-300">
      <div className="flex-1 p-2">
        <svg
          viewBox={`0 0 ${CHART_WIDTH} ${CHART_HEIGHT}`}
          className="w-full h-full overflow-visible"
          preserveAspectRatio="none"
          aria-label="Price history chart"
        >
          <path
            d={pathD}
            fill="none"
            stroke="#22c55e"
            strokeWidth="3"
            strokeLinejoin="round"
            vectorEffect="non-scaling-stroke"
          />
        </svg>
      </div>
      <div className="relative h-8 mx-2">
        {ticks.map(tick => (
          <span
            key={tick.timestampMillis}
            className="absolute top-1 text-[13px] text-slate-600 -translate-x-1/2 -rotate-[30deg] whitespace-nowrap"
            style={{ left: `${tick.x}%` }}
          >
            {formatAxisLabel(tick.timestampMillis)}
          </span>
        ))}
      </div>
    </div>
  );
};
