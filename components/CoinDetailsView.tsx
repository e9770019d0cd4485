import React from 'react';
import { ArrowLeft, Loader2, AlertCircle } from 'lucide-react';
import { Coin, CoinDataSource, LoadingState } from '../types';
import { useCoinDetails } from '../hooks/useCoinDetails';
import { PriceChart } from './PriceChart';
import { PriceCalculator } from './PriceCalculator';

interface CoinDetailsViewProps {
  coin: Coin;
  source: CoinDataSource;
  onBack: () => void;
}

/**
 * 1Y price history chart and a USD/quantity calculator priced off the
 * latest sample we received.
 */
export const CoinDetailsView: React.FC<CoinDetailsViewProps> = ({ coin, source, onBack }) => {
  const { status, error, chartSeries, calculator, onUsdChange, onQuantityChange } = useCoinDetails(source, coin.id);

  return (
    <div className="flex flex-col min-h-screen">
      <header className="flex items-center gap-3 px-4 py-3 border-b border-slate-200 bg-white">
        <button
          type="button"
          onClick={onBack}
          aria-label="Back to coin list"
          className="p-1 rounded-full text-slate-600 hover:bg-slate-100 transition-colors"
        >
          <ArrowLeft size={20} />
        </button>
        <h1 className="text-lg font-semibold text-slate-900">{coin.name}</h1>
      </header>

      <section className="px-5 pt-4">
        <h2 className="text-center font-bold">Price History (1Y)</h2>
        <div className="h-[40vh] mt-3">
          {status === LoadingState.LOADING && (
            <div className="flex h-full items-center justify-center" role="status" aria-label="Loading price history">
              <Loader2 className="animate-spin text-indigo-500" size={32} />
            </div>
          )}
          {status === LoadingState.ERROR && (
            <div className="flex h-full items-center justify-center gap-2 text-red-600" role="alert">
              <AlertCircle size={18} />
              <span>{error}</span>
            </div>
          )}
          {status === LoadingState.SUCCESS && <PriceChart points={chartSeries} />}
        </div>
      </section>

      <PriceCalculator
        state={calculator}
        symbol={coin.symbol}
        onUsdChange={onUsdChange}
        onQuantityChange={onQuantityChange}
        disabled={status !== LoadingState.SUCCESS}
      />
    </div>
  );
};
