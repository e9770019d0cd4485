import React from 'react';
import { Loader2, AlertCircle } from 'lucide-react';
import { Coin, CoinDataSource, LoadingState } from '../types';
import { useCoinList } from '../hooks/useCoinList';
import { SearchBar } from './SearchBar';

interface CoinListProps {
  source: CoinDataSource;
  onSelect: (coin: Coin) => void;
}

// Alternating row/avatar colours keep the long list readable
const ROW_COLORS = ['#ffffee', '#eeeeff'];
const SYMBOL_COLORS = ['#ffffaa', '#aaaaff'];

export const CoinList: React.FC<CoinListProps> = ({ source, onSelect }) => {
  const { status, error, visibleCoins, query, setQuery } = useCoinList(source);

  return (
    <div className="flex flex-col h-screen">
      <header className="px-4 py-3 border-b border-slate-200 bg-white">
        <h1 className="text-lg font-semibold text-slate-900">Coin List Toy</h1>
      </header>

      <main className="flex-1 overflow-y-auto">
        {status === LoadingState.LOADING && (
          <div className="flex justify-center py-10" role="status" aria-label="Loading coins">
            <Loader2 className="animate-spin text-indigo-500" size={32} />
          </div>
        )}

        {status === LoadingState.ERROR && (
          <div className="flex items-center justify-center gap-2 py-10 text-red-600" role="alert">
            <AlertCircle size={18} />
            <span>{error}</span>
          </div>
        )}

        {status === LoadingState.SUCCESS && (
          <ul>
            {visibleCoins.map((coin, idx) => (
              <li key={coin.id}>
                <button
                  type="button"
                  onClick={() => onSelect({ id: coin.id, symbol: coin.symbol, name: coin.name })}
                  className="w-full flex items-center gap-4 px-4 py-2 text-left hover:brightness-95 transition-all"
                  style={{ backgroundColor: ROW_COLORS[idx % 2] }}
                >
                  <span
                    className="flex items-center justify-center w-[75px] h-[75px] shrink-0 text-sm font-medium text-slate-700 overflow-hidden"
                    style={{ backgroundColor: SYMBOL_COLORS[idx % 2] }}
                  >
                    {coin.symbol}
                  </span>
                  <span className="text-slate-900">{coin.name}</span>
                </button>
              </li>
            ))}
          </ul>
        )}
      </main>

      <SearchBar value={query} onChange={setQuery} />
    </div>
  );
};
