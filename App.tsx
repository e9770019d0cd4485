import React, { useState } from 'react';
import { Coin, CoinDataSource } from './types';
import { createCoinGeckoSource } from './services/coinGeckoService';
import { CoinList } from './components/CoinList';
import { CoinDetailsView } from './components/CoinDetailsView';

interface AppProps {
  source?: CoinDataSource;
}

const App: React.FC<AppProps> = ({ source }) => {
  // Fixed for the app's lifetime so the catalog is only fetched once
  const [dataSource] = useState<CoinDataSource>(() => source ?? createCoinGeckoSource());
  const [selectedCoin, setSelectedCoin] = useState<Coin | null>(null);

  return (
    <div className="min-h-screen bg-slate-50 text-slate-900">
      {/* The list stays mounted (hidden) so its data and search survive a trip to the details */}
      <div hidden={selectedCoin !== null}>
        <CoinList source={dataSource} onSelect={setSelectedCoin} />
      </div>
      {selectedCoin && (
        <CoinDetailsView
          key={selectedCoin.id}
          coin={selectedCoin}
          source={dataSource}
          onBack={() => setSelectedCoin(null)}
        />
      )}
    </div>
  );
};

export default App;
