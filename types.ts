export interface Coin {
  id: string;
  symbol: string;
  name: string;
}

// Raw market_chart sample as CoinGecko sends it: [timestamp (ms), price]
export type RawPriceSample = [number, number];

export interface PricePoint {
  timestampMillis: number;
  priceUsd: number;
}

export interface CoinHistory {
  coinId: string;
  prices: RawPriceSample[];
  currentPrice: number;
}

export interface CalculatorState {
  usdAmount: number;
  quantity: number;
  currentPrice: number;
  usdText: string;
  quantityText: string;
}

export type CalculatorAction =
  | { type: 'PRICE_LOADED'; price: number }
  | { type: 'USD_INPUT'; text: string }
  | { type: 'QUANTITY_INPUT'; text: string };

export enum LoadingState {
  IDLE = 'IDLE',
  LOADING = 'LOADING',
  SUCCESS = 'SUCCESS',
  ERROR = 'ERROR'
}

export interface CoinDataSource {
  fetchCoins(): Promise<Coin[]>;
  fetchCoinHistory(coinId: string): Promise<CoinHistory>;
}
