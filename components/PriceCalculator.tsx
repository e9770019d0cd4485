import React from 'react';
import { DollarSign, Coins } from 'lucide-react';
import { CalculatorState } from '../types';

interface PriceCalculatorProps {
  state: CalculatorState;
  symbol: string;
  onUsdChange: (text: string) => void;
  onQuantityChange: (text: string) => void;
  disabled?: boolean;
}

const inputClass = "w-full bg-white border border-slate-400 rounded-lg pl-9 pr-4 py-2.5 text-slate-900 focus:ring-2 focus:ring-indigo-500 outline-none transition-all placeholder-slate-400 disabled:bg-slate-100 disabled:cursor-not-allowed";

export const PriceCalculator: React.FC<PriceCalculatorProps> = ({ state, symbol, onUsdChange, onQuantityChange, disabled = false }) => {
  return (
    <section className="mx-5 mt-6">
      <h2 className="text-center font-bold mb-3">Price Calculator (USD)</h2>
      <div className="flex gap-5">
        <div className="flex-1 relative">
          <span className="absolute left-3 top-3 text-slate-500 pointer-events-none">
            <DollarSign size={16} />
          </span>
          <input
            aria-label="USD amount"
            inputMode="decimal"
            disabled={disabled}
            value={state.usdText}
            onChange={(e) => onUsdChange(e.target.value)}
            placeholder="USD"
            className={inputClass}
          />
        </div>
        <div className="flex-1 relative">
          <span className="absolute left-3 top-3 text-slate-500 pointer-events-none">
            <Coins size={16} />
          </span>
          <input
            aria-label={`${symbol.toUpperCase()} quantity`}
            inputMode="decimal"
            disabled={disabled}
            value={state.quantityText}
            onChange={(e) => onQuantityChange(e.target.value)}
            placeholder="QTY"
            className={inputClass}
          />
        </div>
      </div>
    </section>
  );
};
