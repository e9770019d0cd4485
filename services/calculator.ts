/**
 * USD / quantity price calculator.
 *
 * Editing one side recomputes the other using the coin's current price.
 * setUsd and setQuantity are the numeric transitions; calculatorReducer wraps
 * them with the text handling of the two inputs.
 *
 * The two directions format differently: the USD field is run through the
 * currency formatter as the user types ("$1,234.56"), but when it is filled
 * in from a quantity edit it gets plain two-decimal text ("1234.56").
 */

import { CalculatorAction, CalculatorState } from '../types';
import { formatCurrencyInput, formatFixedUsd, formatQuantity, isQuantityText, parseCurrencyText } from '../utils/formatters';

export const createCalculatorState = (currentPrice: number = 0): CalculatorState => ({
  usdAmount: 0,
  quantity: 0,
  currentPrice,
  usdText: '0',
  quantityText: '0',
});

const roundToCents = (amount: number): number => Math.round(amount * 100) / 100;

export const setUsd = (state: CalculatorState, amount: number): CalculatorState => {
  // Price not known yet: keep the quantity rather than divide by zero
  if (state.currentPrice <= 0) {
    return { ...state, usdAmount: amount };
  }
  return { ...state, usdAmount: amount, quantity: amount / state.currentPrice };
};

export const setQuantity = (state: CalculatorState, quantity: number): CalculatorState => ({
  ...state,
  quantity,
  usdAmount: roundToCents(state.currentPrice * quantity),
});

const handleUsdInput = (state: CalculatorState, text: string): CalculatorState => {
  const usdText = formatCurrencyInput(text);
  const amount = parseCurrencyText(usdText);
  if (amount === null) {
    return { ...state, usdText };
  }

  const next = setUsd(state, amount);
  return {
    ...next,
    usdText,
    quantityText: state.currentPrice > 0 ? formatQuantity(next.quantity) : state.quantityText,
  };
};

const handleQuantityInput = (state: CalculatorState, text: string): CalculatorState => {
  if (text.length === 0) {
    return { ...state, quantityText: '' };
  }
  // Rejected edit: the field keeps its previous text
  if (!isQuantityText(text)) {
    return state;
  }

  const next = setQuantity(state, Number(text));
  return { ...next, quantityText: text, usdText: formatFixedUsd(next.usdAmount) };
};

// A quantity entered before the price arrived is re-priced so USD matches it
const handlePriceLoaded = (state: CalculatorState, price: number): CalculatorState => {
  const priced = { ...state, currentPrice: price };
  if (state.quantity <= 0) return priced;

  const next = setQuantity(priced, state.quantity);
  return { ...next, usdText: formatFixedUsd(next.usdAmount) };
};

export const calculatorReducer = (state: CalculatorState, action: CalculatorAction): CalculatorState => {
  switch (action.type) {
    case 'PRICE_LOADED':
      return handlePriceLoaded(state, action.price);
    case 'USD_INPUT':
      return handleUsdInput(state, action.text);
    case 'QUANTITY_INPUT':
      return handleQuantityInput(state, action.text);
  }
};
