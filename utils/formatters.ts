const usdFmt = new Intl.NumberFormat('en-US', { style: 'currency', currency: 'USD' });

const QUANTITY_PATTERN = /^[0-9]+\.?[0-9]*$/;
const PLAIN_AMOUNT_PATTERN = /^[0-9]+(\.[0-9]+)?$/;

/**
 * "Simple currency" input formatting: the digits typed are read as cents,
 * so "123456" becomes "$1,234.56". Non-digits are ignored.
 */
export function formatCurrencyInput(text: string): string {
  const digits = text.replace(/\D/g, '');
  if (digits.length === 0) return '';
  return usdFmt.format(Number(digits) / 100);
}

/**
 * Reads a dollar amount back out of "$1,234.56" style text.
 * Returns null when what is left after stripping `$` and `,` is not a plain number.
 */
export function parseCurrencyText(text: string): number | null {
  const stripped = text.replace(/[$,]/g, '').trim();
  if (!PLAIN_AMOUNT_PATTERN.test(stripped)) return null;
  return Number(stripped);
}

// Digits, an optional single '.', optional trailing digits
export function isQuantityText(text: string): boolean {
  return QUANTITY_PATTERN.test(text);
}

/**
 * Quantity as plain decimal text. Number#toString switches to exponent
 * notation below 1e-6; the quantity input only takes digits and a point.
 */
export function formatQuantity(quantity: number): string {
  const text = quantity.toString();
  if (!/e/i.test(text)) return text;
  return quantity.toLocaleString('en-US', { useGrouping: false, maximumFractionDigits: 20 });
}

export function formatFixedUsd(amount: number): string {
  return amount.toFixed(2);
}

/**
 * X-axis label for an epoch-millis timestamp, e.g. "3 '24".
 */
export function formatAxisLabel(timestampMillis: number): string {
  const date = new Date(timestampMillis);
  const year = date.getFullYear().toString().substring(2, 4);
  return `${date.getMonth() + 1} '${year}`;
}
