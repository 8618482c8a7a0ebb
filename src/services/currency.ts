import { CurrencyParseError } from '../errors';

export const ZERO_PLACEHOLDER = '-';
export const INCLUDED_PLAN = 'Included';

const CURRENCY_PATTERN = /[-+]?\$?\d{1,4}(?:,\d{3})*(\.\d+)?/;

/**
 * Converts a bill amount such as `-$280.83` or `$1,234.56` to a number.
 * The lone placeholder `-` means zero. `Included` is not an amount and must be
 * branched on before calling this.
 */
export const parseCurrency = (raw: string): number => {
  const value = raw.trim();
  if (value === ZERO_PLACEHOLDER) return 0;

  const match = CURRENCY_PATTERN.exec(value);
  if (!match) {
    throw new CurrencyParseError(`Cannot read "${raw}" as a dollar amount`, { value: raw });
  }

  const cleaned = match[0].replace(/[^\d.-]/g, '');
  const amount = Number.parseFloat(cleaned);
  if (!Number.isFinite(amount)) {
    throw new CurrencyParseError(`Cannot read "${raw}" as a dollar amount`, { value: raw });
  }
  return amount;
};

export const formatUsd = (amount: number): string => {
  const formatted = Math.abs(amount).toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });
  const negative = amount < 0 && formatted !== '0.00';
  return `${negative ? '-' : ''}$${formatted}`;
};
