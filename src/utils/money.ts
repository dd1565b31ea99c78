/**
 * Minor-unit money helpers
 *
 * Amounts travel through the agent as integers in the currency's smallest
 * unit. Conversion to and from decimal text happens only at the edges
 * (language model output, ledger API, chat replies).
 */

interface CurrencyInfo {
  symbol: string;
  decimals: number;
}

const CURRENCIES: Record<string, CurrencyInfo> = {
  USD: { symbol: '$', decimals: 2 },
  EUR: { symbol: '€', decimals: 2 },
  GBP: { symbol: '£', decimals: 2 },
  INR: { symbol: '₹', decimals: 2 },
  JPY: { symbol: '¥', decimals: 0 },
  KRW: { symbol: '₩', decimals: 0 },
  CAD: { symbol: 'C$', decimals: 2 },
  AUD: { symbol: 'A$', decimals: 2 },
  CHF: { symbol: 'Fr', decimals: 2 },
  CNY: { symbol: '¥', decimals: 2 },
  MXN: { symbol: '$', decimals: 2 },
};

const DECIMAL_PATTERN = /^([-+])?(\d+)(?:\.(\d*))?$/;

function currencyInfo(currency: string): CurrencyInfo {
  return CURRENCIES[currency.toUpperCase()] ?? { symbol: `${currency.toUpperCase()} `, decimals: 2 };
}

/** Number of decimal places of the currency's minor unit */
export function currencyDecimals(currency: string): number {
  return currencyInfo(currency).decimals;
}

/**
 * Parses a plain decimal string ("333.33", "-12.5", "900") into minor units.
 * Extra fraction digits are rounded half-up. Returns null when the text is
 * not a plain decimal or the result is not a safe integer.
 */
export function parseMinorUnits(value: string, currency: string): number | null {
  const match = DECIMAL_PATTERN.exec(value.trim());
  if (match === null) {
    return null;
  }

  const [, sign, whole, fraction = ''] = match;
  const decimals = currencyDecimals(currency);
  const kept = fraction.slice(0, decimals).padEnd(decimals, '0');

  let units = Number(`${whole}${kept}`);
  const nextDigit = fraction.charAt(decimals);
  if (nextDigit !== '' && nextDigit >= '5') {
    units += 1;
  }

  if (!Number.isSafeInteger(units)) {
    return null;
  }

  if (units === 0) {
    return 0;
  }
  return sign === '-' ? -units : units;
}

/**
 * Converts a loosely typed amount (number, or text such as "₹1,250.50")
 * into minor units. Returns null when no amount can be read.
 */
export function toMinorUnits(value: unknown, currency: string): number | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return null;
    }
    const text = String(value);
    // exponent notation is outside any realistic expense amount
    return text.includes('e') ? null : parseMinorUnits(text, currency);
  }

  if (typeof value === 'string') {
    const cleaned = value.replace(/[^\d.,+-]/g, '').replace(/,/g, '');
    return cleaned === '' ? null : parseMinorUnits(cleaned, currency);
  }

  return null;
}

/**
 * Formats minor units as a plain decimal string ("333.33")
 */
export function formatMinorUnits(amount: number, currency: string): string {
  const decimals = currencyDecimals(currency);
  const sign = amount < 0 ? '-' : '';
  const absolute = Math.abs(amount);

  if (decimals === 0) {
    return `${sign}${absolute}`;
  }

  const divisor = 10 ** decimals;
  const whole = Math.floor(absolute / divisor);
  const fraction = String(absolute % divisor).padStart(decimals, '0');
  return `${sign}${whole}.${fraction}`;
}

/**
 * Formats minor units with the currency symbol ("₹333.33")
 */
export function formatMoney(amount: number, currency: string): string {
  const { symbol } = currencyInfo(currency);
  const formatted = formatMinorUnits(Math.abs(amount), currency);
  return `${amount < 0 ? '-' : ''}${symbol}${formatted}`;
}
