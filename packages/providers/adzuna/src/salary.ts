export const DEFAULT_CURRENCY_SYMBOL = '₹';

const CURRENCY_SYMBOLS: Record<string, string> = {
  at: '€',
  au: '$',
  be: '€',
  br: 'R$',
  ca: '$',
  ch: 'CHF ',
  de: '€',
  es: '€',
  fr: '€',
  gb: '£',
  in: '₹',
  it: '€',
  mx: '$',
  nl: '€',
  nz: '$',
  pl: 'zł',
  sg: '$',
  us: '$',
  za: 'R',
};

const amountFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 20 });

export function currencySymbolForCountry(country: string): string {
  return CURRENCY_SYMBOLS[country.trim().toLowerCase()] ?? DEFAULT_CURRENCY_SYMBOL;
}

// Zero counts as "not provided", same as a missing bound.
function asBound(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) && value !== 0 ? value : undefined;
}

export function formatSalary(min: unknown, max: unknown, currencySymbol: string = DEFAULT_CURRENCY_SYMBOL): string {
  const lower = asBound(min);
  const upper = asBound(max);

  if (lower !== undefined && upper !== undefined) {
    return `${currencySymbol}${amountFormat.format(lower)} - ${currencySymbol}${amountFormat.format(upper)}`;
  }

  if (lower !== undefined) {
    return `${currencySymbol}${amountFormat.format(lower)}+`;
  }

  if (upper !== undefined) {
    return `Up to ${currencySymbol}${amountFormat.format(upper)}`;
  }

  return 'Not specified';
}
