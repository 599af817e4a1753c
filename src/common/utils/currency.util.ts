const SYMBOL_CODES: Record<string, string> = {
  '$': 'USD',
  '€': 'EUR',
  '£': 'GBP',
  '¥': 'JPY',
};

/** Maps currency symbols to ISO codes and upper-cases codes ("eur" → "EUR", "$" → "USD"). */
export function normalizeCurrency(value: string): string {
  const trimmed = value.trim();
  return SYMBOL_CODES[trimmed] ?? trimmed.toUpperCase();
}
