import { format, isValid, parse } from 'date-fns';

export const LEDGER_DATE_FORMAT = 'dd-MM-yyyy';

/**
 * Parses a ledger date (day-month-year) to local midnight.
 * Returns undefined for strings that are not real calendar dates.
 */
export function parseLedgerDate(value: string): Date | undefined {
  const parsed = parse(value.trim(), LEDGER_DATE_FORMAT, new Date(0));
  return isValid(parsed) ? parsed : undefined;
}

/** yyyy-MM-dd, used for output and lookup cache keys */
export function toDateKey(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function toPeriodKey(date: Date, period: 'year' | 'month'): string {
  return format(date, period === 'year' ? 'yyyy' : 'yyyy-MM');
}

/** Point in time for a quote or rate lookup */
export type AsOf = Date | 'latest';

export function asOfKey(asOf: AsOf): string {
  return asOf === 'latest' ? 'latest' : toDateKey(asOf);
}
