import Decimal from 'decimal.js';
import { AsOf } from '../common/utils/date.util';

export const QUOTE_PROVIDER = Symbol('QUOTE_PROVIDER');

export interface Quote {
  symbol: string;
  price: Decimal;
  currency: string;
  timestamp: Date;
  source: string;       // "manual" or the live provider's name
}

/**
 * Live market data source. Rejects when the symbol has no price for `asOf`.
 */
export interface QuoteProvider {
  readonly name: string;
  getQuote(symbol: string, asOf: AsOf): Promise<Quote>;
}
