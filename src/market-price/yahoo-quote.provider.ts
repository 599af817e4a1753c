import yahooFinance from 'yahoo-finance2';
import { addDays } from 'date-fns';
import { Quote, QuoteProvider } from './quote-provider.interface';
import { AsOf, toDateKey } from '../common/utils/date.util';
import { toDecimal } from '../common/utils/decimal.util';
import { normalizeCurrency } from '../common/utils/currency.util';

// Yahoo lists London prices in pence ("GBp").
const MINOR_UNITS: Record<string, { currency: string; divisor: number }> = {
  GBp: { currency: 'GBP', divisor: 100 },
  GBX: { currency: 'GBP', divisor: 100 },
  ZAc: { currency: 'ZAR', divisor: 100 },
  ILA: { currency: 'ILS', divisor: 100 },
};

export class YahooQuoteProvider implements QuoteProvider {
  readonly name = 'yahoo';

  async getQuote(symbol: string, asOf: AsOf): Promise<Quote> {
    const summary = await yahooFinance.quote(symbol);
    if (!summary.currency) {
      throw new Error(`No currency reported for ${symbol}`);
    }

    if (asOf === 'latest') {
      if (summary.regularMarketPrice === undefined) {
        throw new Error(`No market price for ${symbol}`);
      }
      return this.toQuote(symbol, summary.regularMarketPrice, summary.currency, summary.regularMarketTime ?? new Date());
    }

    // first trading day on or after the requested date
    const rows = await yahooFinance.historical(symbol, {
      period1: toDateKey(asOf),
      period2: toDateKey(addDays(asOf, 7)),
      interval: '1d',
    });
    const row = rows.find((candidate) => candidate.close > 0);
    if (!row) {
      throw new Error(`No close for ${symbol} near ${toDateKey(asOf)}`);
    }
    return this.toQuote(symbol, row.close, summary.currency, row.date);
  }

  private toQuote(symbol: string, price: number, currency: string, timestamp: Date): Quote {
    const minor = MINOR_UNITS[currency];
    return {
      symbol,
      price: minor ? toDecimal(price).dividedBy(minor.divisor) : toDecimal(price),
      currency: minor ? minor.currency : normalizeCurrency(currency),
      timestamp,
      source: this.name,
    };
  }
}
