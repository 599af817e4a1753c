import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { MarketPriceService } from './market-price.service';
import { QUOTE_PROVIDER, Quote, QuoteProvider } from './quote-provider.interface';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { Availability, available, unavailable } from '../common/availability';
import { AsOf, asOfKey } from '../common/utils/date.util';
import { withTimeout } from '../common/utils/timeout.util';

/**
 * Resolves quotes from manual prices, then the live provider.
 * Failures degrade to QuoteUnavailable for that symbol only.
 */
@Injectable()
export class QuoteService {
  private readonly logger = new Logger(QuoteService.name);

  constructor(
    private readonly marketPrices: MarketPriceService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Optional() @Inject(QUOTE_PROVIDER) private readonly live: QuoteProvider | null = null,
  ) {}

  async getQuote(symbol: string, asOf: AsOf = 'latest'): Promise<Availability<Quote>> {
    if (asOf === 'latest') {
      const manual = this.marketPrices.getPrice(symbol);
      if (manual) {
        return available(manual);
      }
    }

    const label = `${symbol}@${asOfKey(asOf)}`;
    if (!this.live) {
      return unavailable('QuoteUnavailable', `No quote source for ${label}`);
    }

    try {
      const quote = await withTimeout(
        this.live.getQuote(symbol, asOf),
        this.config.lookupTimeoutMs,
        `${this.live.name} ${label}`,
      );
      return available(quote);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Quote ${label} unavailable: ${detail}`);
      return unavailable('QuoteUnavailable', `${label}: ${detail}`);
    }
  }

  /** Concurrent lookups, one per distinct symbol */
  async getQuotes(symbols: Iterable<string>, asOf: AsOf = 'latest'): Promise<Map<string, Availability<Quote>>> {
    const distinct = Array.from(new Set(symbols));
    const results = await Promise.all(distinct.map((symbol) => this.getQuote(symbol, asOf)));
    return new Map(distinct.map((symbol, i) => [symbol, results[i]]));
  }
}
