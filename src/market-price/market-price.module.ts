import { Module } from '@nestjs/common';
import { MarketPriceService } from './market-price.service';
import { QuoteService } from './quote.service';
import { YahooQuoteProvider } from './yahoo-quote.provider';
import { QUOTE_PROVIDER, QuoteProvider } from './quote-provider.interface';
import { APP_CONFIG, AppConfig } from '../config/app.config';

@Module({
  providers: [
    MarketPriceService,
    {
      provide: QUOTE_PROVIDER,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig): QuoteProvider | null =>
        config.quoteSource === 'yahoo' ? new YahooQuoteProvider() : null,
    },
    QuoteService,
  ],
  exports: [MarketPriceService, QuoteService],
})
export class MarketPriceModule {}
