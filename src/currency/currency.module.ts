import { Module } from '@nestjs/common';
import { CurrencyService } from './currency.service';
import { ManualRateService } from './manual-rate.service';
import { FrankfurterRateProvider } from './frankfurter-rate.provider';
import { RATE_PROVIDER, RateProvider } from './rate-provider.interface';
import { APP_CONFIG, AppConfig } from '../config/app.config';

@Module({
  providers: [
    ManualRateService,
    {
      provide: RATE_PROVIDER,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig): RateProvider | null =>
        config.fxSource === 'frankfurter'
          ? new FrankfurterRateProvider(config.fxBaseUrl, config.lookupTimeoutMs)
          : null,
    },
    CurrencyService,
  ],
  exports: [CurrencyService, ManualRateService],
})
export class CurrencyModule {}
