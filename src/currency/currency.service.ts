import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import Decimal from 'decimal.js';
import { AmountConverter, RATE_PROVIDER, RateProvider } from './rate-provider.interface';
import { ManualRateService } from './manual-rate.service';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { Availability, available, mapAvailable, unavailable } from '../common/availability';
import { AsOf, asOfKey } from '../common/utils/date.util';
import { normalizeCurrency } from '../common/utils/currency.util';
import { withTimeout } from '../common/utils/timeout.util';

/**
 * Converts amounts between currencies. Manual rates win over the live provider;
 * a failed lookup becomes a ConversionUnavailable result, never an exception.
 */
@Injectable()
export class CurrencyService implements AmountConverter {
  private readonly logger = new Logger(CurrencyService.name);

  constructor(
    private readonly manualRates: ManualRateService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Optional() @Inject(RATE_PROVIDER) private readonly live: RateProvider | null = null,
  ) {}

  async getRate(from: string, to: string, asOf: AsOf): Promise<Availability<Decimal>> {
    const source = normalizeCurrency(from);
    const target = normalizeCurrency(to);
    if (source === target) {
      return available(new Decimal(1));
    }

    const manual = this.manualRates.getRate(source, target, asOf);
    if (manual) {
      return available(manual);
    }

    const label = `${source}/${target}@${asOfKey(asOf)}`;
    if (!this.live) {
      return unavailable('ConversionUnavailable', `No rate source for ${label}`);
    }

    try {
      const rate = await withTimeout(
        this.live.getRate(source, target, asOf),
        this.config.lookupTimeoutMs,
        `${this.live.name} ${label}`,
      );
      return available(rate);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Rate ${label} unavailable: ${detail}`);
      return unavailable('ConversionUnavailable', `${label}: ${detail}`);
    }
  }

  async convert(amount: Decimal, from: string, to: string, asOf: AsOf): Promise<Availability<Decimal>> {
    const rate = await this.getRate(from, to, asOf);
    return mapAvailable(rate, (value) => amount.times(value));
  }

  /**
   * Converter memoizing rates per (pair, date) for one analysis run.
   */
  session(): AmountConverter {
    const cache = new Map<string, Promise<Availability<Decimal>>>();
    return {
      convert: async (amount, from, to, asOf) => {
        const key = `${normalizeCurrency(from)}/${normalizeCurrency(to)}@${asOfKey(asOf)}`;
        let rate = cache.get(key);
        if (!rate) {
          rate = this.getRate(from, to, asOf);
          cache.set(key, rate);
        }
        return mapAvailable(await rate, (value) => amount.times(value));
      },
    };
  }
}
