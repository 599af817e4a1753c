import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { toDecimal } from '../common/utils/decimal.util';
import { normalizeCurrency } from '../common/utils/currency.util';
import { AsOf, toDateKey } from '../common/utils/date.util';

/**
 * Operator-supplied FX rates, taking precedence over the live provider.
 * A dated rate applies to that day only; an undated rate applies to every date
 * without a dated one. The inverse pair is derived when only one side is set.
 */
@Injectable()
export class ManualRateService {
  private rates: Map<string, Decimal> = new Map();

  /**
   * @throws Error if rate <= 0
   */
  setRate(from: string, to: string, rate: number | string, date?: Date): void {
    const value = toDecimal(rate);
    if (value.lessThanOrEqualTo(0)) {
      throw new Error(`Rate must be positive, got ${value.toString()} for ${from}/${to}`);
    }
    this.rates.set(this.key(normalizeCurrency(from), normalizeCurrency(to), date), value);
  }

  getRate(from: string, to: string, asOf: AsOf = 'latest'): Decimal | undefined {
    const source = normalizeCurrency(from);
    const target = normalizeCurrency(to);
    const day = asOf === 'latest' ? undefined : asOf;
    return (day && this.lookup(source, target, day)) ?? this.lookup(source, target);
  }

  getAllRates(): Record<string, number> {
    const rates: Record<string, number> = {};
    this.rates.forEach((rate, pair) => {
      rates[pair] = rate.toNumber();
    });
    return rates;
  }

  clearAllRates(): void {
    this.rates.clear();
  }

  private lookup(from: string, to: string, date?: Date): Decimal | undefined {
    const direct = this.rates.get(this.key(from, to, date));
    if (direct) return direct;

    const inverse = this.rates.get(this.key(to, from, date));
    return inverse ? new Decimal(1).dividedBy(inverse) : undefined;
  }

  private key(from: string, to: string, date?: Date): string {
    return date ? `${from}/${to}@${toDateKey(date)}` : `${from}/${to}`;
  }
}
