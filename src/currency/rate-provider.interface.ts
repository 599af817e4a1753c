import Decimal from 'decimal.js';
import { Availability } from '../common/availability';
import { AsOf } from '../common/utils/date.util';

export const RATE_PROVIDER = Symbol('RATE_PROVIDER');

/**
 * Live FX source. Rejects when no rate can be produced.
 */
export interface RateProvider {
  readonly name: string;
  getRate(from: string, to: string, asOf: AsOf): Promise<Decimal>;
}

/** What the engine needs from currency conversion */
export interface AmountConverter {
  convert(amount: Decimal, from: string, to: string, asOf: AsOf): Promise<Availability<Decimal>>;
}
