import axios, { AxiosInstance } from 'axios';
import Decimal from 'decimal.js';
import { RateProvider } from './rate-provider.interface';
import { AsOf, asOfKey } from '../common/utils/date.util';
import { toDecimal } from '../common/utils/decimal.util';

interface FrankfurterResponse {
  amount: number;
  base: string;
  date: string;
  rates: Record<string, number>;
}

// ECB reference rates; historical dates resolve to the closest prior business day.
export class FrankfurterRateProvider implements RateProvider {
  readonly name = 'frankfurter';
  private readonly http: AxiosInstance;

  constructor(baseUrl: string, timeoutMs: number) {
    this.http = axios.create({ baseURL: baseUrl, timeout: timeoutMs });
  }

  async getRate(from: string, to: string, asOf: AsOf): Promise<Decimal> {
    const { data } = await this.http.get<FrankfurterResponse>(`/${asOfKey(asOf)}`, {
      params: { from, to },
    });

    const rate = data.rates?.[to];
    if (typeof rate !== 'number' || rate <= 0) {
      throw new Error(`No ${from}/${to} rate in response for ${asOfKey(asOf)}`);
    }
    return toDecimal(rate);
  }
}
