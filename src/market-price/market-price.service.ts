import { Injectable } from '@nestjs/common';
import { Quote } from './quote-provider.interface';
import { toDecimal } from '../common/utils/decimal.util';
import { normalizeCurrency } from '../common/utils/currency.util';

/**
 * Manually entered latest prices.
 * Take precedence over the live provider for "latest" lookups only.
 */
@Injectable()
export class MarketPriceService {
  private latestPrices: Map<string, Quote> = new Map();
  private lastPriceUpdate: Date = new Date();

  /** Returns undefined if symbol not tracked */
  getPrice(symbol: string): Quote | undefined {
    return this.latestPrices.get(symbol.trim().toUpperCase());
  }

  /** Returns snapshot of all tracked prices */
  getAllPrices(): Record<string, { price: number; currency: string }> {
    const prices: Record<string, { price: number; currency: string }> = {};
    this.latestPrices.forEach((quote, symbol) => {
      prices[symbol] = { price: quote.price.toNumber(), currency: quote.currency };
    });
    return prices;
  }

  /**
   * Updates single symbol price.
   * @throws Error if price <= 0
   */
  updatePrice(symbol: string, price: number, currency: string): void {
    this.assertPositive(symbol, price);
    this.store(symbol, price, currency, new Date());
    this.lastPriceUpdate = new Date();
  }

  /**
   * Batch price updates in one currency - validates all before applying.
   * @throws Error on first invalid price
   */
  updatePrices(prices: Record<string, number>, currency: string): void {
    Object.entries(prices).forEach(([symbol, price]) => this.assertPositive(symbol, price));

    const now = new Date();
    Object.entries(prices).forEach(([symbol, price]) => this.store(symbol, price, currency, now));
    this.lastPriceUpdate = now;
  }

  getLastUpdateTime(): Date {
    return this.lastPriceUpdate;
  }

  hasPrice(symbol: string): boolean {
    return this.getPrice(symbol) !== undefined;
  }

  /** Test harness only */
  clearAllPrices(): void {
    this.latestPrices.clear();
    this.lastPriceUpdate = new Date();
  }

  private assertPositive(symbol: string, price: number): void {
    if (!(price > 0)) {
      throw new Error(`Price must be positive, got ${price} for ${symbol}`);
    }
  }

  private store(symbol: string, price: number, currency: string, timestamp: Date): void {
    const normalized = symbol.trim().toUpperCase();
    this.latestPrices.set(normalized, {
      symbol: normalized,
      price: toDecimal(price),
      currency: normalizeCurrency(currency),
      timestamp,
      source: 'manual',
    });
  }
}
