import Decimal from 'decimal.js';
import { CurrencyAmount, Lot, LotConsumption, OpenPosition } from './entities/lot.entity';
import { InsufficientSharesError, InvalidQuantityError } from './errors/ledger.errors';
import { ZERO, divide } from '../common/utils/decimal.util';

const keyOf = (account: string, symbol: string): string => `${account}\u0000${symbol}`;

// FIFO queues of buy lots per (account, symbol).
// One instance per replay: all state is derived from the ledger.
export class LotTracker {
  private queues: Map<string, Lot[]> = new Map();
  private unreliable: Set<string> = new Set();
  private nextLotId = 1;

  /**
   * Inserts a lot after every lot opened on or before `date`,
   * so same-date lots keep ingestion order.
   * `totalCost` defaults to shares × unit cost; pass the exact amount paid when the
   * unit cost is a rounded quotient.
   */
  openLot(
    account: string,
    symbol: string,
    date: Date,
    shares: Decimal,
    unitCostInclFee: Decimal,
    currency: string,
    totalCost: Decimal = shares.times(unitCostInclFee),
  ): Readonly<Lot> {
    if (shares.lessThanOrEqualTo(0)) {
      throw new InvalidQuantityError(`Lot shares must be positive, got ${shares.toString()}`, {
        account,
        symbol,
        date,
      });
    }
    if (unitCostInclFee.isNegative()) {
      throw new InvalidQuantityError(`Lot unit cost must not be negative, got ${unitCostInclFee.toString()}`, {
        account,
        symbol,
        date,
      });
    }

    const lot: Lot = {
      id: this.nextLotId++,
      account,
      symbol,
      openDate: date,
      originalShares: shares,
      sharesRemaining: shares,
      unitCost: unitCostInclFee,
      totalCost,
      costRemaining: totalCost,
      currency,
    };

    const queue = this.queueFor(account, symbol);
    let insertAt = queue.length;
    while (insertAt > 0 && queue[insertAt - 1].openDate.getTime() > date.getTime()) {
      insertAt--;
    }
    queue.splice(insertAt, 0, lot);

    return lot;
  }

  /**
   * Takes shares from the oldest lots first. Only lots opened on or before `date`
   * are eligible. Nothing is mutated when the request cannot be filled.
   */
  consumeShares(account: string, symbol: string, date: Date, sharesRequested: Decimal): LotConsumption[] {
    if (sharesRequested.lessThanOrEqualTo(0)) {
      throw new InvalidQuantityError(`Shares to consume must be positive, got ${sharesRequested.toString()}`, {
        account,
        symbol,
        date,
      });
    }

    const queue = this.queues.get(keyOf(account, symbol)) ?? [];
    const eligible = queue.filter((lot) => lot.openDate.getTime() <= date.getTime());
    const available = eligible.reduce((total, lot) => total.plus(lot.sharesRemaining), ZERO);

    if (available.lessThan(sharesRequested)) {
      throw new InsufficientSharesError({ account, symbol, date }, sharesRequested, available);
    }

    const consumed: LotConsumption[] = [];
    let remaining = sharesRequested;

    for (const lot of eligible) {
      if (remaining.isZero()) break;
      if (lot.sharesRemaining.isZero()) continue;

      const taken = Decimal.min(lot.sharesRemaining, remaining);
      const cost = taken.equals(lot.sharesRemaining)
        ? lot.costRemaining
        : lot.totalCost.times(taken).dividedBy(lot.originalShares);
      lot.sharesRemaining = lot.sharesRemaining.minus(taken);
      lot.costRemaining = lot.sharesRemaining.isZero() ? ZERO : lot.costRemaining.minus(cost);
      remaining = remaining.minus(taken);
      consumed.push({ lot: { ...lot }, sharesTaken: taken, cost });
    }

    return consumed;
  }

  openPosition(account: string, symbol: string): OpenPosition {
    const lots = this.lots(account, symbol).filter((lot) => lot.sharesRemaining.greaterThan(0));
    const totalShares = lots.reduce((total, lot) => total.plus(lot.sharesRemaining), ZERO);

    const costByCurrency = new Map<string, Decimal>();
    for (const lot of lots) {
      const current = costByCurrency.get(lot.currency) ?? ZERO;
      costByCurrency.set(lot.currency, current.plus(lot.costRemaining));
    }
    const costBasis: CurrencyAmount[] = Array.from(costByCurrency.entries()).map(([currency, amount]) => ({
      currency,
      amount,
    }));

    return {
      account,
      symbol,
      lots,
      totalShares,
      costBasis,
      weightedAverageCost:
        costBasis.length === 1
          ? { currency: costBasis[0].currency, amount: divide(costBasis[0].amount, totalShares) }
          : undefined,
      reliable: !this.unreliable.has(keyOf(account, symbol)),
    };
  }

  /** Every (account, symbol) still holding shares, in first-seen order */
  openPositions(): OpenPosition[] {
    return Array.from(this.queues.values())
      .filter((queue) => queue.length > 0)
      .map((queue) => this.openPosition(queue[0].account, queue[0].symbol))
      .filter((position) => position.totalShares.greaterThan(0));
  }

  /** Audit view, including fully consumed lots */
  lots(account: string, symbol: string): Readonly<Lot>[] {
    return (this.queues.get(keyOf(account, symbol)) ?? []).map((lot) => ({ ...lot }));
  }

  totalShares(account: string, symbol: string): Decimal {
    return (this.queues.get(keyOf(account, symbol)) ?? []).reduce(
      (total, lot) => total.plus(lot.sharesRemaining),
      ZERO,
    );
  }

  /** True once any lot has been opened for the pair */
  hasActivity(account: string, symbol: string): boolean {
    return (this.queues.get(keyOf(account, symbol))?.length ?? 0) > 0;
  }

  markUnreliable(account: string, symbol: string): void {
    this.unreliable.add(keyOf(account, symbol));
  }

  private queueFor(account: string, symbol: string): Lot[] {
    const key = keyOf(account, symbol);
    let queue = this.queues.get(key);
    if (!queue) {
      queue = [];
      this.queues.set(key, queue);
    }
    return queue;
  }
}
