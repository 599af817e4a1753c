import { Injectable, Logger } from '@nestjs/common';
import { LotTracker } from './lot-tracker';
import { LotConsumption, OpenPosition } from './entities/lot.entity';
import { Transaction, TransactionType } from './entities/transaction.entity';
import { DividendIncome, MatchedLot, MatchedSale, SaleEvent } from './entities/sale-event.entity';
import {
  InsufficientSharesError,
  InvalidQuantityError,
  LedgerError,
  LedgerErrorContext,
  MalformedLedgerError,
} from './errors/ledger.errors';
import { AmountConverter } from '../currency/rate-provider.interface';
import { allAvailable, available, isAvailable } from '../common/availability';
import { divide, percentOf, sum } from '../common/utils/decimal.util';

// Buys before sells before dividends on the same date.
const TYPE_ORDER: Record<TransactionType, number> = {
  [TransactionType.BUY]: 0,
  [TransactionType.SELL]: 1,
  [TransactionType.DIVIDEND]: 2,
};

export interface ReplayOptions {
  /** Collect structural errors as issues instead of throwing on the first one */
  continueOnError?: boolean;
}

export interface LedgerIssue {
  code: string;
  message: string;
  context: LedgerErrorContext;
}

export interface ReplayResult {
  sales: MatchedSale[];
  openPositions: OpenPosition[];
  dividends: DividendIncome[];
  issues: LedgerIssue[];
  tracker: LotTracker;
}

export interface ProcessResult extends Omit<ReplayResult, 'sales'> {
  saleEvents: SaleEvent[];
}

/**
 * Replays a ledger through a fresh LotTracker.
 * Replay is synchronous; only the reporting-currency normalization awaits lookups.
 */
@Injectable()
export class TransactionProcessorService {
  private readonly logger = new Logger(TransactionProcessorService.name);

  /** Date ascending, then buy/sell/dividend, then ledger order */
  sortTransactions(transactions: readonly Transaction[]): Transaction[] {
    return [...transactions].sort(
      (a, b) =>
        a.date.getTime() - b.date.getTime() ||
        TYPE_ORDER[a.type] - TYPE_ORDER[b.type] ||
        a.index - b.index,
    );
  }

  replay(transactions: readonly Transaction[], options: ReplayOptions = {}): ReplayResult {
    const tracker = new LotTracker();
    const sales: MatchedSale[] = [];
    const dividends = new Map<string, DividendIncome>();
    const issues: LedgerIssue[] = [];

    for (const transaction of this.sortTransactions(transactions)) {
      try {
        switch (transaction.type) {
          case TransactionType.BUY:
            this.handleBuy(tracker, transaction);
            break;
          case TransactionType.SELL:
            sales.push(this.handleSell(tracker, transaction));
            break;
          case TransactionType.DIVIDEND:
            this.handleDividend(dividends, transaction);
            break;
        }
      } catch (error) {
        if (!options.continueOnError || !(error instanceof LedgerError)) {
          throw error;
        }
        tracker.markUnreliable(transaction.account, transaction.symbol);
        issues.push({ code: error.code, message: error.message, context: error.context });
        this.logger.warn(`Skipped transaction #${transaction.index}: ${error.message}`);
      }
    }

    return {
      sales,
      openPositions: tracker.openPositions(),
      dividends: Array.from(dividends.values()),
      issues,
      tracker,
    };
  }

  /**
   * Replays the ledger, then expresses every sale in the reporting currency.
   * Proceeds convert at the sale date, each lot's cost at its own open date.
   */
  async process(
    transactions: readonly Transaction[],
    reportingCurrency: string,
    converter: AmountConverter,
    options: ReplayOptions = {},
  ): Promise<ProcessResult> {
    const { sales, ...rest } = this.replay(transactions, options);
    const saleEvents = await Promise.all(sales.map((sale) => this.normalize(sale, reportingCurrency, converter)));
    return { ...rest, saleEvents };
  }

  async normalize(sale: MatchedSale, reportingCurrency: string, converter: AmountConverter): Promise<SaleEvent> {
    const [proceeds, ...lotCosts] = await Promise.all([
      converter.convert(sale.proceeds, sale.currency, reportingCurrency, sale.sellDate),
      ...sale.matchedLots.map((lot) => converter.convert(lot.cost, lot.currency, reportingCurrency, lot.openDate)),
    ]);

    const costs = allAvailable(lotCosts);
    if (!isAvailable(proceeds)) return { ...sale, reporting: proceeds };
    if (!isAvailable(costs)) return { ...sale, reporting: costs };

    const costBasis = sum(costs.value);
    const realizedGain = proceeds.value.minus(costBasis);
    return {
      ...sale,
      reporting: available({
        currency: reportingCurrency,
        proceeds: proceeds.value,
        costBasis,
        realizedGain,
        realizedGainPct: percentOf(realizedGain, costBasis),
      }),
    };
  }

  private handleBuy(tracker: LotTracker, transaction: Transaction): void {
    this.assertQuantities(transaction);
    const { shares, price, fee } = transaction;
    const totalCost = shares.times(price).plus(fee);
    tracker.openLot(
      transaction.account,
      transaction.symbol,
      transaction.date,
      shares,
      divide(totalCost, shares),
      transaction.currency,
      totalCost,
    );
  }

  private handleSell(tracker: LotTracker, transaction: Transaction): MatchedSale {
    this.assertQuantities(transaction);
    const { account, symbol, date, shares, price, fee, currency } = transaction;

    if (!tracker.hasActivity(account, symbol)) {
      throw new MalformedLedgerError(
        `Sell of ${shares.toString()} ${symbol} in ${account} has no prior buy`,
        this.contextOf(transaction),
      );
    }

    const matchedLots: MatchedLot[] = this.consume(tracker, transaction).map(({ lot, sharesTaken, cost }) => ({
      lotId: lot.id,
      openDate: lot.openDate,
      sharesTaken,
      unitCost: lot.unitCost,
      currency: lot.currency,
      cost,
    }));

    const grossProceeds = shares.times(price);
    const sameCurrency = matchedLots.every((lot) => lot.currency === currency);

    return {
      index: transaction.index,
      sellDate: date,
      account,
      symbol,
      sharesSold: shares,
      price,
      fee,
      currency,
      grossProceeds,
      proceeds: grossProceeds.minus(fee),
      matchedLots,
      weightedAverageCost: sameCurrency ? divide(sum(matchedLots.map((lot) => lot.cost)), shares) : undefined,
    };
  }

  private consume(tracker: LotTracker, transaction: Transaction): LotConsumption[] {
    try {
      return tracker.consumeShares(transaction.account, transaction.symbol, transaction.date, transaction.shares);
    } catch (error) {
      if (error instanceof InsufficientSharesError) {
        throw new MalformedLedgerError(error.message, this.contextOf(transaction), { cause: error });
      }
      throw error;
    }
  }

  // Dividends move no shares; they accumulate per (account, symbol, currency).
  private handleDividend(dividends: Map<string, DividendIncome>, transaction: Transaction): void {
    const { account, symbol, date, shares, price, fee, currency } = transaction;
    if (shares.lessThanOrEqualTo(0) || price.isNegative() || fee.isNegative()) {
      throw new InvalidQuantityError(
        `Invalid dividend for ${symbol}: shares ${shares.toString()}, price ${price.toString()}, fee ${fee.toString()}`,
        this.contextOf(transaction),
      );
    }

    const key = `${account}\u0000${symbol}\u0000${currency}`;
    const amount = shares.times(price).minus(fee);
    const existing = dividends.get(key);
    if (!existing) {
      dividends.set(key, {
        account,
        symbol,
        currency,
        amount,
        payments: 1,
        firstPaymentDate: date,
        lastPaymentDate: date,
      });
      return;
    }
    existing.amount = existing.amount.plus(amount);
    existing.payments += 1;
    existing.lastPaymentDate = date;
  }

  private assertQuantities(transaction: Transaction): void {
    const { shares, price, fee } = transaction;
    const problems = [
      shares.lessThanOrEqualTo(0) && `shares must be positive, got ${shares.toString()}`,
      price.lessThanOrEqualTo(0) && `price must be positive, got ${price.toString()}`,
      fee.isNegative() && `fee must not be negative, got ${fee.toString()}`,
    ].filter((problem): problem is string => typeof problem === 'string');

    if (problems.length > 0) {
      throw new InvalidQuantityError(
        `Invalid ${transaction.type} #${transaction.index} of ${transaction.symbol}: ${problems.join('; ')}`,
        this.contextOf(transaction),
      );
    }
  }

  private contextOf(transaction: Transaction): LedgerErrorContext {
    return {
      account: transaction.account,
      symbol: transaction.symbol,
      date: transaction.date,
      index: transaction.index,
      transaction,
    };
  }
}
