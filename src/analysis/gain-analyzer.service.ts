import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { OpenPosition } from './entities/lot.entity';
import { DividendIncome, SaleEvent } from './entities/sale-event.entity';
import { Quote } from '../market-price/quote-provider.interface';
import { AmountConverter } from '../currency/rate-provider.interface';
import { CurrencyService } from '../currency/currency.service';
import { Availability, allAvailable, isAvailable } from '../common/availability';
import { ZERO, divide, percentOf, sum } from '../common/utils/decimal.util';
import { toPeriodKey } from '../common/utils/date.util';

export type SummaryPeriod = 'year' | 'month';

export enum TimingVerdict {
  SOLD_TOO_EARLY = 'SoldTooEarly',
  SOLD_AT_GOOD_TIME = 'SoldAtGoodTime',
  SOLD_TOO_LATE = 'SoldTooLate',
}

export interface GainGroup {
  key: string;
  sales: number;
  shares: Decimal;
  proceeds: Decimal;
  costBasis: Decimal;
  realizedGain: Decimal;
  realizedGainPct: Decimal;   // group gain / group cost
}

export interface RealizedSummary {
  reportingCurrency: string;
  saleCount: number;
  unavailableCount: number;
  totalProceeds: Decimal;
  totalCostBasis: Decimal;
  totalRealizedGain: Decimal;
  realizedGainPct: Decimal;
  averageGainPct: Decimal;    // mean of per-sale percentages
  byAccount: GainGroup[];
  bySymbol: GainGroup[];
  byPeriod: GainGroup[];
  best?: SaleEvent;
  worst?: SaleEvent;
}

interface ValuedPosition {
  position: OpenPosition;
  quote: Quote;
  marketValue: Decimal;
  costBasis: Decimal;
  weightedAverageCost: Decimal;
  unrealizedGain: Decimal;
  unrealizedGainPct: Decimal;
}

export type PositionValuation =
  | ({ status: 'Priced' } & ValuedPosition)
  | { status: 'PriceUnavailable' | 'ConversionUnavailable'; position: OpenPosition; detail: string };

export interface UnrealizedGroup {
  symbol: string;
  shares: Decimal;
  marketValue: Decimal;
  costBasis: Decimal;
  unrealizedGain: Decimal;
}

export interface UnrealizedSummary {
  reportingCurrency: string;
  positions: PositionValuation[];
  pricedCount: number;
  unavailableCount: number;
  totalMarketValue: Decimal;
  totalCostBasis: Decimal;
  totalUnrealizedGain: Decimal;
  unrealizedGainPct: Decimal;
  bySymbol: UnrealizedGroup[];   // across accounts, priced positions only
}

export type OpportunityCost =
  | {
      status: 'Evaluated';
      sale: SaleEvent;
      currentPrice: Quote;
      hypotheticalProceeds: Decimal;
      hypotheticalGain: Decimal;
      realizedGain: Decimal;
      delta: Decimal;             // hypothetical − realized; positive means holding would have earned more
      verdict: TimingVerdict;
    }
  | { status: 'QuoteUnavailable' | 'ConversionUnavailable'; sale: SaleEvent; detail: string };

export interface OpportunitySummary {
  evaluated: number;
  unavailable: number;
  soldTooEarly: number;
  soldAtGoodTime: number;
  soldTooLate: number;
  totalDelta: Decimal;
}

export interface IncomeEntry {
  income: DividendIncome;
  converted: Availability<Decimal>;
}

export interface IncomeSummary {
  reportingCurrency: string;
  entries: IncomeEntry[];
  totalIncome: Decimal;
  unavailableCount: number;
}

/**
 * Realized, unrealized and opportunity-cost views over a replayed ledger.
 * Amounts are reported in one currency; unavailable entries never reach totals.
 */
@Injectable()
export class GainAnalyzerService {
  constructor(private readonly currency: CurrencyService) {}

  realizedSummary(saleEvents: SaleEvent[], reportingCurrency: string, period: SummaryPeriod = 'year'): RealizedSummary {
    const rows = saleEvents.flatMap((event) =>
      isAvailable(event.reporting) && event.reporting.value.currency === reportingCurrency
        ? [{ event, amounts: event.reporting.value }]
        : [],
    );

    const group = (keyOf: (event: SaleEvent) => string): GainGroup[] => {
      const groups = new Map<string, GainGroup>();
      for (const { event, amounts } of rows) {
        const key = keyOf(event);
        const current = groups.get(key) ?? {
          key,
          sales: 0,
          shares: ZERO,
          proceeds: ZERO,
          costBasis: ZERO,
          realizedGain: ZERO,
          realizedGainPct: ZERO,
        };
        current.sales += 1;
        current.shares = current.shares.plus(event.sharesSold);
        current.proceeds = current.proceeds.plus(amounts.proceeds);
        current.costBasis = current.costBasis.plus(amounts.costBasis);
        current.realizedGain = current.realizedGain.plus(amounts.realizedGain);
        current.realizedGainPct = percentOf(current.realizedGain, current.costBasis);
        groups.set(key, current);
      }
      return Array.from(groups.values()).sort((a, b) => a.key.localeCompare(b.key));
    };

    const totalProceeds = sum(rows.map((row) => row.amounts.proceeds));
    const totalCostBasis = sum(rows.map((row) => row.amounts.costBasis));
    const totalRealizedGain = sum(rows.map((row) => row.amounts.realizedGain));

    // first occurrence wins ties, so best/worst are stable for a given ledger
    let best: (typeof rows)[number] | undefined;
    let worst: (typeof rows)[number] | undefined;
    for (const row of rows) {
      if (!best || row.amounts.realizedGainPct.greaterThan(best.amounts.realizedGainPct)) best = row;
      if (!worst || row.amounts.realizedGainPct.lessThan(worst.amounts.realizedGainPct)) worst = row;
    }

    return {
      reportingCurrency,
      saleCount: saleEvents.length,
      unavailableCount: saleEvents.length - rows.length,
      totalProceeds,
      totalCostBasis,
      totalRealizedGain,
      realizedGainPct: percentOf(totalRealizedGain, totalCostBasis),
      averageGainPct:
        rows.length > 0 ? divide(sum(rows.map((row) => row.amounts.realizedGainPct)), new Decimal(rows.length)) : ZERO,
      byAccount: group((event) => event.account),
      bySymbol: group((event) => event.symbol),
      byPeriod: group((event) => toPeriodKey(event.sellDate, period)),
      best: best?.event,
      worst: worst?.event,
    };
  }

  /**
   * Values open positions at current quotes, converted at the latest rate.
   * Positions without a quote stay in the output as PriceUnavailable and add nothing to totals.
   */
  async unrealizedSummary(
    openPositions: OpenPosition[],
    currentQuotes: Map<string, Availability<Quote>>,
    reportingCurrency: string,
    converter: AmountConverter = this.currency,
  ): Promise<UnrealizedSummary> {
    const positions = await Promise.all(
      openPositions.map((position) => this.valuePosition(position, currentQuotes.get(position.symbol), reportingCurrency, converter)),
    );

    const bySymbol = new Map<string, UnrealizedGroup>();
    let totalMarketValue = ZERO;
    let totalCostBasis = ZERO;
    let pricedCount = 0;

    for (const valuation of positions) {
      if (valuation.status !== 'Priced') continue;
      pricedCount += 1;
      totalMarketValue = totalMarketValue.plus(valuation.marketValue);
      totalCostBasis = totalCostBasis.plus(valuation.costBasis);

      const symbol = valuation.position.symbol;
      const current = bySymbol.get(symbol) ?? {
        symbol,
        shares: ZERO,
        marketValue: ZERO,
        costBasis: ZERO,
        unrealizedGain: ZERO,
      };
      current.shares = current.shares.plus(valuation.position.totalShares);
      current.marketValue = current.marketValue.plus(valuation.marketValue);
      current.costBasis = current.costBasis.plus(valuation.costBasis);
      current.unrealizedGain = current.unrealizedGain.plus(valuation.unrealizedGain);
      bySymbol.set(symbol, current);
    }

    const totalUnrealizedGain = totalMarketValue.minus(totalCostBasis);
    return {
      reportingCurrency,
      positions,
      pricedCount,
      unavailableCount: positions.length - pricedCount,
      totalMarketValue,
      totalCostBasis,
      totalUnrealizedGain,
      unrealizedGainPct: percentOf(totalUnrealizedGain, totalCostBasis),
      bySymbol: Array.from(bySymbol.values()).sort((a, b) => a.symbol.localeCompare(b.symbol)),
    };
  }

  /**
   * Compares a sale with holding the same shares until the current quote.
   * The hypothetical exit pays the same fee and is measured against the same cost basis.
   */
  async opportunityCost(
    saleEvent: SaleEvent,
    currentQuote: Availability<Quote> | undefined,
    reportingCurrency: string,
    converter: AmountConverter = this.currency,
  ): Promise<OpportunityCost> {
    if (!currentQuote || !isAvailable(currentQuote)) {
      return {
        status: 'QuoteUnavailable',
        sale: saleEvent,
        detail: currentQuote?.detail ?? `No quote requested for ${saleEvent.symbol}`,
      };
    }
    if (!isAvailable(saleEvent.reporting)) {
      return { status: 'ConversionUnavailable', sale: saleEvent, detail: saleEvent.reporting.detail };
    }

    const quote = currentQuote.value;
    const { costBasis, realizedGain } = saleEvent.reporting.value;
    // the sale fee is in the sale currency; take it out before converting
    const hypotheticalNative = saleEvent.sharesSold.times(quote.price);
    const [value, fee] = await Promise.all([
      converter.convert(hypotheticalNative, quote.currency, reportingCurrency, 'latest'),
      converter.convert(saleEvent.fee, saleEvent.currency, reportingCurrency, 'latest'),
    ]);
    const converted = allAvailable([value, fee]);
    if (!isAvailable(converted)) {
      return { status: 'ConversionUnavailable', sale: saleEvent, detail: converted.detail };
    }

    const [grossValue, feeValue] = converted.value;
    const hypotheticalProceeds = grossValue.minus(feeValue);
    const hypotheticalGain = hypotheticalProceeds.minus(costBasis);
    const delta = hypotheticalGain.minus(realizedGain);

    return {
      status: 'Evaluated',
      sale: saleEvent,
      currentPrice: quote,
      hypotheticalProceeds,
      hypotheticalGain,
      realizedGain,
      delta,
      verdict: this.verdictFor(delta, realizedGain),
    };
  }

  opportunitySummary(results: OpportunityCost[]): OpportunitySummary {
    const summary: OpportunitySummary = {
      evaluated: 0,
      unavailable: 0,
      soldTooEarly: 0,
      soldAtGoodTime: 0,
      soldTooLate: 0,
      totalDelta: ZERO,
    };
    for (const result of results) {
      if (result.status !== 'Evaluated') {
        summary.unavailable += 1;
        continue;
      }
      summary.evaluated += 1;
      summary.totalDelta = summary.totalDelta.plus(result.delta);
      if (result.verdict === TimingVerdict.SOLD_TOO_EARLY) summary.soldTooEarly += 1;
      else if (result.verdict === TimingVerdict.SOLD_AT_GOOD_TIME) summary.soldAtGoodTime += 1;
      else summary.soldTooLate += 1;
    }
    return summary;
  }

  /** Dividend income, each entry converted at its last payment date */
  async incomeSummary(
    dividends: DividendIncome[],
    reportingCurrency: string,
    converter: AmountConverter = this.currency,
  ): Promise<IncomeSummary> {
    const entries = await Promise.all(
      dividends.map(async (income) => ({
        income,
        converted: await converter.convert(income.amount, income.currency, reportingCurrency, income.lastPaymentDate),
      })),
    );
    const converted = entries.map((entry) => entry.converted).filter(isAvailable);
    return {
      reportingCurrency,
      entries,
      totalIncome: sum(converted.map((entry) => entry.value)),
      unavailableCount: entries.length - converted.length,
    };
  }

  private async valuePosition(
    position: OpenPosition,
    quote: Availability<Quote> | undefined,
    reportingCurrency: string,
    converter: AmountConverter,
  ): Promise<PositionValuation> {
    if (!quote || !isAvailable(quote)) {
      return {
        status: 'PriceUnavailable',
        position,
        detail: quote?.detail ?? `No quote requested for ${position.symbol}`,
      };
    }

    const [marketValue, ...costs] = await Promise.all([
      converter.convert(position.totalShares.times(quote.value.price), quote.value.currency, reportingCurrency, 'latest'),
      ...position.costBasis.map((cost) => converter.convert(cost.amount, cost.currency, reportingCurrency, 'latest')),
    ]);
    const convertedCosts = allAvailable(costs);
    if (!isAvailable(marketValue)) {
      return { status: 'ConversionUnavailable', position, detail: marketValue.detail };
    }
    if (!isAvailable(convertedCosts)) {
      return { status: 'ConversionUnavailable', position, detail: convertedCosts.detail };
    }

    const costBasis = sum(convertedCosts.value);
    const unrealizedGain = marketValue.value.minus(costBasis);
    return {
      status: 'Priced',
      position,
      quote: quote.value,
      marketValue: marketValue.value,
      costBasis,
      weightedAverageCost: divide(costBasis, position.totalShares),
      unrealizedGain,
      unrealizedGainPct: percentOf(unrealizedGain, costBasis),
    };
  }

  private verdictFor(delta: Decimal, realizedGain: Decimal): TimingVerdict {
    if (delta.greaterThan(0)) return TimingVerdict.SOLD_TOO_EARLY;
    return realizedGain.isNegative() ? TimingVerdict.SOLD_TOO_LATE : TimingVerdict.SOLD_AT_GOOD_TIME;
  }
}
