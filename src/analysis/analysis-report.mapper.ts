import Decimal from 'decimal.js';
import { AnalysisResult } from './analysis.service';
import { OpenPosition } from './entities/lot.entity';
import { SaleEvent } from './entities/sale-event.entity';
import { GainGroup, OpportunityCost, PositionValuation, RealizedSummary } from './gain-analyzer.service';
import {
  AnalysisResponseDto,
  GainGroupDto,
  OpenPositionDto,
  OpportunityCostDto,
  PositionValuationDto,
  QuoteDto,
  RealizedSummaryDto,
  SaleEventDto,
  SaleRefDto,
} from './dto/analysis-response.dto';
import { Quote } from '../market-price/quote-provider.interface';
import { mapAvailable } from '../common/availability';
import { toNumber } from '../common/utils/decimal.util';
import { toDateKey } from '../common/utils/date.util';

// Decimal/Date domain objects → plain JSON for the report consumer.

function toQuoteDto(quote: Quote): QuoteDto {
  return {
    price: toNumber(quote.price),
    currency: quote.currency,
    timestamp: quote.timestamp.toISOString(),
    source: quote.source,
  };
}

function toSaleRef(event: SaleEvent): SaleRefDto {
  return {
    index: event.index,
    account: event.account,
    symbol: event.symbol,
    sellDate: toDateKey(event.sellDate),
    realizedGainPct: mapAvailable(event.reporting, (amounts) => toNumber(amounts.realizedGainPct)),
  };
}

export function toSaleEventDto(event: SaleEvent): SaleEventDto {
  return {
    index: event.index,
    sellDate: toDateKey(event.sellDate),
    account: event.account,
    symbol: event.symbol,
    sharesSold: toNumber(event.sharesSold),
    price: toNumber(event.price),
    fee: toNumber(event.fee),
    currency: event.currency,
    grossProceeds: toNumber(event.grossProceeds),
    proceeds: toNumber(event.proceeds),
    weightedAverageCost: event.weightedAverageCost ? toNumber(event.weightedAverageCost) : undefined,
    matchedLots: event.matchedLots.map((lot) => ({
      lotId: lot.lotId,
      openDate: toDateKey(lot.openDate),
      sharesTaken: toNumber(lot.sharesTaken),
      unitCost: toNumber(lot.unitCost),
      currency: lot.currency,
      cost: toNumber(lot.cost),
    })),
    reporting: mapAvailable(event.reporting, (amounts) => ({
      currency: amounts.currency,
      proceeds: toNumber(amounts.proceeds),
      costBasis: toNumber(amounts.costBasis),
      realizedGain: toNumber(amounts.realizedGain),
      realizedGainPct: toNumber(amounts.realizedGainPct),
    })),
  };
}

export function toOpenPositionDto(position: OpenPosition): OpenPositionDto {
  const amount = (value: { currency: string; amount: Decimal }) => ({
    currency: value.currency,
    amount: toNumber(value.amount),
  });
  return {
    account: position.account,
    symbol: position.symbol,
    totalShares: toNumber(position.totalShares),
    costBasis: position.costBasis.map(amount),
    weightedAverageCost: position.weightedAverageCost ? amount(position.weightedAverageCost) : undefined,
    reliable: position.reliable,
    lots: position.lots.map((lot) => ({
      lotId: lot.id,
      openDate: toDateKey(lot.openDate),
      originalShares: toNumber(lot.originalShares),
      sharesRemaining: toNumber(lot.sharesRemaining),
      unitCost: toNumber(lot.unitCost),
      currency: lot.currency,
    })),
  };
}

function toGainGroupDto(group: GainGroup): GainGroupDto {
  return {
    key: group.key,
    sales: group.sales,
    shares: toNumber(group.shares),
    proceeds: toNumber(group.proceeds),
    costBasis: toNumber(group.costBasis),
    realizedGain: toNumber(group.realizedGain),
    realizedGainPct: toNumber(group.realizedGainPct),
  };
}

function toRealizedSummaryDto(summary: RealizedSummary): RealizedSummaryDto {
  return {
    reportingCurrency: summary.reportingCurrency,
    saleCount: summary.saleCount,
    unavailableCount: summary.unavailableCount,
    totalProceeds: toNumber(summary.totalProceeds),
    totalCostBasis: toNumber(summary.totalCostBasis),
    totalRealizedGain: toNumber(summary.totalRealizedGain),
    realizedGainPct: toNumber(summary.realizedGainPct),
    averageGainPct: toNumber(summary.averageGainPct),
    byAccount: summary.byAccount.map(toGainGroupDto),
    bySymbol: summary.bySymbol.map(toGainGroupDto),
    byPeriod: summary.byPeriod.map(toGainGroupDto),
    best: summary.best ? toSaleRef(summary.best) : undefined,
    worst: summary.worst ? toSaleRef(summary.worst) : undefined,
  };
}

function toPositionValuationDto(valuation: PositionValuation): PositionValuationDto {
  const base = {
    account: valuation.position.account,
    symbol: valuation.position.symbol,
    shares: toNumber(valuation.position.totalShares),
  };
  if (valuation.status !== 'Priced') {
    return { status: valuation.status, ...base, detail: valuation.detail };
  }
  return {
    status: 'Priced',
    ...base,
    currentPrice: toQuoteDto(valuation.quote),
    marketValue: toNumber(valuation.marketValue),
    costBasis: toNumber(valuation.costBasis),
    weightedAverageCost: toNumber(valuation.weightedAverageCost),
    unrealizedGain: toNumber(valuation.unrealizedGain),
    unrealizedGainPct: toNumber(valuation.unrealizedGainPct),
  };
}

function toOpportunityCostDto(result: OpportunityCost): OpportunityCostDto {
  if (result.status !== 'Evaluated') {
    return { status: result.status, sale: toSaleRef(result.sale), detail: result.detail };
  }
  return {
    status: 'Evaluated',
    sale: toSaleRef(result.sale),
    currentPrice: toQuoteDto(result.currentPrice),
    hypotheticalProceeds: toNumber(result.hypotheticalProceeds),
    hypotheticalGain: toNumber(result.hypotheticalGain),
    realizedGain: toNumber(result.realizedGain),
    delta: toNumber(result.delta),
    verdict: result.verdict,
  };
}

export function toAnalysisResponse(result: AnalysisResult): AnalysisResponseDto {
  const { unrealized, opportunity, income } = result;
  return {
    runId: result.runId,
    generatedAt: result.generatedAt.toISOString(),
    asOf: result.asOf ? toDateKey(result.asOf) : undefined,
    reportingCurrency: result.reportingCurrency,
    transactionCount: result.transactionCount,
    saleEvents: result.saleEvents.map(toSaleEventDto),
    openPositions: result.openPositions.map(toOpenPositionDto),
    realized: toRealizedSummaryDto(result.realized),
    unrealized: {
      reportingCurrency: unrealized.reportingCurrency,
      positions: unrealized.positions.map(toPositionValuationDto),
      pricedCount: unrealized.pricedCount,
      unavailableCount: unrealized.unavailableCount,
      totalMarketValue: toNumber(unrealized.totalMarketValue),
      totalCostBasis: toNumber(unrealized.totalCostBasis),
      totalUnrealizedGain: toNumber(unrealized.totalUnrealizedGain),
      unrealizedGainPct: toNumber(unrealized.unrealizedGainPct),
      bySymbol: unrealized.bySymbol.map((group) => ({
        symbol: group.symbol,
        shares: toNumber(group.shares),
        marketValue: toNumber(group.marketValue),
        costBasis: toNumber(group.costBasis),
        unrealizedGain: toNumber(group.unrealizedGain),
      })),
    },
    opportunityCosts: result.opportunityCosts.map(toOpportunityCostDto),
    opportunity: { ...opportunity, totalDelta: toNumber(opportunity.totalDelta) },
    income: {
      reportingCurrency: income.reportingCurrency,
      entries: income.entries.map(({ income: entry, converted }) => ({
        account: entry.account,
        symbol: entry.symbol,
        currency: entry.currency,
        amount: toNumber(entry.amount),
        payments: entry.payments,
        firstPaymentDate: toDateKey(entry.firstPaymentDate),
        lastPaymentDate: toDateKey(entry.lastPaymentDate),
        converted: mapAvailable(converted, toNumber),
      })),
      totalIncome: toNumber(income.totalIncome),
      unavailableCount: income.unavailableCount,
    },
    issues: result.issues.map((issue) => ({
      code: issue.code,
      message: issue.message,
      account: issue.context.account,
      symbol: issue.context.symbol,
      date: issue.context.date ? toDateKey(issue.context.date) : undefined,
      index: issue.context.index,
    })),
  };
}
