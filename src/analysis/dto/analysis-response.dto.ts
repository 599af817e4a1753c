import { Availability } from '../../common/availability';

// JSON view of an analysis run. Amounts are numbers rounded to 8 dp;
// missing data is always an explicit status, never null or zero.

export interface AmountDto {
  currency: string;
  amount: number;
}

export interface MatchedLotDto {
  lotId: number;
  openDate: string;        // yyyy-MM-dd
  sharesTaken: number;
  unitCost: number;
  currency: string;
  cost: number;
}

export interface ReportingAmountsDto {
  currency: string;
  proceeds: number;
  costBasis: number;
  realizedGain: number;
  realizedGainPct: number;
}

// One sell matched against FIFO lots
export interface SaleEventDto {
  index: number;
  sellDate: string;
  account: string;
  symbol: string;
  sharesSold: number;
  price: number;
  fee: number;
  currency: string;
  grossProceeds: number;
  proceeds: number;                 // gross − fee
  weightedAverageCost?: number;      // only when lots and sale share a currency
  matchedLots: MatchedLotDto[];
  reporting: Availability<ReportingAmountsDto>;
}

export interface OpenLotDto {
  lotId: number;
  openDate: string;
  originalShares: number;
  sharesRemaining: number;
  unitCost: number;
  currency: string;
}

export interface OpenPositionDto {
  account: string;
  symbol: string;
  totalShares: number;
  costBasis: AmountDto[];
  weightedAverageCost?: AmountDto;
  reliable: boolean;
  lots: OpenLotDto[];
}

export interface GainGroupDto {
  key: string;
  sales: number;
  shares: number;
  proceeds: number;
  costBasis: number;
  realizedGain: number;
  realizedGainPct: number;
}

export interface SaleRefDto {
  index: number;
  account: string;
  symbol: string;
  sellDate: string;
  realizedGainPct: Availability<number>;
}

export interface RealizedSummaryDto {
  reportingCurrency: string;
  saleCount: number;
  unavailableCount: number;
  totalProceeds: number;
  totalCostBasis: number;
  totalRealizedGain: number;
  realizedGainPct: number;
  averageGainPct: number;
  byAccount: GainGroupDto[];
  bySymbol: GainGroupDto[];
  byPeriod: GainGroupDto[];
  best?: SaleRefDto;
  worst?: SaleRefDto;
}

export interface QuoteDto {
  price: number;
  currency: string;
  timestamp: string;
  source: string;
}

export type PositionValuationDto =
  | {
      status: 'Priced';
      account: string;
      symbol: string;
      shares: number;
      currentPrice: QuoteDto;
      marketValue: number;
      costBasis: number;
      weightedAverageCost: number;
      unrealizedGain: number;
      unrealizedGainPct: number;
    }
  | {
      status: 'PriceUnavailable' | 'ConversionUnavailable';
      account: string;
      symbol: string;
      shares: number;
      detail: string;
    };

export interface UnrealizedGroupDto {
  symbol: string;
  shares: number;
  marketValue: number;
  costBasis: number;
  unrealizedGain: number;
}

export interface UnrealizedSummaryDto {
  reportingCurrency: string;
  positions: PositionValuationDto[];
  pricedCount: number;
  unavailableCount: number;
  totalMarketValue: number;
  totalCostBasis: number;
  totalUnrealizedGain: number;
  unrealizedGainPct: number;
  bySymbol: UnrealizedGroupDto[];
}

export type OpportunityCostDto =
  | {
      status: 'Evaluated';
      sale: SaleRefDto;
      currentPrice: QuoteDto;
      hypotheticalProceeds: number;
      hypotheticalGain: number;
      realizedGain: number;
      delta: number;
      verdict: string;
    }
  | { status: 'QuoteUnavailable' | 'ConversionUnavailable'; sale: SaleRefDto; detail: string };

export interface OpportunitySummaryDto {
  evaluated: number;
  unavailable: number;
  soldTooEarly: number;
  soldAtGoodTime: number;
  soldTooLate: number;
  totalDelta: number;
}

export interface IncomeEntryDto {
  account: string;
  symbol: string;
  currency: string;
  amount: number;
  payments: number;
  firstPaymentDate: string;
  lastPaymentDate: string;
  converted: Availability<number>;
}

export interface IncomeSummaryDto {
  reportingCurrency: string;
  entries: IncomeEntryDto[];
  totalIncome: number;
  unavailableCount: number;
}

export interface LedgerIssueDto {
  code: string;
  message: string;
  account: string;
  symbol: string;
  date?: string;
  index?: number;
}

// Complete analysis run
export interface AnalysisResponseDto {
  runId: string;
  generatedAt: string;
  asOf?: string;                 // portfolio updated_at
  reportingCurrency: string;
  transactionCount: number;
  saleEvents: SaleEventDto[];
  openPositions: OpenPositionDto[];
  realized: RealizedSummaryDto;
  unrealized: UnrealizedSummaryDto;
  opportunityCosts: OpportunityCostDto[];
  opportunity: OpportunitySummaryDto;
  income: IncomeSummaryDto;
  issues: LedgerIssueDto[];
}
