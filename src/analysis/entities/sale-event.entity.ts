import Decimal from 'decimal.js';
import { Availability } from '../../common/availability';

export interface MatchedLot {
  lotId: number;
  openDate: Date;
  sharesTaken: Decimal;
  unitCost: Decimal;
  currency: string;
  cost: Decimal;              // pro-rata lot cost, lot currency
}

// Sell matched against FIFO lots, amounts in the transaction currency.
export interface MatchedSale {
  index: number;
  sellDate: Date;
  account: string;
  symbol: string;
  sharesSold: Decimal;
  price: Decimal;
  fee: Decimal;
  currency: string;
  grossProceeds: Decimal;     // shares × price
  proceeds: Decimal;          // gross − fee
  matchedLots: MatchedLot[];
  weightedAverageCost?: Decimal;  // set when all matched lots are in the sale currency
}

export interface ReportingAmounts {
  currency: string;
  proceeds: Decimal;
  costBasis: Decimal;
  realizedGain: Decimal;
  realizedGainPct: Decimal;
}

export interface SaleEvent extends MatchedSale {
  reporting: Availability<ReportingAmounts>;
}

export interface DividendIncome {
  account: string;
  symbol: string;
  currency: string;
  amount: Decimal;            // Σ shares × price − fee
  payments: number;
  firstPaymentDate: Date;
  lastPaymentDate: Date;
}
