import Decimal from 'decimal.js';

// Buy lot with its own cost basis. Only the Lot Tracker mutates sharesRemaining.
export interface Lot {
  id: number;                 // replay-local sequence number
  account: string;
  symbol: string;
  openDate: Date;
  originalShares: Decimal;
  sharesRemaining: Decimal;   // never negative; zero means inert
  unitCost: Decimal;          // per share including allocated fee, display only
  totalCost: Decimal;         // shares × price + fee, exact
  costRemaining: Decimal;     // share of totalCost not yet charged to sales
  currency: string;
}

export interface LotConsumption {
  lot: Readonly<Lot>;
  sharesTaken: Decimal;
  cost: Decimal;              // pro-rata share of totalCost; the last consumption takes the remainder
}

export interface CurrencyAmount {
  currency: string;
  amount: Decimal;
}

// Read-only holding snapshot for one (account, symbol).
export interface OpenPosition {
  account: string;
  symbol: string;
  lots: Readonly<Lot>[];                    // open lots, oldest first
  totalShares: Decimal;
  costBasis: CurrencyAmount[];              // one entry per lot currency
  weightedAverageCost?: CurrencyAmount;     // only when lots share one currency
  reliable: boolean;
}
