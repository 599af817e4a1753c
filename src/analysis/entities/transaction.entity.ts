import Decimal from 'decimal.js';

export enum TransactionType {
  BUY = 'buy',
  SELL = 'sell',
  DIVIDEND = 'dividend',
}

// Normalized ledger entry. Amounts are in `currency`.
export interface Transaction {
  index: number;              // position in the input ledger, used for stable ordering
  account: string;
  date: Date;
  type: TransactionType;
  symbol: string;             // trimmed, upper-case
  name?: string;
  shares: Decimal;
  price: Decimal;             // per share; dividend per share for dividends
  currency: string;           // ISO code
  fee: Decimal;
  note?: string;
}

export interface Ledger {
  updatedAt?: Date;
  accounts: { name: string; currency: string }[];
  transactions: Transaction[];
}
