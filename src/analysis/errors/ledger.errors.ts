import Decimal from 'decimal.js';
import { Transaction } from '../entities/transaction.entity';

export interface LedgerErrorContext {
  account: string;
  symbol: string;
  date?: Date;
  index?: number;
  transaction?: Transaction;
}

// Structural ledger problems. These are never absorbed into a result status.
export abstract class LedgerError extends Error {
  abstract readonly code: string;

  constructor(message: string, readonly context: LedgerErrorContext, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MalformedLedgerError extends LedgerError {
  readonly code: string = 'MalformedLedger';
}

/** Non-positive shares/price or negative fee. */
export class InvalidQuantityError extends MalformedLedgerError {
  readonly code: string = 'InvalidQuantity';
}

/** Raised by the Lot Tracker when a consumption exceeds the open shares. */
export class InsufficientSharesError extends LedgerError {
  readonly code: string = 'InsufficientShares';

  constructor(
    context: LedgerErrorContext,
    readonly requested: Decimal,
    readonly available: Decimal,
  ) {
    super(
      `Insufficient shares for ${context.symbol} in ${context.account}. Available: ${available.toString()}, Requested: ${requested.toString()}`,
      context,
    );
  }
}
