import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { readFile } from 'fs/promises';
import { LedgerInputDto } from './dto/ledger-input.dto';
import { Ledger, Transaction, TransactionType } from './entities/transaction.entity';
import { parseLedgerDate } from '../common/utils/date.util';
import { normalizeCurrency } from '../common/utils/currency.util';
import { toDecimal } from '../common/utils/decimal.util';

const DEFAULT_CURRENCY = 'USD';

/**
 * Turns a portfolio document (`accounts[].transactions[]`) into a normalized Ledger.
 * Shape problems are 400s; quantity problems are left to the replay.
 */
@Injectable()
export class LedgerLoaderService {
  private readonly logger = new Logger(LedgerLoaderService.name);

  async fromFile(path: string): Promise<Ledger> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new BadRequestException(`Cannot read portfolio file ${path}: ${detail}`);
    }
    const ledger = this.fromDocument(raw);
    this.logger.log(`Loaded ${ledger.transactions.length} transactions from ${path}`);
    return ledger;
  }

  fromDocument(raw: unknown): Ledger {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new BadRequestException('Portfolio document must be a JSON object');
    }

    const dto = plainToInstance(LedgerInputDto, raw);
    const errors = validateSync(dto);
    if (errors.length > 0) {
      throw new BadRequestException(this.flatten(errors));
    }
    return this.normalize(dto);
  }

  /** Expects an already validated document */
  normalize(dto: LedgerInputDto): Ledger {
    const transactions: Transaction[] = [];
    const problems: string[] = [];

    const accounts = dto.accounts.map((account) => ({
      name: account.account_name.trim(),
      currency: normalizeCurrency(account.currency ?? DEFAULT_CURRENCY),
    }));

    dto.accounts.forEach((account, a) => {
      const { name, currency: accountCurrency } = accounts[a];

      account.transactions.forEach((input, t) => {
        const index = transactions.length;
        const date = parseLedgerDate(input.date);
        if (!date) {
          problems.push(`accounts.${a}.transactions.${t}.date: ${input.date} is not a calendar date`);
          return;
        }

        transactions.push({
          index,
          account: name,
          date,
          type: this.toType(input.type),
          symbol: input.symbol.trim().toUpperCase(),
          name: input.name,
          shares: toDecimal(input.shares),
          price: toDecimal(input.price),
          currency: input.currency ? normalizeCurrency(input.currency) : accountCurrency,
          fee: toDecimal(input.fee ?? 0),
          note: input.note,
        });
      });
    });

    const updatedAt = dto.updated_at ? parseLedgerDate(dto.updated_at) : undefined;
    if (dto.updated_at && !updatedAt) {
      problems.push(`updated_at: ${dto.updated_at} is not a calendar date`);
    }
    if (problems.length > 0) {
      throw new BadRequestException(problems);
    }

    return { updatedAt, accounts, transactions };
  }

  private toType(value: string): TransactionType {
    switch (value.toLowerCase()) {
      case 'buy':
        return TransactionType.BUY;
      case 'sell':
        return TransactionType.SELL;
      case 'dividend':
        return TransactionType.DIVIDEND;
      default:
        throw new BadRequestException(`Unknown transaction type: ${value}`);
    }
  }

  private flatten(errors: ValidationError[], prefix = ''): string[] {
    return errors.flatMap((error) => {
      const path = prefix ? `${prefix}.${error.property}` : error.property;
      const own = Object.values(error.constraints ?? {}).map((message) => `${path}: ${message}`);
      return [...own, ...this.flatten(error.children ?? [], path)];
    });
  }
}
