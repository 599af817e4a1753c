import { Transform, Type } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  ValidateNested,
} from 'class-validator';

const LEDGER_DATE = /^\d{1,2}-\d{1,2}-\d{4}$/;

// Portfolio file as written by hand: snake_case keys, day-month-year dates.
// Quantity rules (positive shares, non-negative fee) are enforced by the replay,
// which reports them with ledger context.
export class LedgerTransactionDto {
  @Matches(LEDGER_DATE, { message: 'date must be dd-mm-yyyy' })
  date!: string;

  @Transform(({ value }) => (typeof value === 'string' ? value.trim().toLowerCase() : value))
  @IsString()
  @IsIn(['buy', 'sell', 'dividend'])
  type!: string;

  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @IsOptional()
  @IsString()
  name?: string;

  @IsNumber()
  shares!: number;

  @IsNumber()
  price!: number;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  currency?: string;

  @IsOptional()
  @IsNumber()
  fee?: number;

  @IsOptional()
  @IsString()
  note?: string;
}

export class LedgerAccountDto {
  @IsString()
  @IsNotEmpty()
  account_name!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  currency?: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LedgerTransactionDto)
  transactions!: LedgerTransactionDto[];
}

export class LedgerInputDto {
  @IsOptional()
  @Matches(LEDGER_DATE, { message: 'updated_at must be dd-mm-yyyy' })
  updated_at?: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LedgerAccountDto)
  accounts!: LedgerAccountDto[];
}
