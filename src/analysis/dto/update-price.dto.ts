import { IsString, IsNumber, IsPositive, IsNotEmpty, IsObject, IsOptional, Matches } from 'class-validator';

// Manual quote for a single symbol
export class UpdatePriceDto {
  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @IsNumber()
  @IsPositive()
  price!: number;

  @IsString()
  @IsNotEmpty()
  currency!: string;
}

// Manual quotes for several symbols in one currency
export class BulkUpdatePricesDto {
  @IsObject()
  prices!: Record<string, number>;   // { "POWL": 180, "AAPL": 190 }

  @IsString()
  @IsNotEmpty()
  currency!: string;
}

// Manual FX rate: 1 `from` = `rate` `to`, on `date` or for every date when omitted
export class UpdateRateDto {
  @IsString()
  @IsNotEmpty()
  from!: string;

  @IsString()
  @IsNotEmpty()
  to!: string;

  @IsNumber()
  @IsPositive()
  rate!: number;

  @IsOptional()
  @Matches(/^\d{1,2}-\d{1,2}-\d{4}$/, { message: 'date must be dd-mm-yyyy' })
  date?: string;
}
