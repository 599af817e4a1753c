import { IsIn, IsOptional, Matches } from 'class-validator';

export class AnalysisQueryDto {
  @IsOptional()
  @Matches(/^[A-Za-z]{3}$|^[$€£¥]$/, { message: 'reportingCurrency must be an ISO currency code' })
  reportingCurrency?: string;

  @IsOptional()
  @IsIn(['year', 'month'])
  period?: 'year' | 'month';
}
