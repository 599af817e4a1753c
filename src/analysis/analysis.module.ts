import { Module } from '@nestjs/common';
import { AnalysisController } from './analysis.controller';
import { AnalysisService } from './analysis.service';
import { GainAnalyzerService } from './gain-analyzer.service';
import { LedgerLoaderService } from './ledger-loader.service';
import { TransactionProcessorService } from './transaction-processor.service';
import { MarketPriceModule } from '../market-price/market-price.module';
import { CurrencyModule } from '../currency/currency.module';

@Module({
  imports: [MarketPriceModule, CurrencyModule],
  controllers: [AnalysisController],
  providers: [
    LedgerLoaderService,
    TransactionProcessorService,  // replay: lots, sales, dividends
    GainAnalyzerService,          // realized / unrealized / opportunity views
    AnalysisService,
  ],
})
export class AnalysisModule {}
