import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { Ledger } from './entities/transaction.entity';
import { OpenPosition } from './entities/lot.entity';
import { SaleEvent } from './entities/sale-event.entity';
import { LedgerIssue, TransactionProcessorService } from './transaction-processor.service';
import {
  GainAnalyzerService,
  IncomeSummary,
  OpportunityCost,
  OpportunitySummary,
  RealizedSummary,
  SummaryPeriod,
  UnrealizedSummary,
} from './gain-analyzer.service';
import { LedgerLoaderService } from './ledger-loader.service';
import { QuoteService } from '../market-price/quote.service';
import { CurrencyService } from '../currency/currency.service';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { normalizeCurrency } from '../common/utils/currency.util';

export interface AnalysisOptions {
  reportingCurrency?: string;
  period?: SummaryPeriod;
}

export interface AnalysisResult {
  runId: string;
  generatedAt: Date;
  asOf?: Date;
  reportingCurrency: string;
  transactionCount: number;
  saleEvents: SaleEvent[];
  openPositions: OpenPosition[];
  realized: RealizedSummary;
  unrealized: UnrealizedSummary;
  opportunityCosts: OpportunityCost[];
  opportunity: OpportunitySummary;
  income: IncomeSummary;
  issues: LedgerIssue[];
}

/**
 * One analysis run: replay, then quotes and rates fetched concurrently
 * and memoized for the run.
 */
@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);

  constructor(
    private readonly loader: LedgerLoaderService,
    private readonly processor: TransactionProcessorService,
    private readonly analyzer: GainAnalyzerService,
    private readonly quotes: QuoteService,
    private readonly currency: CurrencyService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  /** Analyzes the configured portfolio file, or `path` when given */
  async analyzeFile(path: string = this.config.portfolioFile, options: AnalysisOptions = {}): Promise<AnalysisResult> {
    return this.analyze(await this.loader.fromFile(path), options);
  }

  async analyze(ledger: Ledger, options: AnalysisOptions = {}): Promise<AnalysisResult> {
    const runId = uuidv4();
    const reportingCurrency = normalizeCurrency(options.reportingCurrency ?? this.config.reportingCurrency);
    const converter = this.currency.session();

    const processed = await this.processor.process(ledger.transactions, reportingCurrency, converter, {
      continueOnError: this.config.continueOnLedgerError,
    });

    const symbols = [
      ...processed.openPositions.map((position) => position.symbol),
      ...processed.saleEvents.map((event) => event.symbol),
    ];
    const currentQuotes = await this.quotes.getQuotes(symbols, 'latest');

    const [unrealized, opportunityCosts, income] = await Promise.all([
      this.analyzer.unrealizedSummary(processed.openPositions, currentQuotes, reportingCurrency, converter),
      Promise.all(
        processed.saleEvents.map((event) =>
          this.analyzer.opportunityCost(event, currentQuotes.get(event.symbol), reportingCurrency, converter),
        ),
      ),
      this.analyzer.incomeSummary(processed.dividends, reportingCurrency, converter),
    ]);
    const realized = this.analyzer.realizedSummary(processed.saleEvents, reportingCurrency, options.period);

    this.logger.log(
      `Run ${runId}: ${ledger.transactions.length} transactions, ${processed.saleEvents.length} sales, ` +
        `${processed.openPositions.length} open positions, ${unrealized.unavailableCount} unpriced, ` +
        `${processed.issues.length} ledger issues (${reportingCurrency})`,
    );

    return {
      runId,
      generatedAt: new Date(),
      asOf: ledger.updatedAt,
      reportingCurrency,
      transactionCount: ledger.transactions.length,
      saleEvents: processed.saleEvents,
      openPositions: processed.openPositions,
      realized,
      unrealized,
      opportunityCosts,
      opportunity: this.analyzer.opportunitySummary(opportunityCosts),
      income,
      issues: processed.issues,
    };
  }
}
