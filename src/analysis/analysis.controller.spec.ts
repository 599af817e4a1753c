import { Test, TestingModule } from '@nestjs/testing';
import { plainToInstance } from 'class-transformer';
import { AnalysisController } from './analysis.controller';
import { AnalysisService } from './analysis.service';
import { LedgerLoaderService } from './ledger-loader.service';
import { TransactionProcessorService } from './transaction-processor.service';
import { GainAnalyzerService, TimingVerdict } from './gain-analyzer.service';
import { LedgerInputDto } from './dto/ledger-input.dto';
import { MalformedLedgerError } from './errors/ledger.errors';
import { MarketPriceService } from '../market-price/market-price.service';
import { QuoteService } from '../market-price/quote.service';
import { CurrencyService } from '../currency/currency.service';
import { ManualRateService } from '../currency/manual-rate.service';
import { APP_CONFIG, AppConfig } from '../config/app.config';

const testConfig: AppConfig = {
  port: 3000,
  reportingCurrency: 'USD',
  portfolioFile: 'data/portfolio.json',
  quoteSource: 'none',
  fxSource: 'none',
  fxBaseUrl: 'http://localhost',
  lookupTimeoutMs: 100,
  continueOnLedgerError: false,
};

describe('AnalysisController', () => {
  let controller: AnalysisController;
  let marketPrices: MarketPriceService;

  const powlLedger = (sellShares = 7) =>
    plainToInstance(LedgerInputDto, {
      accounts: [
        {
          account_name: 'Brokerage',
          currency: 'USD',
          transactions: [
            { date: '03-03-2025', type: 'Buy', symbol: 'POWL', shares: 5, price: 161.72, fee: 0 },
            { date: '01-04-2025', type: 'Buy', symbol: 'POWL', shares: 5, price: 170, fee: 0 },
            { date: '01-05-2025', type: 'Sell', symbol: 'POWL', shares: sellShares, price: 180, fee: 5 },
          ],
        },
      ],
    });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [AnalysisController],
      providers: [
        AnalysisService,
        LedgerLoaderService,
        TransactionProcessorService,
        GainAnalyzerService,
        MarketPriceService,
        QuoteService,
        CurrencyService,
        ManualRateService,
        { provide: APP_CONFIG, useValue: testConfig },
      ],
    }).compile();

    controller = module.get<AnalysisController>(AnalysisController);
    marketPrices = module.get<MarketPriceService>(MarketPriceService);
  });

  afterEach(() => {
    marketPrices.clearAllPrices();
  });

  describe('analyze', () => {
    it('should report the realized gain of a partial-lot sale', async () => {
      const report = await controller.analyze(powlLedger(), {});

      expect(report.reportingCurrency).toBe('USD');
      expect(report.transactionCount).toBe(3);
      expect(report.saleEvents).toHaveLength(1);
      expect(report.saleEvents[0].matchedLots.map((lot) => [lot.openDate, lot.sharesTaken, lot.unitCost])).toEqual([
        ['2025-03-03', 5, 161.72],
        ['2025-04-01', 2, 170],
      ]);
      expect(report.saleEvents[0].reporting).toEqual({
        status: 'available',
        value: {
          currency: 'USD',
          proceeds: 1255,
          costBasis: 1148.6,
          realizedGain: 106.4,
          realizedGainPct: 9.26345116,
        },
      });
      expect(report.realized.totalRealizedGain).toBe(106.4);
      expect(report.openPositions[0].totalShares).toBe(3);
      expect(report.openPositions[0].lots[0].unitCost).toBe(170);
    });

    it('should value open positions and opportunity cost with a manual price', async () => {
      marketPrices.updatePrice('POWL', 200, 'USD');

      const report = await controller.analyze(powlLedger(), {});

      expect(report.unrealized.totalMarketValue).toBe(600);
      expect(report.unrealized.totalCostBasis).toBe(510);
      expect(report.unrealized.totalUnrealizedGain).toBe(90);
      expect(report.opportunityCosts[0]).toMatchObject({
        status: 'Evaluated',
        hypotheticalProceeds: 1395,
        hypotheticalGain: 246.4,
        delta: 140,
        verdict: TimingVerdict.SOLD_TOO_EARLY,
      });
      expect(report.opportunity.soldTooEarly).toBe(1);
    });

    it('should call a break-even sale well timed when the price has fallen', async () => {
      marketPrices.updatePrice('AAPL', 10, 'USD');
      const ledger = plainToInstance(LedgerInputDto, {
        accounts: [
          {
            account_name: 'Brokerage',
            transactions: [
              { date: '02-01-2024', type: 'Buy', symbol: 'AAPL', shares: 3, price: 10, fee: 2 },
              { date: '01-02-2024', type: 'Sell', symbol: 'AAPL', shares: 3, price: 10.67, fee: 0.01 },
            ],
          },
        ],
      });

      const report = await controller.analyze(ledger, {});

      expect(report.saleEvents[0].reporting).toMatchObject({ status: 'available', value: { realizedGain: 0 } });
      expect(report.opportunityCosts[0]).toMatchObject({
        status: 'Evaluated',
        delta: -2.01,
        verdict: TimingVerdict.SOLD_AT_GOOD_TIME,
      });
    });

    it('should tag positions without a quote as PriceUnavailable', async () => {
      const report = await controller.analyze(powlLedger(), {});

      expect(report.unrealized.positions).toEqual([
        { status: 'PriceUnavailable', account: 'Brokerage', symbol: 'POWL', shares: 3, detail: 'No quote source for POWL@latest' },
      ]);
      expect(report.unrealized.totalMarketValue).toBe(0);
      expect(report.opportunityCosts[0].status).toBe('QuoteUnavailable');
    });

    it('should reject an oversold ledger', async () => {
      await expect(controller.analyze(powlLedger(11), {})).rejects.toThrow(MalformedLedgerError);
    });
  });

  describe('market prices', () => {
    it('should update and list manual prices', () => {
      const result = controller.updatePrice({ symbol: 'POWL', price: 200, currency: 'USD' });

      expect(result.message).toBe('Price updated for POWL');
      expect(controller.getMarketPrices().prices).toEqual({ POWL: { price: 200, currency: 'USD' } });
    });

    it('should apply bulk updates', () => {
      const result = controller.bulkUpdatePrices({ prices: { AAPL: 190, MSFT: 410 }, currency: 'usd' });

      expect(result.updatedSymbols).toEqual(['AAPL', 'MSFT']);
      expect(controller.getMarketPrices().prices.MSFT).toEqual({ price: 410, currency: 'USD' });
    });

    it('should reject a bulk update with any invalid price', () => {
      expect(() => controller.bulkUpdatePrices({ prices: { AAPL: 190, MSFT: -1 }, currency: 'USD' })).toThrow(
        'Price must be positive, got -1 for MSFT',
      );
      expect(controller.getMarketPrices().prices).toEqual({});
    });
  });

  describe('fx rates', () => {
    it('should store a rate for a single day', () => {
      const result = controller.updateRate({ from: 'EUR', to: 'USD', rate: 1.2, date: '02-01-2024' });

      expect(result.message).toBe('Rate updated for EUR/USD on 02-01-2024');
      expect(result.rates).toEqual({ 'EUR/USD@2024-01-02': 1.2 });
    });

    it('should reject a rate date that does not exist', () => {
      expect(() => controller.updateRate({ from: 'EUR', to: 'USD', rate: 1.2, date: '30-02-2024' })).toThrow(
        'date: 30-02-2024 is not a calendar date',
      );
    });

    it('should use a manual rate for foreign sales', async () => {
      controller.updateRate({ from: 'EUR', to: 'USD', rate: 1.1 });
      const ledger = plainToInstance(LedgerInputDto, {
        accounts: [
          {
            account_name: 'Euro Depot',
            currency: 'EUR',
            transactions: [
              { date: '10-02-2025', type: 'buy', symbol: 'ASML', shares: 2, price: 600 },
              { date: '20-05-2025', type: 'sell', symbol: 'ASML', shares: 2, price: 700 },
            ],
          },
        ],
      });

      const report = await controller.analyze(ledger, { reportingCurrency: 'usd' });

      expect(report.saleEvents[0].reporting).toMatchObject({
        status: 'available',
        value: { currency: 'USD', proceeds: 1540, costBasis: 1320, realizedGain: 220 },
      });
    });
  });
});
