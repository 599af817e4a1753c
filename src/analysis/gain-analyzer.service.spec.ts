import { Test, TestingModule } from '@nestjs/testing';
import Decimal from 'decimal.js';
import { GainAnalyzerService, TimingVerdict } from './gain-analyzer.service';
import { LotTracker } from './lot-tracker';
import { SaleEvent } from './entities/sale-event.entity';
import { CurrencyService } from '../currency/currency.service';
import { ManualRateService } from '../currency/manual-rate.service';
import { Quote } from '../market-price/quote-provider.interface';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { Availability, available, unavailable } from '../common/availability';

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

describe('GainAnalyzerService', () => {
  let service: GainAnalyzerService;
  let manualRates: ManualRateService;

  const dec = (value: number) => new Decimal(value);

  const quote = (symbol: string, price: number, currency = 'USD'): Availability<Quote> =>
    available({ symbol, price: dec(price), currency, timestamp: new Date(2024, 5, 1), source: 'manual' });

  // A sale of `shares` with the given USD proceeds and cost basis
  const saleEvent = (
    index: number,
    options: { account?: string; symbol?: string; sellDate?: Date; shares?: number; proceeds: number; cost: number; fee?: number },
  ): SaleEvent => {
    const shares = dec(options.shares ?? 10);
    const fee = dec(options.fee ?? 0);
    const proceeds = dec(options.proceeds);
    const cost = dec(options.cost);
    const realizedGain = proceeds.minus(cost);
    return {
      index,
      sellDate: options.sellDate ?? new Date(2024, 2, 1),
      account: options.account ?? 'Main',
      symbol: options.symbol ?? 'AAPL',
      sharesSold: shares,
      price: proceeds.plus(fee).dividedBy(shares),
      fee,
      currency: 'USD',
      grossProceeds: proceeds.plus(fee),
      proceeds,
      matchedLots: [],
      reporting: available({
        currency: 'USD',
        proceeds,
        costBasis: cost,
        realizedGain,
        realizedGainPct: realizedGain.dividedBy(cost).times(100),
      }),
    };
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [GainAnalyzerService, CurrencyService, ManualRateService, { provide: APP_CONFIG, useValue: testConfig }],
    }).compile();

    service = module.get<GainAnalyzerService>(GainAnalyzerService);
    manualRates = module.get<ManualRateService>(ManualRateService);
  });

  describe('realizedSummary', () => {
    it('should total sales and group them by account, symbol and year', () => {
      const events = [
        saleEvent(0, { account: 'Main', symbol: 'AAPL', sellDate: new Date(2023, 5, 1), proceeds: 1200, cost: 1000 }),
        saleEvent(1, { account: 'Roth', symbol: 'AAPL', sellDate: new Date(2024, 1, 1), proceeds: 450, cost: 500 }),
        saleEvent(2, { account: 'Main', symbol: 'MSFT', sellDate: new Date(2024, 3, 1), proceeds: 330, cost: 300 }),
      ];

      const summary = service.realizedSummary(events, 'USD');

      expect(summary.saleCount).toBe(3);
      expect(summary.unavailableCount).toBe(0);
      expect(summary.totalProceeds.toString()).toBe('1980');
      expect(summary.totalCostBasis.toString()).toBe('1800');
      expect(summary.totalRealizedGain.toString()).toBe('180');
      expect(summary.realizedGainPct.toString()).toBe('10');
      expect(summary.averageGainPct.toNumber()).toBeCloseTo(6.667, 3);
      expect(summary.byAccount.map((g) => [g.key, g.sales, g.realizedGain.toNumber()])).toEqual([
        ['Main', 2, 230],
        ['Roth', 1, -50],
      ]);
      expect(summary.bySymbol.map((g) => [g.key, g.realizedGain.toNumber()])).toEqual([
        ['AAPL', 150],
        ['MSFT', 30],
      ]);
      expect(summary.byPeriod.map((g) => g.key)).toEqual(['2023', '2024']);
      expect(summary.best?.index).toBe(0);
      expect(summary.worst?.index).toBe(1);
    });

    it('should group by month when asked', () => {
      const events = [
        saleEvent(0, { sellDate: new Date(2024, 0, 5), proceeds: 110, cost: 100 }),
        saleEvent(1, { sellDate: new Date(2024, 0, 20), proceeds: 120, cost: 100 }),
      ];

      const summary = service.realizedSummary(events, 'USD', 'month');

      expect(summary.byPeriod.map((g) => [g.key, g.sales])).toEqual([['2024-01', 2]]);
    });

    it('should count sales without a reporting amount and leave them out of totals', () => {
      const events: SaleEvent[] = [
        saleEvent(0, { proceeds: 1200, cost: 1000 }),
        { ...saleEvent(1, { proceeds: 500, cost: 100 }), reporting: unavailable('ConversionUnavailable', 'EUR/USD') },
      ];

      const summary = service.realizedSummary(events, 'USD');

      expect(summary.unavailableCount).toBe(1);
      expect(summary.totalRealizedGain.toString()).toBe('200');
    });

    it('should return zeroes for an empty ledger', () => {
      const summary = service.realizedSummary([], 'USD');

      expect(summary.totalRealizedGain.isZero()).toBe(true);
      expect(summary.realizedGainPct.isZero()).toBe(true);
      expect(summary.best).toBeUndefined();
    });
  });

  describe('unrealizedSummary', () => {
    it('should value priced positions and keep unpriced ones out of totals', async () => {
      const tracker = new LotTracker();
      tracker.openLot('Main', 'AAPL', new Date(2024, 0, 1), dec(10), dec(100), 'USD');
      tracker.openLot('Main', 'DELIST', new Date(2024, 0, 1), dec(5), dec(20), 'USD');
      const quotes = new Map<string, Availability<Quote>>([
        ['AAPL', quote('AAPL', 120)],
        ['DELIST', unavailable('QuoteUnavailable', 'No quote source for DELIST@latest')],
      ]);

      const summary = await service.unrealizedSummary(tracker.openPositions(), quotes, 'USD');

      expect(summary.pricedCount).toBe(1);
      expect(summary.unavailableCount).toBe(1);
      expect(summary.totalMarketValue.toString()).toBe('1200');
      expect(summary.totalCostBasis.toString()).toBe('1000');
      expect(summary.totalUnrealizedGain.toString()).toBe('200');
      expect(summary.unrealizedGainPct.toString()).toBe('20');
      expect(summary.positions[1]).toMatchObject({
        status: 'PriceUnavailable',
        detail: 'No quote source for DELIST@latest',
      });
    });

    it('should convert foreign positions at the latest rate', async () => {
      manualRates.setRate('EUR', 'USD', 1.1);
      const tracker = new LotTracker();
      tracker.openLot('Main', 'ASML', new Date(2024, 0, 1), dec(2), dec(600), 'EUR');
      const quotes = new Map([['ASML', quote('ASML', 700, 'EUR')]]);

      const summary = await service.unrealizedSummary(tracker.openPositions(), quotes, 'USD');

      const [position] = summary.positions;
      expect(position.status).toBe('Priced');
      if (position.status === 'Priced') {
        expect(position.marketValue.toString()).toBe('1540');
        expect(position.costBasis.toString()).toBe('1320');
        expect(position.weightedAverageCost.toString()).toBe('660');
      }
    });

    it('should report ConversionUnavailable when the quote currency cannot be converted', async () => {
      const tracker = new LotTracker();
      tracker.openLot('Main', 'ASML', new Date(2024, 0, 1), dec(2), dec(600), 'EUR');
      const quotes = new Map([['ASML', quote('ASML', 700, 'EUR')]]);

      const summary = await service.unrealizedSummary(tracker.openPositions(), quotes, 'USD');

      expect(summary.positions[0]).toMatchObject({
        status: 'ConversionUnavailable',
        detail: 'No rate source for EUR/USD@latest',
      });
      expect(summary.totalMarketValue.isZero()).toBe(true);
    });
  });

  describe('opportunityCost', () => {
    it('should flag a sale below the current price as sold too early', async () => {
      const result = await service.opportunityCost(
        saleEvent(0, { proceeds: 1200, cost: 1000 }),
        quote('AAPL', 130),
        'USD',
      );

      expect(result.status).toBe('Evaluated');
      if (result.status === 'Evaluated') {
        expect(result.hypotheticalProceeds.toString()).toBe('1300');
        expect(result.hypotheticalGain.toString()).toBe('300');
        expect(result.delta.toString()).toBe('100');
        expect(result.verdict).toBe(TimingVerdict.SOLD_TOO_EARLY);
      }
    });

    it('should call a profitable sale above the current price well timed', async () => {
      const result = await service.opportunityCost(
        saleEvent(0, { proceeds: 1200, cost: 1000 }),
        quote('AAPL', 110),
        'USD',
      );

      expect(result).toMatchObject({ status: 'Evaluated', verdict: TimingVerdict.SOLD_AT_GOOD_TIME });
    });

    it('should call a losing sale above the current price too late', async () => {
      const result = await service.opportunityCost(
        saleEvent(0, { proceeds: 800, cost: 1000 }),
        quote('AAPL', 70),
        'USD',
      );

      expect(result.status).toBe('Evaluated');
      if (result.status === 'Evaluated') {
        expect(result.delta.toString()).toBe('-100');
        expect(result.verdict).toBe(TimingVerdict.SOLD_TOO_LATE);
      }
    });

    it('should deduct the sale fee from the hypothetical exit', async () => {
      const result = await service.opportunityCost(
        saleEvent(0, { proceeds: 1195, cost: 1000, fee: 5 }),
        quote('AAPL', 130),
        'USD',
      );

      expect(result.status).toBe('Evaluated');
      if (result.status === 'Evaluated') {
        expect(result.hypotheticalProceeds.toString()).toBe('1295');
        expect(result.delta.toString()).toBe('100');
      }
    });

    it('should report QuoteUnavailable instead of guessing a price', async () => {
      const result = await service.opportunityCost(
        saleEvent(0, { proceeds: 1200, cost: 1000 }),
        unavailable('QuoteUnavailable', 'AAPL@latest: timed out'),
        'USD',
      );

      expect(result).toMatchObject({ status: 'QuoteUnavailable', detail: 'AAPL@latest: timed out' });
    });
  });

  describe('opportunitySummary', () => {
    it('should count verdicts and sum deltas', async () => {
      const results = await Promise.all([
        service.opportunityCost(saleEvent(0, { proceeds: 1200, cost: 1000 }), quote('AAPL', 130), 'USD'),
        service.opportunityCost(saleEvent(1, { proceeds: 1200, cost: 1000 }), quote('AAPL', 110), 'USD'),
        service.opportunityCost(saleEvent(2, { proceeds: 1200, cost: 1000 }), undefined, 'USD'),
      ]);

      const summary = service.opportunitySummary(results);

      expect(summary).toMatchObject({ evaluated: 2, unavailable: 1, soldTooEarly: 1, soldAtGoodTime: 1, soldTooLate: 0 });
      expect(summary.totalDelta.toString()).toBe('0');
    });
  });

  describe('incomeSummary', () => {
    it('should total convertible dividends and count the rest', async () => {
      const summary = await service.incomeSummary(
        [
          {
            account: 'Main',
            symbol: 'KO',
            currency: 'USD',
            amount: dec(8.95),
            payments: 2,
            firstPaymentDate: new Date(2024, 3, 1),
            lastPaymentDate: new Date(2024, 6, 1),
          },
          {
            account: 'Main',
            symbol: 'NESN',
            currency: 'CHF',
            amount: dec(30),
            payments: 1,
            firstPaymentDate: new Date(2024, 4, 1),
            lastPaymentDate: new Date(2024, 4, 1),
          },
        ],
        'USD',
      );

      expect(summary.totalIncome.toString()).toBe('8.95');
      expect(summary.unavailableCount).toBe(1);
      expect(summary.entries[1].converted).toEqual({
        status: 'unavailable',
        reason: 'ConversionUnavailable',
        detail: 'No rate source for CHF/USD@2024-05-01',
      });
    });
  });
});
