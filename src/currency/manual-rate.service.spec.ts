import { Test, TestingModule } from '@nestjs/testing';
import { ManualRateService } from './manual-rate.service';

describe('ManualRateService', () => {
  let service: ManualRateService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [ManualRateService],
    }).compile();

    service = module.get<ManualRateService>(ManualRateService);
  });

  afterEach(() => {
    service.clearAllRates();
  });

  it('should store rates under normalized codes', () => {
    service.setRate('€', 'usd', 1.08);

    expect(service.getRate('EUR', 'USD')?.toString()).toBe('1.08');
    expect(service.getAllRates()).toEqual({ 'EUR/USD': 1.08 });
  });

  it('should prefer a direct rate over the inverse', () => {
    service.setRate('EUR', 'USD', 1.25);
    service.setRate('USD', 'EUR', 0.9);

    expect(service.getRate('USD', 'EUR')?.toString()).toBe('0.9');
    expect(service.getRate('EUR', 'USD')?.toString()).toBe('1.25');
  });

  it('should prefer a rate dated on the lookup day over the undated one', () => {
    service.setRate('EUR', 'USD', 1.1);
    service.setRate('EUR', 'USD', 1.2, new Date(2024, 0, 1));

    expect(service.getRate('EUR', 'USD', new Date(2024, 0, 1))?.toString()).toBe('1.2');
    expect(service.getRate('EUR', 'USD', new Date(2024, 0, 2))?.toString()).toBe('1.1');
    expect(service.getRate('EUR', 'USD', 'latest')?.toString()).toBe('1.1');
    expect(service.getAllRates()).toEqual({ 'EUR/USD': 1.1, 'EUR/USD@2024-01-01': 1.2 });
  });

  it('should apply a dated rate to its day only', () => {
    service.setRate('USD', 'EUR', 0.8, new Date(2024, 0, 1));

    expect(service.getRate('EUR', 'USD', new Date(2024, 0, 1))?.toString()).toBe('1.25');
    expect(service.getRate('EUR', 'USD', new Date(2024, 0, 2))).toBeUndefined();
    expect(service.getRate('EUR', 'USD')).toBeUndefined();
  });

  it('should return undefined for unknown pairs', () => {
    expect(service.getRate('JPY', 'CHF')).toBeUndefined();
  });

  it('should reject non-positive rates', () => {
    expect(() => service.setRate('EUR', 'USD', 0)).toThrow('Rate must be positive, got 0 for EUR/USD');
  });
});
