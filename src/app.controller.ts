import { Controller, Get, Inject } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';
import { APP_CONFIG, AppConfig } from './config/app.config';

@Controller()
export class AppController {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  /**
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'fifo-gain-engine',
      quoteSource: this.config.quoteSource,
      fxSource: this.config.fxSource,
    };
  }

  /**
   * API root - returns service info and available endpoints.
   *
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'FIFO Cost-Basis & Gain Analysis API',
      version: '1.0.0',
      reportingCurrency: this.config.reportingCurrency,
      endpoints: {
        health: '/health',
        analysis: '/analysis',
        marketPrices: '/analysis/market-prices',
        fxRates: '/analysis/fx-rates/update',
      },
    };
  }
}
