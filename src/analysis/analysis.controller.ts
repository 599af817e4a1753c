import { BadRequestException, Body, Controller, Get, HttpCode, HttpStatus, Post, Query } from '@nestjs/common';
import { AnalysisService } from './analysis.service';
import { LedgerLoaderService } from './ledger-loader.service';
import { toAnalysisResponse } from './analysis-report.mapper';
import { LedgerInputDto } from './dto/ledger-input.dto';
import { AnalysisQueryDto } from './dto/analysis-query.dto';
import { AnalysisResponseDto } from './dto/analysis-response.dto';
import { BulkUpdatePricesDto, UpdatePriceDto, UpdateRateDto } from './dto/update-price.dto';
import { MarketPriceService } from '../market-price/market-price.service';
import { ManualRateService } from '../currency/manual-rate.service';
import { parseLedgerDate } from '../common/utils/date.util';

@Controller('analysis')
export class AnalysisController {
  constructor(
    private readonly analysisService: AnalysisService,
    private readonly loader: LedgerLoaderService,
    private readonly marketPrices: MarketPriceService,
    private readonly manualRates: ManualRateService,
  ) {}

  /**
   * Replays the posted ledger and returns the full analysis.
   *
   * POST /analysis?reportingCurrency=EUR&period=month
   * @returns 422 when the ledger is structurally broken (oversell, bad quantities)
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  async analyze(@Body() ledger: LedgerInputDto, @Query() query: AnalysisQueryDto): Promise<AnalysisResponseDto> {
    const result = await this.analysisService.analyze(this.loader.normalize(ledger), query);
    return toAnalysisResponse(result);
  }

  /**
   * Analyzes the configured portfolio file.
   *
   * GET /analysis?reportingCurrency=USD
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  async analyzeFile(@Query() query: AnalysisQueryDto): Promise<AnalysisResponseDto> {
    const result = await this.analysisService.analyzeFile(undefined, query);
    return toAnalysisResponse(result);
  }

  /**
   * Manual prices with last update timestamp.
   *
   * GET /analysis/market-prices
   */
  @Get('market-prices')
  @HttpCode(HttpStatus.OK)
  getMarketPrices() {
    return {
      prices: this.marketPrices.getAllPrices(),
      lastUpdated: this.marketPrices.getLastUpdateTime().toISOString(),
      source: 'manual',
    };
  }

  /**
   * POST /analysis/market-prices/update
   */
  @Post('market-prices/update')
  @HttpCode(HttpStatus.OK)
  updatePrice(@Body() dto: UpdatePriceDto) {
    this.marketPrices.updatePrice(dto.symbol, dto.price, dto.currency);
    return {
      message: `Price updated for ${dto.symbol}`,
      symbol: dto.symbol,
      price: dto.price,
      currency: dto.currency,
    };
  }

  /**
   * POST /analysis/market-prices/bulk
   */
  @Post('market-prices/bulk')
  @HttpCode(HttpStatus.OK)
  bulkUpdatePrices(@Body() dto: BulkUpdatePricesDto) {
    this.marketPrices.updatePrices(dto.prices, dto.currency);
    return {
      message: 'Market prices updated',
      updatedSymbols: Object.keys(dto.prices),
      currency: dto.currency,
    };
  }

  /**
   * Sets a manual FX rate for one day (`date`, dd-mm-yyyy) or, without a date,
   * for every day that has no dated rate.
   *
   * POST /analysis/fx-rates/update
   */
  @Post('fx-rates/update')
  @HttpCode(HttpStatus.OK)
  updateRate(@Body() dto: UpdateRateDto) {
    const date = dto.date === undefined ? undefined : parseLedgerDate(dto.date);
    if (dto.date !== undefined && !date) {
      throw new BadRequestException(`date: ${dto.date} is not a calendar date`);
    }
    this.manualRates.setRate(dto.from, dto.to, dto.rate, date);
    return {
      message: `Rate updated for ${dto.from}/${dto.to}${dto.date ? ` on ${dto.date}` : ''}`,
      rates: this.manualRates.getAllRates(),
    };
  }
}
