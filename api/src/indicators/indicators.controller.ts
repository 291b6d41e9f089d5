import {
  Controller,
  Get,
  Param,
  Query,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DateWindowQueryDto, SymbolParamDto } from '../market/dto/history-query.dto';
import { DataUnavailableError } from '../market/market.errors';
import { toDateWindow } from '../market/series.utils';
import { IndicatorsService } from './indicators.service';

/**
 * Indicators Controller
 * Technical analysis of a single issue
 */
@Controller('indicators')
export class IndicatorsController {
  private readonly logger = new Logger(IndicatorsController.name);

  constructor(
    private readonly indicators: IndicatorsService,
    private readonly config: ConfigService,
  ) {}

  /**
   * MA, EMA, RSI, MACD, Bollinger and KDJ series plus the latest feature snapshot
   */
  @Get(':symbol')
  async analyze(@Param() p: SymbolParamDto, @Query() q: DateWindowQueryDto) {
    const window = toDateWindow(
      this.config.get<number>('screener.historyDays') ?? 120,
      new Date(),
      { startDate: q.start, endDate: q.end },
    );
    try {
      return await this.indicators.analyze(p.symbol, window);
    } catch (error) {
      this.logger.error(`Analysis failed for ${p.symbol}: ${String(error)}`);

      if (error instanceof HttpException) {
        throw error;
      }

      throw new HttpException(
        {
          message: `Failed to analyze ${p.symbol}`,
          symbol: p.symbol,
          error:
            error instanceof DataUnavailableError
              ? error.message
              : 'Market data unavailable',
        },
        HttpStatus.SERVICE_UNAVAILABLE,
      );
    }
  }
}
