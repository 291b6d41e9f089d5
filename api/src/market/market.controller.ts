import {
  Controller,
  Get,
  Query,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MarketService } from './market.service';
import { HistoryQueryDto } from './dto/history-query.dto';
import { DataUnavailableError } from './market.errors';
import { toDateWindow } from './series.utils';

/**
 * Market Controller
 * Exposes the universe and raw daily history behind the screener
 */
@Controller('market')
export class MarketController {
  private readonly logger = new Logger(MarketController.name);

  constructor(
    private readonly market: MarketService,
    private readonly config: ConfigService,
  ) {}

  /**
   * List the symbols of the current universe
   */
  @Get('symbols')
  async getSymbols() {
    const out = await this.market.listSymbols();
    return { ...out, count: out.symbols.length };
  }

  /**
   * Get daily bars for a stock symbol
   * @param q Query parameters for the history request
   * @returns Normalised bars plus the source that produced them
   */
  @Get('history')
  async getHistory(@Query() q: HistoryQueryDto) {
    const window = toDateWindow(
      this.config.get<number>('screener.historyDays') ?? 120,
      new Date(),
      { startDate: q.start, endDate: q.end },
    );
    try {
      const { series, source, simulated } = await this.market.getHistory(q.symbol, window);
      return {
        symbol: series.symbol,
        ...window,
        source,
        simulated,
        bars: series.bars,
      };
    } catch (error) {
      this.logger.error(`History failed for ${q.symbol}: ${String(error)}`);

      if (error instanceof HttpException) {
        throw error;
      }

      throw new HttpException(
        {
          message: `Failed to fetch history for ${q.symbol}`,
          symbol: q.symbol,
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
