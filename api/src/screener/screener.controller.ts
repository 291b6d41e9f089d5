import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpException,
  HttpStatus,
  Logger,
  Post,
  Res,
} from '@nestjs/common';
import { toPredicateNode } from '../rules/predicate-evaluator';
import { toRuleHttpError } from '../rules/rules.http';
import { ScreenRequestDto } from './dto/screen-request.dto';
import { ScreeningResult } from './screener.models';
import { ScreenerService } from './screener.service';

/** The part of the HTTP response a run watches for a client disconnect. */
interface ClosableResponse {
  on(event: 'close', listener: () => void): unknown;
  readonly writableEnded: boolean;
}

/**
 * Screener Controller
 * Runs a rule (or a saved predicate tree) over the universe
 */
@Controller('screener')
export class ScreenerController {
  private readonly logger = new Logger(ScreenerController.name);

  constructor(private readonly screener: ScreenerService) {}

  /**
   * POST /screener/run
   * A client that disconnects mid-run cancels the symbols not yet started.
   */
  @Post('run')
  @HttpCode(200)
  async run(
    @Body() body: ScreenRequestDto,
    @Res({ passthrough: true }) res: ClosableResponse,
  ): Promise<ScreeningResult> {
    if ((body.rule === undefined) === (body.predicate === undefined)) {
      throw new BadRequestException('Provide exactly one of "rule" or "predicate"');
    }

    const abort = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) abort.abort();
    });

    const options = {
      symbols: body.symbols,
      sortBy: body.sortBy,
      limit: body.limit,
      startDate: body.startDate,
      endDate: body.endDate,
      includeFailed: body.includeFailed,
      signal: abort.signal,
    };

    try {
      return body.rule !== undefined
        ? await this.screener.screenByRule(body.rule, { ...options, strict: body.strict })
        : await this.screener.run({ ...options, predicate: toPredicateNode(body.predicate) });
    } catch (error) {
      const mapped = toRuleHttpError(error);
      if (mapped) throw mapped;
      if (error instanceof HttpException) throw error;

      this.logger.error(`Screening failed: ${String(error)}`);
      throw new HttpException(
        { message: 'Screening failed', error: 'Market data unavailable' },
        HttpStatus.SERVICE_UNAVAILABLE,
      );
    }
  }
}
