// api/src/screener/screener.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { from, lastValueFrom, mergeMap, toArray } from 'rxjs';
import { FeatureName, isFeatureName } from '../indicators/feature-names';
import { IndicatorsService } from '../indicators/indicators.service';
import { DateWindow } from '../market/market.models';
import { MarketService } from '../market/market.service';
import { toDateWindow } from '../market/series.utils';
import {
  assertKnownFields,
  describePredicate,
  evaluatePredicate,
} from '../rules/predicate-evaluator';
import { PredicateNode } from '../rules/predicate.models';
import { ParseOptions, RuleParserService } from '../rules/rule-parser.service';
import { UnknownFieldError } from '../rules/rules.errors';
import { Omission, ScreenMatch, ScreenOptions, ScreeningResult } from './screener.models';

type Outcome =
  | { index: number; kind: 'row'; row: ScreenMatch }
  | { index: number; kind: 'omitted'; omission: Omission };

const reason = (e: unknown) => (e instanceof Error ? e.message : String(e));

/**
 * Runs one predicate over a universe with a bounded number of symbols in flight.
 * One symbol failing never fails the run.
 */
@Injectable()
export class ScreenerService {
  private readonly logger = new Logger(ScreenerService.name);
  private readonly concurrency: number;
  private readonly historyDays: number;
  private readonly maxUniverse: number;

  constructor(
    private readonly market: MarketService,
    private readonly indicators: IndicatorsService,
    private readonly parser: RuleParserService,
    config: ConfigService,
  ) {
    this.concurrency = Math.max(1, config.get<number>('screener.concurrency') ?? 8);
    this.historyDays = config.get<number>('screener.historyDays') ?? 120;
    this.maxUniverse = config.get<number>('screener.maxUniverse') ?? 500;
  }

  /** Parse, then screen. Parse warnings travel with the result. */
  async screenByRule(
    text: string,
    options: Omit<ScreenOptions, 'predicate'> & ParseOptions = {},
  ): Promise<ScreeningResult> {
    const { strict, ...rest } = options;
    const parsed = this.parser.parse(text, { strict });
    const result = await this.run({ ...rest, predicate: parsed.predicate });
    return {
      ...result,
      warnings: [...parsed.warnings, ...result.warnings],
      confidence: parsed.confidence,
    };
  }

  async run(options: ScreenOptions): Promise<ScreeningResult> {
    // a bad rule must fail before any data is fetched
    assertKnownFields(options.predicate);
    const sortBy = options.sortBy === undefined ? undefined : toSortField(options.sortBy);

    const startedAt = new Date().toISOString();
    const window = toDateWindow(this.historyDays, new Date(), {
      startDate: options.startDate,
      endDate: options.endDate,
    });
    const warnings: string[] = [];

    let universe = options.symbols ?? (await this.market.listSymbols()).symbols;
    universe = Array.from(new Set(universe));
    const universeSize = universe.length;
    if (universe.length > this.maxUniverse) {
      warnings.push(`Universe truncated from ${universe.length} to ${this.maxUniverse} symbols`);
      universe = universe.slice(0, this.maxUniverse);
    }

    const outcomes = await lastValueFrom(
      from(universe.map((symbol, index) => ({ symbol, index }))).pipe(
        mergeMap(
          ({ symbol, index }) => this.screenOne(symbol, index, options.predicate, window, options.signal),
          this.concurrency,
        ),
        toArray(),
      ),
    );
    // completion order is arbitrary; restore universe order
    outcomes.sort((a, b) => a.index - b.index);

    const rows: ScreenMatch[] = [];
    const omitted: Omission[] = [];
    for (const o of outcomes) {
      if (o.kind === 'omitted') omitted.push(o.omission);
      else if (o.row.passed || options.includeFailed) rows.push(o.row);
    }

    if (sortBy) rows.sort(byFeatureDesc(sortBy));
    const matches = options.limit !== undefined ? rows.slice(0, options.limit) : rows;
    const cancelled = omitted.some((o) => o.code === 'CANCELLED');

    this.logger.log(
      `Screened ${universe.length} symbol(s): ${matches.length} returned, ${omitted.length} omitted${cancelled ? ' (cancelled)' : ''}`,
    );

    return {
      predicate: options.predicate,
      description: describePredicate(options.predicate),
      matches,
      omitted,
      universeSize,
      scanned: outcomes.filter((o) => o.kind === 'row' || o.omission.code !== 'CANCELLED').length,
      cancelled,
      simulated: matches.some((m) => m.simulated),
      sortBy,
      ...window,
      startedAt,
      finishedAt: new Date().toISOString(),
      warnings,
    };
  }

  /* ------------------------------- Helpers ------------------------------ */

  private async screenOne(
    symbol: string,
    index: number,
    predicate: PredicateNode,
    window: DateWindow,
    signal?: AbortSignal,
  ): Promise<Outcome> {
    if (signal?.aborted) {
      return {
        index,
        kind: 'omitted',
        omission: { symbol, reason: 'Run cancelled before this symbol started', code: 'CANCELLED' },
      };
    }

    try {
      const { series, source, simulated } = await this.market.getHistory(symbol, window);
      const profile = await this.market.getProfile(symbol, source);
      const features = this.indicators.features(series, profile);

      return {
        index,
        kind: 'row',
        row: {
          symbol,
          name: profile?.name,
          passed: evaluatePredicate(predicate, features.values),
          features: features.values,
          degraded: features.degraded,
          asOf: features.asOf,
          source,
          simulated,
        },
      };
    } catch (e) {
      this.logger.warn(`[screen] ${symbol} omitted: ${reason(e)}`);
      return {
        index,
        kind: 'omitted',
        omission: { symbol, reason: reason(e), code: 'DATA_UNAVAILABLE' },
      };
    }
  }
}

function toSortField(name: string): FeatureName {
  if (!isFeatureName(name)) throw new UnknownFieldError(name);
  return name;
}

/** Descending, unavailable last, ties by symbol. */
function byFeatureDesc(field: FeatureName) {
  return (a: ScreenMatch, b: ScreenMatch): number => {
    const x = a.features[field];
    const y = b.features[field];
    if (x != null && y != null && x !== y) return y - x;
    if (x == null && y != null) return 1;
    if (x != null && y == null) return -1;
    return a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0;
  };
}
