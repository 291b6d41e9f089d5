import { Injectable, Logger } from '@nestjs/common';
import { MarketService } from '../market/market.service';
import { DateWindow, StockProfile, TimeSeries } from '../market/market.models';
import { buildFeatureSet, computeIndicators } from './features.utils';
import { FeatureSet, IndicatorReport } from './indicator.models';

@Injectable()
export class IndicatorsService {
  private readonly logger = new Logger(IndicatorsService.name);

  constructor(private readonly market: MarketService) {}

  /** Latest features for one already-fetched series. */
  features(series: TimeSeries, profile?: StockProfile): FeatureSet {
    const features = buildFeatureSet(series, profile);
    if (features.degraded.length) {
      this.logger.debug(
        `[features] ${series.symbol} degraded: ${features.degraded.join(',')} (${features.missingBars} missing bars)`,
      );
    }
    return features;
  }

  /**
   * Full indicator history for one issue over the given window.
   * Rejects with DataUnavailableError when no source has the symbol.
   */
  async analyze(symbol: string, window: DateWindow): Promise<IndicatorReport> {
    const { series, source, simulated } = await this.market.getHistory(symbol, window);
    const profile = await this.market.getProfile(symbol, source);
    const indicators = computeIndicators(series);

    return {
      symbol,
      name: profile?.name,
      source,
      simulated,
      dates: series.bars.map((b) => b.date),
      closes: series.bars.map((b) => (Number.isFinite(b.close) ? b.close : null)),
      indicators,
      features: buildFeatureSet(series, profile, indicators),
    };
  }
}
