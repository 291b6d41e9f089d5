import { Logger, Module } from '@nestjs/common';
import { HttpModule, HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { MarketProviderName } from '../config/configuration';
import { MarketController } from './market.controller';
import { MarketService } from './market.service';
import { AlphaVantageHistorySource } from './sources/alpha-vantage.source';
import { HISTORY_SOURCES, HistoryDataSource } from './sources/history-source';
import { PolygonHistorySource } from './sources/polygon.source';
import { SyntheticHistorySource } from './sources/synthetic.source';

/** Instantiate the configured providers in order, skipping those without a key. */
export function buildHistorySources(
  http: HttpService,
  config: ConfigService,
): HistoryDataSource[] {
  const logger = new Logger('MarketModule');
  const names = config.get<MarketProviderName[]>('market.providers') ?? [];
  const out: HistoryDataSource[] = [];

  for (const name of names) {
    if (name === 'polygon') {
      if (config.get<string>('market.polygon.apiKey')) {
        out.push(new PolygonHistorySource(http, config));
      } else logger.warn('polygon enabled without POLYGON_API_KEY; skipped');
    } else if (name === 'alpha_vantage') {
      if (config.get<string>('market.alphaVantage.apiKey')) {
        out.push(new AlphaVantageHistorySource(http, config));
      } else logger.warn('alpha_vantage enabled without ALPHA_VANTAGE_API_KEY; skipped');
    }
  }
  return out;
}

@Module({
  imports: [HttpModule],
  controllers: [MarketController],
  providers: [
    SyntheticHistorySource,
    {
      provide: HISTORY_SOURCES,
      inject: [HttpService, ConfigService],
      useFactory: buildHistorySources,
    },
    MarketService,
  ],
  exports: [MarketService],
})
export class MarketModule {}
