import { Module } from '@nestjs/common';
import { IndicatorsModule } from '../indicators/indicators.module';
import { MarketModule } from '../market/market.module';
import { RulesModule } from '../rules/rules.module';
import { ScreenerController } from './screener.controller';
import { ScreenerService } from './screener.service';

@Module({
  imports: [MarketModule, IndicatorsModule, RulesModule],
  controllers: [ScreenerController],
  providers: [ScreenerService],
  exports: [ScreenerService],
})
export class ScreenerModule {}
