import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CacheModule } from '@nestjs/cache-manager';
import configuration from './config/configuration';
import { AppController } from './app.controller';
import { IndicatorsModule } from './indicators/indicators.module';
import { MarketModule } from './market/market.module';
import { RulesModule } from './rules/rules.module';
import { ScreenerModule } from './screener/screener.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      expandVariables: true,
    }),
    CacheModule.register({ isGlobal: true }),
    MarketModule,
    IndicatorsModule,
    RulesModule,
    ScreenerModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
