import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MarketService } from './market/market.service';

@Controller()
export class AppController {
  constructor(
    private readonly config: ConfigService,
    private readonly market: MarketService,
  ) {}

  @Get('health')
  health() {
    return {
      ok: true,
      env: this.config.get<string>('nodeEnv'),
      version: 'v1',
      sources: this.market.sourceNames,
    };
  }
}
