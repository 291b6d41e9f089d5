import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { AppController } from './app.controller';
import { MarketService } from './market/market.service';

describe('AppController', () => {
  it('should report health with the active source chain', async () => {
    const moduleRef = await Test.createTestingModule({
      controllers: [AppController],
      providers: [
        { provide: ConfigService, useValue: new ConfigService({ nodeEnv: 'test' }) },
        { provide: MarketService, useValue: { sourceNames: ['polygon', 'synthetic'] } },
      ],
    }).compile();

    expect(moduleRef.get(AppController).health()).toEqual({
      ok: true,
      env: 'test',
      version: 'v1',
      sources: ['polygon', 'synthetic'],
    });
  });
});
