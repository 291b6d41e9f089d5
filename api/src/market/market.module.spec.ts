import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { buildHistorySources } from './market.module';

async function sourcesFor(market: Record<string, unknown>) {
  const moduleRef = await Test.createTestingModule({
    providers: [
      { provide: HttpService, useValue: { get: jest.fn() } },
      { provide: ConfigService, useValue: new ConfigService({ market }) },
    ],
  }).compile();
  return buildHistorySources(moduleRef.get(HttpService), moduleRef.get(ConfigService));
}

describe('buildHistorySources', () => {
  it('should build configured providers in order', async () => {
    const sources = await sourcesFor({
      providers: ['alpha_vantage', 'polygon'],
      polygon: { apiKey: 'test-key' },
      alphaVantage: { apiKey: 'test-key' },
    });
    expect(sources.map((s) => s.name)).toEqual(['alpha_vantage', 'polygon']);
  });

  it('should skip a provider without an API key', async () => {
    const sources = await sourcesFor({
      providers: ['polygon', 'alpha_vantage'],
      alphaVantage: { apiKey: 'test-key' },
    });
    expect(sources.map((s) => s.name)).toEqual(['alpha_vantage']);
  });
});
