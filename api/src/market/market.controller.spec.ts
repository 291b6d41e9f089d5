import { HttpException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { MarketController } from './market.controller';
import { DataUnavailableError } from './market.errors';
import { MarketService } from './market.service';

describe('MarketController', () => {
  let controller: MarketController;
  const market = { listSymbols: jest.fn(), getHistory: jest.fn() };

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      controllers: [MarketController],
      providers: [
        { provide: MarketService, useValue: market },
        { provide: ConfigService, useValue: new ConfigService({}) },
      ],
    }).compile();

    controller = moduleRef.get(MarketController);
  });

  it('should count the universe', async () => {
    market.listSymbols.mockResolvedValue({ symbols: ['AAA', 'BBB'], source: 'fake', simulated: false });
    await expect(controller.getSymbols()).resolves.toEqual({
      symbols: ['AAA', 'BBB'],
      source: 'fake',
      simulated: false,
      count: 2,
    });
  });

  it('should pass an explicit window through', async () => {
    market.getHistory.mockResolvedValue({
      series: { symbol: 'AAA', bars: [] },
      source: 'fake',
      simulated: false,
    });

    const out = await controller.getHistory({ symbol: 'AAA', start: '2024-01-02', end: '2024-03-01' });

    expect(market.getHistory).toHaveBeenCalledWith('AAA', {
      startDate: '2024-01-02',
      endDate: '2024-03-01',
    });
    expect(out).toEqual({
      symbol: 'AAA',
      startDate: '2024-01-02',
      endDate: '2024-03-01',
      source: 'fake',
      simulated: false,
      bars: [],
    });
  });

  it('should answer 503 when no source has the symbol', async () => {
    market.getHistory.mockRejectedValue(new DataUnavailableError('AAA', 'No history for AAA'));

    const err: unknown = await controller.getHistory({ symbol: 'AAA' }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(HttpException);
    if (err instanceof HttpException) {
      expect(err.getStatus()).toBe(503);
      expect(err.getResponse()).toEqual({
        message: 'Failed to fetch history for AAA',
        symbol: 'AAA',
        error: 'No history for AAA',
      });
    }
  });
});
