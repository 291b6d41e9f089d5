import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { of } from 'rxjs';
import { AlphaVantageHistorySource } from './alpha-vantage.source';
import { ProviderError } from './http-source';

const row = (close: string) => ({
  '1. open': close,
  '2. high': close,
  '3. low': close,
  '4. close': close,
  '5. volume': '100',
});

describe('AlphaVantageHistorySource', () => {
  let source: AlphaVantageHistorySource;
  const http = { get: jest.fn() };

  beforeEach(async () => {
    http.get.mockReset();
    const moduleRef = await Test.createTestingModule({
      providers: [
        AlphaVantageHistorySource,
        { provide: HttpService, useValue: http },
        {
          provide: ConfigService,
          useValue: new ConfigService({ market: { alphaVantage: { apiKey: 'test-key' } } }),
        },
      ],
    }).compile();

    source = moduleRef.get(AlphaVantageHistorySource);
  });

  it('should keep only the requested window, oldest first', async () => {
    http.get.mockReturnValue(
      of({
        data: {
          'Time Series (Daily)': {
            '2024-03-06': row('12'),
            '2024-03-05': row('11'),
            '2024-03-04': row('10'),
            '2024-03-01': row('9'),
          },
        },
      }),
    );

    const s = await source.getHistory('IBM', '2024-03-04', '2024-03-05');

    expect(s.bars.map((b) => [b.date, b.close, b.amount])).toEqual([
      ['2024-03-04', 10, 1000],
      ['2024-03-05', 11, 1100],
    ]);
  });

  it('should surface the rate-limit note as a provider error', async () => {
    http.get.mockReturnValue(of({ data: { Note: 'call frequency exceeded' } }));
    await expect(source.getHistory('IBM', '2024-03-04', '2024-03-05')).rejects.toThrow(
      new ProviderError('alpha_vantage', 'IBM: call frequency exceeded'),
    );
  });

  it('should leave symbol listing to another source', async () => {
    await expect(source.listSymbols()).rejects.toThrow('Symbol listing is not supported');
  });

  it('should parse the overview', async () => {
    http.get.mockReturnValue(
      of({
        data: {
          Symbol: 'IBM',
          Name: 'Test Machines',
          MarketCapitalization: '150000000000',
          PERatio: '21.5',
          PriceToBookRatio: 'None',
          SharesFloat: '900000000',
        },
      }),
    );
    await expect(source.getProfile('IBM')).resolves.toEqual({
      symbol: 'IBM',
      name: 'Test Machines',
      marketCap: 150000000000,
      pe: 21.5,
      pb: undefined,
      floatShares: 900000000,
    });
  });
});
