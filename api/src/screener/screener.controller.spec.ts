import { EventEmitter } from 'events';
import { BadRequestException, HttpException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { RuleParseError } from '../rules/rules.errors';
import { ScreenerController } from './screener.controller';
import { ScreenerService } from './screener.service';

describe('ScreenerController', () => {
  let controller: ScreenerController;
  const screener = { run: jest.fn(), screenByRule: jest.fn() };
  const response = () => Object.assign(new EventEmitter(), { writableEnded: false });

  beforeEach(async () => {
    screener.run.mockReset();
    screener.screenByRule.mockReset();
    const moduleRef = await Test.createTestingModule({
      controllers: [ScreenerController],
      providers: [{ provide: ScreenerService, useValue: screener }],
    }).compile();

    controller = moduleRef.get(ScreenerController);
  });

  it('should require exactly one of rule or predicate', async () => {
    await expect(controller.run({}, response())).rejects.toThrow(BadRequestException);
    await expect(
      controller.run({ rule: '大盘股', predicate: { field: 'price' } }, response()),
    ).rejects.toThrow('Provide exactly one of "rule" or "predicate"');
  });

  it('should screen by rule with the request options', async () => {
    screener.screenByRule.mockResolvedValue({ matches: [] });

    await controller.run({ rule: '大盘股', symbols: ['AAA'], strict: true, limit: 5 }, response());

    expect(screener.screenByRule).toHaveBeenCalledWith(
      '大盘股',
      expect.objectContaining({ symbols: ['AAA'], strict: true, limit: 5 }),
    );
  });

  it('should rebuild a posted predicate tree', async () => {
    screener.run.mockResolvedValue({ matches: [] });

    await controller.run(
      { predicate: { field: 'rsi', operator: 'between', value: { low: 30, high: 70 } } },
      response(),
    );

    const [options] = screener.run.mock.calls[0];
    expect(options.predicate).toEqual({
      kind: 'comparison',
      field: 'rsi',
      operator: 'between',
      value: { low: 30, high: 70 },
      description: undefined,
    });
  });

  it('should map rule errors to 400 with examples', async () => {
    screener.screenByRule.mockRejectedValue(new RuleParseError('No recognizable condition found'));

    const err: unknown = await controller.run({ rule: '火星连接' }, response()).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(BadRequestException);
    if (err instanceof BadRequestException) {
      expect(err.getResponse()).toEqual(
        expect.objectContaining({
          message: 'No recognizable condition found',
          error: 'RuleParseError',
        }),
      );
    }
  });

  it('should answer 503 on an unexpected failure', async () => {
    screener.screenByRule.mockRejectedValue(new Error('boom'));

    const err: unknown = await controller.run({ rule: '大盘股' }, response()).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(HttpException);
    if (err instanceof HttpException) expect(err.getStatus()).toBe(503);
  });

  it('should abort the run when the client goes away', async () => {
    const res = response();
    let signal: AbortSignal | undefined;
    screener.screenByRule.mockImplementation(async (_rule: string, options: { signal: AbortSignal }) => {
      signal = options.signal;
      res.emit('close');
      return { matches: [] };
    });

    await controller.run({ rule: '大盘股' }, res);

    expect(signal?.aborted).toBe(true);
  });
});
