import { Bar } from './market.models';
import { businessDays, normalizeSeries, sliceWindow, toDateWindow, toNumber } from './series.utils';

const bar = (date: string, close: number): Bar => ({
  date,
  open: close,
  high: close,
  low: close,
  close,
  volume: 1,
  amount: close,
});

describe('series.utils', () => {
  it('should reach back the given number of calendar days', () => {
    expect(toDateWindow(120, new Date('2024-05-01T12:00:00Z'))).toEqual({
      startDate: '2024-01-02',
      endDate: '2024-05-01',
    });
  });

  it('should let explicit bounds win', () => {
    expect(
      toDateWindow(120, new Date('2024-05-01T12:00:00Z'), { endDate: '2024-03-01' }),
    ).toEqual({ startDate: '2023-11-02', endDate: '2024-03-01' });
  });

  it('should list weekdays only', () => {
    expect(businessDays('2024-03-01', '2024-03-05')).toEqual([
      '2024-03-01',
      '2024-03-04',
      '2024-03-05',
    ]);
  });

  it('should sort, de-duplicate and freeze provider bars', () => {
    const s = normalizeSeries('AAA', [
      bar('2024-03-05', 3),
      bar('2024-03-04', 1),
      bar('not-a-date', 9),
      bar('2024-03-04', 2),
    ]);
    expect(s.bars.map((b) => [b.date, b.close])).toEqual([
      ['2024-03-04', 2],
      ['2024-03-05', 3],
    ]);
    expect(Object.isFrozen(s.bars)).toBe(true);
  });

  it('should slice a window inclusively', () => {
    const s = normalizeSeries('AAA', [
      bar('2024-03-01', 1),
      bar('2024-03-04', 2),
      bar('2024-03-05', 3),
    ]);
    expect(sliceWindow(s, { startDate: '2024-03-04', endDate: '2024-03-05' }).bars).toHaveLength(2);
  });

  it('should read provider numbers', () => {
    expect(toNumber('1.5')).toBe(1.5);
    expect(toNumber(7)).toBe(7);
    expect(toNumber('')).toBeNaN();
    expect(toNumber(null)).toBeNaN();
  });
});
