import { describe, it, expect } from 'vitest';
import {
  computePriceMetrics, priceChange, priceChangePercent, rangePosition, readNumber,
} from '../utils/derived-metrics.js';
import { fmt, fmtInteger, fmtMoney, fmtPercent, fmtSignedPercent } from '../utils/format.js';
import { quoteFixture } from './helpers.js';

describe('derived metrics', () => {
  it('computes change, percent change and range position from a quote', () => {
    const metrics = computePriceMetrics(quoteFixture());
    expect(metrics.price_change).toBeCloseTo(1.21, 2);
    expect(metrics.price_change_percent).toBeCloseTo(0.6945, 3);
    expect(metrics.range_position).toBeCloseTo(31.94, 1);
  });

  it('treats a missing or zero previous close as no change', () => {
    expect(priceChange(100, undefined)).toBe(0);
    expect(priceChange(100, 0)).toBe(0);
    expect(priceChangePercent(100, 0)).toBe(0);
  });

  it('leaves the range position undefined unless high > low', () => {
    expect(rangePosition(50, 60, 60)).toBeUndefined();
    expect(rangePosition(50, 70, 60)).toBeUndefined();
    expect(rangePosition(50, undefined, 60)).toBeUndefined();
    expect(rangePosition(55, 50, 60)).toBe(50);
  });

  it('reads numeric strings and ignores the rest', () => {
    expect(readNumber({ a: '12.5' }, 'a')).toBe(12.5);
    expect(readNumber({ a: 'N/A' }, 'a')).toBeUndefined();
    expect(readNumber({ a: Infinity }, 'a')).toBeUndefined();
    expect(readNumber(null, 'a')).toBeUndefined();
  });
});

describe('prompt formatting', () => {
  it('formats money, integers and percentages', () => {
    expect(fmtMoney(175.43)).toBe('$175.43');
    expect(fmtMoney('175')).toBe('N/A');
    expect(fmtInteger(2750000000000)).toBe('2,750,000,000,000');
    expect(fmtSignedPercent(0.6945)).toBe('+0.69%');
    expect(fmtSignedPercent(-1.5)).toBe('-1.50%');
    expect(fmtPercent(31.936)).toBe('31.9%');
    expect(fmtPercent(undefined)).toBe('N/A');
  });

  it('prints missing values as N/A', () => {
    expect(fmt(null)).toBe('N/A');
    expect(fmt('')).toBe('N/A');
    expect(fmt(NaN)).toBe('N/A');
    expect(fmt(0)).toBe('0');
    expect(fmt({ a: 1 })).toBe('{"a":1}');
  });
});
