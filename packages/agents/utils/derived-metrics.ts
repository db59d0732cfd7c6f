// Price metrics derived from a quote record before it is sent to the model

import type { DataRecord } from '../types/research.js';

/** Finite number from a record field; numeric strings are accepted */
export function readNumber(record: DataRecord | null | undefined, key: string): number | undefined {
  if (!record) return undefined;
  const v = record[key];
  if (typeof v === 'number') return Number.isFinite(v) ? v : undefined;
  if (typeof v === 'string' && v.trim() !== '') {
    const n = Number(v);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

/** current − previous close; 0 when either side is missing or zero */
export function priceChange(current: number | undefined, previousClose: number | undefined): number {
  if (!current || !previousClose) return 0;
  return current - previousClose;
}

/** Percent change against the previous close; 0 without a previous close */
export function priceChangePercent(current: number | undefined, previousClose: number | undefined): number {
  if (!previousClose) return 0;
  return (priceChange(current, previousClose) / previousClose) * 100;
}

/** Position of the price inside its 52-week range, in percent. Undefined unless high > low. */
export function rangePosition(
  current: number | undefined,
  low: number | undefined,
  high: number | undefined,
): number | undefined {
  if (current === undefined || !low || !high || high <= low) return undefined;
  return ((current - low) / (high - low)) * 100;
}

export interface PriceMetrics {
  price_change: number;
  price_change_percent: number;
  range_position: number | undefined;
}

export function computePriceMetrics(quote: DataRecord): PriceMetrics {
  const current = readNumber(quote, 'current_price');
  const previous = readNumber(quote, 'previous_close');
  return {
    price_change: priceChange(current, previous),
    price_change_percent: priceChangePercent(current, previous),
    range_position: rangePosition(current, readNumber(quote, '52_week_low'), readNumber(quote, '52_week_high')),
  };
}
