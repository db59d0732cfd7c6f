// Prompt value formatting — every missing value prints as N/A

export const NOT_AVAILABLE = 'N/A';

function isMissing(value: unknown): boolean {
  return value === null || value === undefined || value === '' ||
    (typeof value === 'number' && !Number.isFinite(value));
}

/** Plain value; objects are JSON-encoded */
export function fmt(value: unknown): string {
  if (isMissing(value)) return NOT_AVAILABLE;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/** Fixed-point number, or N/A for anything non-numeric */
export function fmtFixed(value: unknown, digits = 2): string {
  if (typeof value !== 'number' || !Number.isFinite(value)) return NOT_AVAILABLE;
  return value.toFixed(digits);
}

/** Dollar amount with two decimals */
export function fmtMoney(value: unknown): string {
  const fixed = fmtFixed(value);
  return fixed === NOT_AVAILABLE ? fixed : `$${fixed}`;
}

/** Integer with thousands separators (market cap, volume) */
export function fmtInteger(value: unknown): string {
  if (typeof value !== 'number' || !Number.isFinite(value)) return NOT_AVAILABLE;
  return Math.round(value).toLocaleString('en-US');
}

/** Signed percentage, e.g. +0.69% */
export function fmtSignedPercent(value: number, digits = 2): string {
  const sign = value >= 0 ? '+' : '';
  return `${sign}${value.toFixed(digits)}%`;
}

export function fmtPercent(value: number | undefined, digits = 1): string {
  return value === undefined ? NOT_AVAILABLE : `${value.toFixed(digits)}%`;
}
