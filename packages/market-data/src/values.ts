// Lenient field readers for provider payloads

type Loose = Record<string, unknown> | undefined;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Safely get a numeric value; unwraps Yahoo's `{ raw, fmt }` pairs and numeric strings */
export function num(obj: Loose, key: string): number | undefined {
  if (!obj) return undefined;
  let v = obj[key];
  if (isRecord(v)) v = v.raw;
  if (typeof v === 'number' && !isNaN(v)) return v;
  if (typeof v === 'string' && v.trim() !== '') {
    const n = parseFloat(v);
    if (!isNaN(n)) return n;
  }
  return undefined;
}

/** Safely get a string value */
export function str(obj: Loose, key: string): string | undefined {
  if (!obj) return undefined;
  const v = obj[key];
  return typeof v === 'string' && v !== '' ? v : undefined;
}

/** Safely get a nested record */
export function rec(obj: Loose, key: string): Record<string, unknown> | undefined {
  if (!obj) return undefined;
  const v = obj[key];
  return isRecord(v) ? v : undefined;
}
