import { describe, it, expect } from 'vitest';
import { CliUsageError, parseCliArgs } from '../src/cli-args.js';

describe('parseCliArgs', () => {
  it('parses a single symbol', () => {
    expect(parseCliArgs(['aapl'])).toEqual({ symbols: ['AAPL'], json: false, concurrency: 1, help: false });
  });

  it('dedupes symbols and reads options', () => {
    expect(parseCliArgs(['msft', '--batch', '3', 'MSFT', 'nvda', '--json'])).toEqual({
      symbols: ['MSFT', 'NVDA'],
      json: true,
      concurrency: 3,
      help: false,
    });
  });

  it('shows help without symbols', () => {
    expect(parseCliArgs([]).help).toBe(true);
    expect(parseCliArgs(['-h', 'AAPL']).help).toBe(true);
  });

  it('rejects a bad batch size', () => {
    expect(() => parseCliArgs(['AAPL', '--batch', '0'])).toThrow(CliUsageError);
    expect(() => parseCliArgs(['AAPL', '--batch'])).toThrow('--batch expects a positive integer, got ""');
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow('Unknown option: --verbose');
  });
});
