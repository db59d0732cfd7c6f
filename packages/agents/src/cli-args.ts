// Command-line argument parsing for the research CLI

export interface CliOptions {
  symbols: string[];
  json: boolean;
  concurrency: number;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export function parseCliArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { symbols: [], json: false, concurrency: 1, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--json') {
      options.json = true;
    } else if (arg === '--batch') {
      const value = args[i + 1];
      const n = value === undefined ? NaN : Number(value);
      if (!Number.isInteger(n) || n < 1) {
        throw new CliUsageError(`--batch expects a positive integer, got "${value ?? ''}"`);
      }
      options.concurrency = n;
      i++;
    } else if (arg.startsWith('-')) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    } else {
      const symbol = arg.trim().toUpperCase();
      if (symbol && !options.symbols.includes(symbol)) options.symbols.push(symbol);
    }
  }

  if (!options.help && options.symbols.length === 0) options.help = true;
  return options;
}
