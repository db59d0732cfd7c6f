// Scoped structured logger — writes `[Scope:LEVEL] message {json}` to stderr

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let thresholdOverride: LogThreshold | undefined;

function isThreshold(value: string | undefined): value is LogThreshold {
  return value !== undefined && value in LEVEL_ORDER;
}

/** Force a threshold for the whole process (the CLI applies the validated config here) */
export function setLogLevel(level: LogThreshold | undefined): void {
  thresholdOverride = level;
}

function currentThreshold(): LogThreshold {
  if (thresholdOverride) return thresholdOverride;
  const env = process.env.LOG_LEVEL?.toLowerCase();
  return isThreshold(env) ? env : 'info';
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export function createLogger(scope: string): Logger {
  function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentThreshold()]) return;
    const prefix = `[${scope}:${level.toUpperCase()}]`;
    if (data) {
      console.error(`${prefix} ${message}`, JSON.stringify(data));
    } else {
      console.error(`${prefix} ${message}`);
    }
  }

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
  };
}
