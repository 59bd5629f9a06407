// Basic leveled logger over the console

const getTimestamp = (): string => {
  return new Date().toISOString();
};

// Valid levels: 'trace', 'debug', 'info', 'warn', 'error'
// Default to 'error' in test environment, 'info' otherwise
const getDefaultLogLevel = (): string => {
  if (process.env.NODE_ENV === 'test') {
    return 'error';
  }
  return 'info';
};

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_WEIGHTS;
}

const requestedLevel = process.env.LOG_LEVEL?.toLowerCase() || getDefaultLogLevel();
const LOG_LEVEL: LogLevel = isLogLevel(requestedLevel) ? requestedLevel : 'info';
const CURRENT_LEVEL_WEIGHT = LEVEL_WEIGHTS[LOG_LEVEL];

export const logger = {
  trace: (...args: unknown[]): void => {
    if (CURRENT_LEVEL_WEIGHT <= LEVEL_WEIGHTS.trace) {
      console.debug(`[${getTimestamp()}] [TRACE]`, ...args);
    }
  },
  debug: (...args: unknown[]): void => {
    if (CURRENT_LEVEL_WEIGHT <= LEVEL_WEIGHTS.debug) {
      console.debug(`[${getTimestamp()}] [DEBUG]`, ...args);
    }
  },
  info: (...args: unknown[]): void => {
    if (CURRENT_LEVEL_WEIGHT <= LEVEL_WEIGHTS.info) {
      console.log(`[${getTimestamp()}] [INFO]`, ...args);
    }
  },
  warn: (...args: unknown[]): void => {
    if (CURRENT_LEVEL_WEIGHT <= LEVEL_WEIGHTS.warn) {
      console.warn(`[${getTimestamp()}] [WARN]`, ...args);
    }
  },
  error: (...args: unknown[]): void => {
    if (CURRENT_LEVEL_WEIGHT <= LEVEL_WEIGHTS.error) {
      console.error(`[${getTimestamp()}] [ERROR]`, ...args);
    }
  },
};

export type Logger = typeof logger;

if (CURRENT_LEVEL_WEIGHT <= LEVEL_WEIGHTS.info) {
  console.log(`[Logger] Initialized with level: ${LOG_LEVEL.toUpperCase()} (Weight: ${CURRENT_LEVEL_WEIGHT})`);
}
