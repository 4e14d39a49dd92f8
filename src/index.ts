export * from './types';

// Price math core
export * from './core/price-math';

export { Logger, createLogger, logger } from './utils';
export type { LogLevel, LogContext } from './utils';
