import dotenv from 'dotenv';
import { LOG_LEVELS, LogLevel } from '../utils';

dotenv.config();

export interface EnvironmentConfig {
  logLevel: LogLevel;
  nodeEnv: string;
  logFile?: string;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function validateOptional(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Read CLI configuration from the environment (after .env has been loaded)
 */
export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const logLevel = validateOptional(env.LOG_LEVEL) ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: ${logLevel}. Must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  const config: EnvironmentConfig = {
    logLevel,
    nodeEnv: validateOptional(env.NODE_ENV) ?? 'development',
  };

  const logFile = validateOptional(env.PRICEMATH_LOG_FILE);
  if (logFile) {
    config.logFile = logFile;
  }

  return config;
}
