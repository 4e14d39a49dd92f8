import { loadEnvironment } from '../config/environment';
import { Logger, createLogger } from '../utils';
import { handleError } from './utils/error-handler';

/**
 * Logger configured from LOG_LEVEL / PRICEMATH_LOG_FILE
 */
export function createCliLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  try {
    const config = loadEnvironment(env);
    return createLogger('pricemath-cli', config.logFile, config.logLevel);
  } catch (error) {
    handleError(error, 'configuration');
  }
}
