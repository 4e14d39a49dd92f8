import chalk from 'chalk';
import { Price } from '../../types';
import { isPriceMathError, serializePrice } from '../../core/price-math';
import { Logger } from '../../utils';

/**
 * Handle CLI errors with consistent formatting
 * @param error Error object or message
 * @param context Context where the error occurred
 */
export function handleError(error: unknown, context?: string): never {
  const errorMessage = error instanceof Error ? error.message : String(error);
  const contextStr = context ? ` [${context}]` : '';
  const codeStr = isPriceMathError(error) ? ` (${error.code})` : '';

  console.error(chalk.red(`❌ Error${contextStr}${codeStr}: ${errorMessage}`));

  if (process.env.NODE_ENV === 'development' && error instanceof Error && error.stack) {
    console.error(chalk.gray(error.stack));
  }

  process.exit(1);
}

/**
 * Handle async command execution with error handling
 * @param fn Async function to execute
 * @param context Context for error handling
 * @param logger Logger that records the failure before exiting
 */
export async function executeCommand(
  fn: () => Promise<void>,
  context: string,
  logger?: Logger
): Promise<void> {
  try {
    await fn();
  } catch (error) {
    if (logger && error instanceof Error) {
      logger.logError(error, { context });
    }
    handleError(error, context);
  }
}

/**
 * Display a price result
 * @param title Heading shown above the fields
 * @param price Price to display
 * @param json Output as JSON instead
 */
export function displayPrice(title: string, price: Price, json = false): void {
  if (json) {
    console.log(JSON.stringify(serializePrice(price), null, 2));
    return;
  }

  console.log(`\n${chalk.bold.cyan(title)}:`);
  console.log(`  Mantissa:     ${chalk.green(price.mantissa.toString())}`);
  console.log(`  Confidence:   ${chalk.yellow(price.confidence.toString())}`);
  console.log(`  Exponent:     ${chalk.blue(String(price.exponent))}`);
  console.log(`  Publish Time: ${price.publishTime.toString()}`);
}
