import { Command } from 'commander';
import { normalizePrice } from '../../core/price-math';
import { createCliLogger } from '../cli-logger';
import { parsePriceTuple } from '../utils/validation';
import { displayPrice, executeCommand } from '../utils/error-handler';

interface NormalizeOptions {
  price: string;
  json?: boolean;
}

export const normalizeCommand = new Command('normalize')
  .description('Reduce mantissa and confidence to 28 bits by raising the exponent')
  .requiredOption('-p, --price <price>', 'Price as mantissa:confidence:exponent:publishTime')
  .option('--json', 'Output in JSON format')
  .action(async (options: NormalizeOptions) => {
    const logger = createCliLogger();
    await executeCommand(
      async () => {
        const price = parsePriceTuple(options.price, 'Price');
        const result = normalizePrice(price);

        logger.debug('Price normalized', { price, result });
        displayPrice('Normalized Price', result, options.json);
      },
      'normalize command',
      logger
    );
  });

normalizeCommand.addHelpText(
  'after',
  `
Examples:
  $ pricemath normalize --price 1000000000:5000000:2:100   # 100000000:500000:3:100
`
);
