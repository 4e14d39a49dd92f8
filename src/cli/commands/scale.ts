import { Command } from 'commander';
import chalk from 'chalk';
import { scalePrice } from '../../core/price-math';
import { createCliLogger } from '../cli-logger';
import { parseExponent, parseUnsignedInteger } from '../utils/validation';
import { executeCommand } from '../utils/error-handler';

interface ScaleOptions {
  mantissa: string;
  from: string;
  to: string;
  json?: boolean;
}

export const scaleCommand = new Command('scale')
  .description('Rescale a mantissa from one exponent to another (truncates on downscale)')
  .requiredOption('-m, --mantissa <mantissa>', 'Unsigned integer mantissa')
  .requiredOption('-f, --from <exponent>', 'Source exponent')
  .requiredOption('-t, --to <exponent>', 'Target exponent')
  .option('--json', 'Output in JSON format')
  .action(async (options: ScaleOptions) => {
    const logger = createCliLogger();
    await executeCommand(
      async () => {
        const mantissa = parseUnsignedInteger(options.mantissa, 'Mantissa');
        const fromExpo = parseExponent(options.from, 'Source exponent');
        const toExpo = parseExponent(options.to, 'Target exponent');
        const scaled = scalePrice(mantissa, fromExpo, toExpo);

        logger.debug('Mantissa rescaled', { mantissa, fromExpo, toExpo, scaled });

        if (options.json) {
          console.log(JSON.stringify({ mantissa: scaled.toString(), exponent: toExpo }, null, 2));
        } else {
          console.log(`\n${chalk.bold.cyan('Scaled Mantissa')}:`);
          console.log(`  ${mantissa} @ ${fromExpo} -> ${chalk.green(scaled.toString())} @ ${toExpo}`);
        }
      },
      'scale command',
      logger
    );
  });

scaleCommand.addHelpText(
  'after',
  `
Examples:
  $ pricemath scale --mantissa 123456 --from 2 --to 4    # 1234
  $ pricemath scale --mantissa 1234 --from 4 --to 2      # 123400
`
);
