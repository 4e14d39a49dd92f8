import { Command } from 'commander';
import { Price, PriceOperation } from '../../types';
import {
  addPrices,
  combinePrices,
  divPrices,
  mulPrices,
  subPrices,
} from '../../core/price-math';
import { createCliLogger } from '../cli-logger';
import { parsePriceTuple } from '../utils/validation';
import { displayPrice, executeCommand } from '../utils/error-handler';

interface ArithmeticOptions {
  priceA: string;
  priceB: string;
  json?: boolean;
}

interface OperationSpec {
  description: string;
  apply: (a: Price, b: Price) => Price;
}

export const PRICE_OPERATIONS: Record<PriceOperation, OperationSpec> = {
  add: { description: 'Add two prices at the same exponent', apply: addPrices },
  sub: { description: 'Subtract price B from price A (same exponent)', apply: subPrices },
  mul: { description: 'Multiply two prices', apply: mulPrices },
  div: { description: 'Divide price A by price B', apply: divPrices },
  combine: {
    description: 'Convert price A into the unit of price B via their shared quote',
    apply: combinePrices,
  },
};

export function createArithmeticCommand(operation: PriceOperation): Command {
  const { description, apply } = PRICE_OPERATIONS[operation];

  const command = new Command(operation)
    .description(description)
    .requiredOption('-a, --price-a <price>', 'Price A as mantissa:confidence:exponent:publishTime')
    .requiredOption('-b, --price-b <price>', 'Price B as mantissa:confidence:exponent:publishTime')
    .option('--json', 'Output in JSON format')
    .action(async (options: ArithmeticOptions) => {
      const logger = createCliLogger();
      await executeCommand(
        async () => {
          const a = parsePriceTuple(options.priceA, 'Price A');
          const b = parsePriceTuple(options.priceB, 'Price B');
          const result = apply(a, b);

          logger.debug('Price operation completed', { operation, a, b, result });
          displayPrice(`${operation.toUpperCase()} Result`, result, options.json);
        },
        `${operation} command`,
        logger
      );
    });

  command.addHelpText(
    'after',
    `
Examples:
  $ pricemath ${operation} --price-a 150000000:1000000:8:100 --price-b 200000000:500000:8:200
  $ pricemath ${operation} --price-a 150000000:1000000:8:100 --price-b 200000000:500000:8:200 --json
`
  );

  return command;
}

export const addCommand = createArithmeticCommand('add');
export const subCommand = createArithmeticCommand('sub');
export const mulCommand = createArithmeticCommand('mul');
export const divCommand = createArithmeticCommand('div');
export const combineCommand = createArithmeticCommand('combine');
