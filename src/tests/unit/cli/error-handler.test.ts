import {
  displayPrice,
  executeCommand,
  handleError,
} from '../../../cli/utils/error-handler';
import { NegativeResultError, createPrice } from '../../../core/price-math';
import { Logger } from '../../../utils';

jest.mock('chalk', () => {
  const identity = (text: string) => text;
  const bold = Object.assign(identity, { cyan: identity });
  return {
    __esModule: true,
    default: { red: identity, gray: identity, green: identity, yellow: identity, blue: identity, bold },
  };
});

describe('CLI Error Handler', () => {
  let mockExit: jest.SpyInstance;
  let mockConsoleError: jest.SpyInstance;
  let mockConsoleLog: jest.SpyInstance;
  const originalNodeEnv = process.env.NODE_ENV;

  beforeEach(() => {
    mockExit = jest.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
    mockConsoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    mockConsoleLog = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    process.env.NODE_ENV = 'test';
  });

  afterEach(() => {
    mockExit.mockRestore();
    mockConsoleError.mockRestore();
    mockConsoleLog.mockRestore();
    process.env.NODE_ENV = originalNodeEnv;
  });

  describe('handleError', () => {
    it('should print the message with context and exit with code 1', () => {
      expect(() => handleError(new Error('boom'), 'add command')).toThrow('process.exit called');
      expect(mockConsoleError).toHaveBeenCalledWith('❌ Error [add command]: boom');
      expect(mockExit).toHaveBeenCalledWith(1);
    });

    it('should include the error code of price-math errors', () => {
      expect(() => handleError(new NegativeResultError(1n, 2n), 'sub command')).toThrow(
        'process.exit called'
      );
      expect(mockConsoleError).toHaveBeenCalledWith(
        '❌ Error [sub command] (NEGATIVE_RESULT): Negative price not representable: 1 - 2'
      );
    });

    it('should accept plain string errors', () => {
      expect(() => handleError('bad input')).toThrow('process.exit called');
      expect(mockConsoleError).toHaveBeenCalledWith('❌ Error: bad input');
    });

    it('should print the stack in development', () => {
      process.env.NODE_ENV = 'development';
      const error = new Error('boom');
      error.stack = 'Error: boom\n    at test';

      expect(() => handleError(error)).toThrow('process.exit called');
      expect(mockConsoleError).toHaveBeenCalledWith('Error: boom\n    at test');
    });
  });

  describe('executeCommand', () => {
    it('should run the command without exiting on success', async () => {
      const fn = jest.fn().mockResolvedValue(undefined);

      await executeCommand(fn, 'add command');

      expect(fn).toHaveBeenCalled();
      expect(mockExit).not.toHaveBeenCalled();
    });

    it('should log the failure and exit', async () => {
      const logger = new Logger('test-cli');
      const logError = jest.spyOn(logger, 'logError').mockImplementation(() => undefined);
      const error = new Error('failed');

      await expect(
        executeCommand(() => Promise.reject(error), 'mul command', logger)
      ).rejects.toThrow('process.exit called');

      expect(logError).toHaveBeenCalledWith(error, { context: 'mul command' });
      expect(mockConsoleError).toHaveBeenCalledWith('❌ Error [mul command]: failed');
    });
  });

  describe('displayPrice', () => {
    const price = createPrice({ mantissa: 350000000n, confidence: 1500000n, exponent: 8, publishTime: 200n });

    it('should print each field', () => {
      displayPrice('ADD Result', price);

      expect(mockConsoleLog.mock.calls.map(call => call[0])).toEqual([
        '\nADD Result:',
        '  Mantissa:     350000000',
        '  Confidence:   1500000',
        '  Exponent:     8',
        '  Publish Time: 200',
      ]);
    });

    it('should print JSON with bigint fields as strings', () => {
      displayPrice('ADD Result', price, true);

      expect(mockConsoleLog).toHaveBeenCalledWith(
        JSON.stringify(
          { mantissa: '350000000', confidence: '1500000', exponent: 8, publishTime: '200' },
          null,
          2
        )
      );
    });
  });
});
