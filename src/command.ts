import { convertHexFile } from './convert.js';
import { ConversionError, ErrorKind } from './errors.js';
import { parseHexNumber } from './image/address-window.js';
import { ConsoleLogger, LogLevel, type Logger } from './utils/logging.js';

export const USAGE = [
  'Usage: hexbank <input.hex> <output.bin> <start_addr_hex> <size_hex>',
  'Example: hexbank app.hex bank1.bin 0x08000000 0xE4F0',
].join('\n');

export interface CommandFlags {
  strict?: boolean;
  verbose?: boolean;
}

export interface CommandIO {
  print(message: string): void;
  printError(message: string): void;
  logger?: Logger;
}

const consoleIO: CommandIO = {
  print: (message) => console.log(message),
  printError: (message) => console.error(message),
};

/**
 * Runs one conversion from raw command-line positionals and returns the
 * process exit code.
 */
export function runCommand(args: string[], flags: CommandFlags = {}, io: CommandIO = consoleIO) {
  if (args.length !== 4) {
    io.print(USAGE);
    return 1;
  }

  const [input, output, start, size] = args;
  const logger = io.logger ?? new ConsoleLogger(flags.verbose ? LogLevel.Debug : LogLevel.Info);
  try {
    convertHexFile(
      {
        input,
        output,
        start: parseHexNumber(start, 'start address'),
        size: parseHexNumber(size, 'size'),
        strict: flags.strict,
      },
      logger,
      io.print,
    );
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    io.printError(`Error: ${message}`);
    if (err instanceof ConversionError && err.kind === ErrorKind.Usage) {
      io.print(USAGE);
    }
    return 1;
  }
  return 0;
}
