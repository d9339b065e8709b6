import { readFileSync, writeFileSync } from 'fs';
import { ConversionError, ErrorKind } from './errors.js';
import { HexLoader } from './hex-loader.js';
import { createAddressWindow } from './image/address-window.js';
import { assembleImage } from './image/assembler.js';
import { hex } from './utils/bit.js';
import { crc32, formatCrc32 } from './utils/crc32.js';
import type { Logger } from './utils/logging.js';

const LOG_NAME = 'Convert';

export interface ConvertOptions {
  input: string;
  output: string;
  start: number;
  size: number;
  /** Reject records with a missing or wrong integrity byte */
  strict?: boolean;
}

export interface ConversionSummary {
  output: string;
  size: number;
  checksum: number;
  /** Distinct window addresses that received a byte from the input */
  bytesInRange: number;
}

function readHexFile(path: string) {
  try {
    return readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConversionError(ErrorKind.InputUnreadable, `Could not open input file: ${path}`, {
      cause: err,
    });
  }
}

function writeImageFile(path: string, image: Uint8Array) {
  try {
    writeFileSync(path, image);
  } catch (err) {
    throw new ConversionError(ErrorKind.OutputUnwritable, `Could not create output file: ${path}`, {
      cause: err,
    });
  }
}

/**
 * Converts an Intel HEX file into a raw binary covering `[start, start + size)`.
 * The output file is only created once the image is known to hold data.
 */
export function convertHexFile(
  options: ConvertOptions,
  logger: Logger,
  print: (message: string) => void = console.log,
): ConversionSummary {
  const window = createAddressWindow(options.start, options.size);
  logger.debug(LOG_NAME, `Window 0x${hex(window.start, 8)}..0x${hex(window.end, 8)}`);

  const source = readHexFile(options.input);

  const loader = new HexLoader(window, { verifyChecksum: options.strict });
  loader.logger = logger;
  const map = loader.loadSource(source);
  const { lines, records, failures } = loader.stats;
  logger.debug(LOG_NAME, `${lines} lines, ${records} records, ${failures} failures`);
  print('Successfully parsed HEX file.');

  const result = assembleImage(window, map);
  if (!result.ok) {
    throw new ConversionError(
      ErrorKind.EmptyRange,
      'No data found within the specified address range.',
    );
  }
  const { image } = result;

  writeImageFile(options.output, image);
  print(`Successfully created binary file: ${options.output}`);
  print(`Size: ${image.length} bytes`);

  const checksum = crc32(image);
  print(`Generated Hash: ${formatCrc32(checksum)}`);

  return { output: options.output, size: image.length, checksum, bytesInRange: map.size };
}
