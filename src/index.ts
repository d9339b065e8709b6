export { runCommand, USAGE, type CommandFlags, type CommandIO } from './command.js';
export { convertHexFile, type ConversionSummary, type ConvertOptions } from './convert.js';
export { ConversionError, ErrorKind } from './errors.js';
export { HexLoader, type LoadStats } from './hex-loader.js';
export { AddressState } from './image/address-state.js';
export {
  createAddressWindow,
  MAX_ADDRESS_SPACE,
  parseHexNumber,
  windowContains,
  type AddressWindow,
} from './image/address-window.js';
export {
  assembleImage,
  AssemblyFailure,
  ERASE_VALUE,
  type AssemblyResult,
} from './image/assembler.js';
export { SparseByteMap } from './image/sparse-byte-map.js';
export {
  decodeRecord,
  extendedAddressOf,
  recordChecksum,
  RecordType,
  type DecodeOptions,
  type DecodeResult,
  type HexRecord,
  type ParseFailure,
} from './intelhex/record.js';
export { crc32, CRC32_POLYNOMIAL, formatCrc32 } from './utils/crc32.js';
export { ConsoleLogger, LogLevel, type Logger, type LogSink } from './utils/logging.js';
