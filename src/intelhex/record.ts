import { hex, u8 } from '../utils/bit.js';

export const RECORD_START = ':';

const TYPE_DATA = 0x00;
const TYPE_END_OF_FILE = 0x01;
const TYPE_EXTENDED_LINEAR_ADDRESS = 0x04;

// ':' + byte count (2) + address (4) + record type (2)
const HEADER_LENGTH = 9;

export enum RecordType {
  Data,
  EndOfFile,
  ExtendedLinearAddress,
  Other,
}

export interface HexRecord {
  byteCount: number;
  addressOffset: number;
  recordType: RecordType;
  /** Raw record type byte, kept for records decoded as `Other` */
  typeCode: number;
  data: Uint8Array;
  /** Trailing integrity byte, `undefined` if the line ends after the data */
  checksum?: number;
}

export interface ParseFailure {
  line: string;
  reason: string;
}

export type DecodeResult =
  | { ok: true; record: HexRecord | null }
  | { ok: false; failure: ParseFailure };

export interface DecodeOptions {
  /** Reject records whose integrity byte is missing or wrong */
  verifyChecksum?: boolean;
}

const HEX_DIGITS = /^[0-9a-fA-F]+$/;

function recordTypeOf(typeCode: number) {
  switch (typeCode) {
    case TYPE_DATA:
      return RecordType.Data;
    case TYPE_END_OF_FILE:
      return RecordType.EndOfFile;
    case TYPE_EXTENDED_LINEAR_ADDRESS:
      return RecordType.ExtendedLinearAddress;
    default:
      return RecordType.Other;
  }
}

/** Two's complement of the low byte of the sum of all record bytes */
export function recordChecksum(record: Omit<HexRecord, 'checksum' | 'recordType'>) {
  let sum = record.byteCount + (record.addressOffset >> 8) + (record.addressOffset & 0xff);
  sum += record.typeCode;
  for (const byte of record.data) {
    sum += byte;
  }
  return u8(0x100 - u8(sum));
}

/**
 * Decodes a single Intel HEX line. Lines without the ':' start marker are not
 * records and come back as `{ ok: true, record: null }`.
 */
export function decodeRecord(source: string, options: DecodeOptions = {}): DecodeResult {
  const line = source.trimEnd();
  if (line[0] !== RECORD_START) {
    return { ok: true, record: null };
  }

  const fail = (reason: string): DecodeResult => ({ ok: false, failure: { line, reason } });

  const field = (name: string, start: number, digits: number) => {
    const text = line.substring(start, start + digits);
    return text.length === digits && HEX_DIGITS.test(text) ? parseInt(text, 16) : name;
  };

  if (line.length < HEADER_LENGTH) {
    return fail('line too short for a record header');
  }

  const byteCount = field('byte count', 1, 2);
  if (typeof byteCount === 'string') {
    return fail(`invalid hex digits in ${byteCount}`);
  }
  const addressOffset = field('address', 3, 4);
  if (typeof addressOffset === 'string') {
    return fail(`invalid hex digits in ${addressOffset}`);
  }
  const typeCode = field('record type', 7, 2);
  if (typeof typeCode === 'string') {
    return fail(`invalid hex digits in ${typeCode}`);
  }

  const dataEnd = HEADER_LENGTH + byteCount * 2;
  if (line.length < dataEnd) {
    return fail(`line too short for ${byteCount} data bytes`);
  }

  const data = new Uint8Array(byteCount);
  for (let i = 0; i < byteCount; i++) {
    const value = field('data', HEADER_LENGTH + i * 2, 2);
    if (typeof value === 'string') {
      return fail(`invalid hex digits in ${value}`);
    }
    data[i] = value;
  }

  // The integrity byte is optional and only has to be well-formed in strict mode
  let checksum: number | undefined;
  if (line.length > dataEnd) {
    const value = field('checksum', dataEnd, 2);
    if (typeof value === 'number') {
      checksum = value;
    } else if (options.verifyChecksum) {
      return fail(`invalid hex digits in ${value}`);
    }
  }

  const recordType = recordTypeOf(typeCode);
  if (recordType === RecordType.ExtendedLinearAddress && byteCount < 2) {
    return fail('extended linear address record must carry 2 data bytes');
  }

  if (options.verifyChecksum) {
    if (checksum === undefined) {
      return fail('missing checksum byte');
    }
    const expected = recordChecksum({ byteCount, addressOffset, typeCode, data });
    if (expected !== checksum) {
      return fail(`checksum mismatch: expected ${hex(expected, 2)}, found ${hex(checksum, 2)}`);
    }
  }

  return {
    ok: true,
    record: { byteCount, addressOffset, recordType, typeCode, data, checksum },
  };
}

/** Upper 16 address bits carried by an Extended Linear Address record (its first 2 data bytes) */
export function extendedAddressOf(record: HexRecord) {
  return (record.data[0] << 8) | record.data[1];
}
