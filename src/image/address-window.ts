import { ConversionError, ErrorKind } from '../errors.js';
import { hex } from '../utils/bit.js';

export const MAX_ADDRESS_SPACE = 0x1_0000_0000;

export interface AddressWindow {
  readonly start: number;
  readonly size: number;
  /** Exclusive upper bound, `start + size` */
  readonly end: number;
}

export function createAddressWindow(start: number, size: number): AddressWindow {
  if (!Number.isInteger(start) || start < 0 || start >= MAX_ADDRESS_SPACE) {
    throw new ConversionError(ErrorKind.Usage, `Invalid start address: ${start}`);
  }
  if (!Number.isInteger(size) || size < 0 || size >= MAX_ADDRESS_SPACE) {
    throw new ConversionError(ErrorKind.Usage, `Invalid size: ${size}`);
  }
  const end = start + size;
  if (end > MAX_ADDRESS_SPACE) {
    throw new ConversionError(
      ErrorKind.Usage,
      `Address window 0x${hex(start, 8)} + 0x${hex(size, 8)} exceeds the 32-bit address space`,
    );
  }
  return { start, size, end };
}

export function windowContains(window: AddressWindow, address: number) {
  return address >= window.start && address < window.end;
}

const HEX_NUMBER = /^(0[xX])?([0-9a-fA-F]{1,8})$/;

/** Parses a 32-bit hexadecimal command-line value, with or without `0x`. */
export function parseHexNumber(text: string, what: string) {
  const match = HEX_NUMBER.exec(text.trim());
  if (!match) {
    throw new ConversionError(ErrorKind.Usage, `Invalid ${what}: "${text}"`);
  }
  return parseInt(match[2], 16);
}
