import { describe, expect, it } from 'vitest';
import { ConversionError, ErrorKind } from '../errors.js';
import { createAddressWindow, parseHexNumber, windowContains } from './address-window.js';

describe('createAddressWindow', () => {
  it('should compute the exclusive end', () => {
    expect(createAddressWindow(0x08000000, 0x10)).toEqual({
      start: 0x08000000,
      size: 0x10,
      end: 0x08000010,
    });
  });

  it('should accept a window ending exactly at the top of the address space', () => {
    expect(createAddressWindow(0xfffffff0, 0x10).end).toBe(0x100000000);
  });

  it('should reject a window that overflows 32 bits', () => {
    expect(() => createAddressWindow(0xfffffff0, 0x11)).toThrow(
      'Address window 0xFFFFFFF0 + 0x00000011 exceeds the 32-bit address space',
    );
  });

  it('should report overflow as a usage error', () => {
    try {
      createAddressWindow(0xffffffff, 0x2);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConversionError);
      expect(err instanceof ConversionError && err.kind).toBe(ErrorKind.Usage);
    }
  });
});

describe('windowContains', () => {
  it('should include the start and exclude the end', () => {
    const window = createAddressWindow(0x1000, 0x100);
    expect(windowContains(window, 0x0fff)).toBe(false);
    expect(windowContains(window, 0x1000)).toBe(true);
    expect(windowContains(window, 0x10ff)).toBe(true);
    expect(windowContains(window, 0x1100)).toBe(false);
  });
});

describe('parseHexNumber', () => {
  it('should parse values with and without the 0x prefix', () => {
    expect(parseHexNumber('0x08000000', 'start address')).toBe(0x08000000);
    expect(parseHexNumber('0XE738', 'size')).toBe(0xe738);
    expect(parseHexNumber('e4f0', 'size')).toBe(0xe4f0);
    expect(parseHexNumber('FFFFFFFF', 'size')).toBe(0xffffffff);
  });

  it('should reject values that are not 32-bit hexadecimal numbers', () => {
    expect(() => parseHexNumber('zz', 'start address')).toThrow('Invalid start address: "zz"');
    expect(() => parseHexNumber('0x', 'size')).toThrow('Invalid size: "0x"');
    expect(() => parseHexNumber('100000000', 'size')).toThrow('Invalid size: "100000000"');
    expect(() => parseHexNumber('-1', 'size')).toThrow('Invalid size: "-1"');
  });
});
