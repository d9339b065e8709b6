import { describe, expect, it } from 'vitest';
import { createAddressWindow } from './address-window.js';
import { SparseByteMap } from './sparse-byte-map.js';

describe('SparseByteMap', () => {
  it('should store bytes inside the window', () => {
    const map = new SparseByteMap(createAddressWindow(0x100, 0x10));
    expect(map.set(0x100, 0xaa)).toBe(true);
    expect(map.set(0x10f, 0xbb)).toBe(true);
    expect(map.size).toBe(2);
    expect(map.get(0x100)).toBe(0xaa);
    expect(map.get(0x10f)).toBe(0xbb);
  });

  it('should drop bytes outside the window', () => {
    const map = new SparseByteMap(createAddressWindow(0x100, 0x10));
    expect(map.set(0xff, 0x01)).toBe(false);
    expect(map.set(0x110, 0x02)).toBe(false);
    expect(map.size).toBe(0);
    expect(map.get(0xff)).toBeUndefined();
  });

  it('should keep the last write for an address', () => {
    const map = new SparseByteMap(createAddressWindow(0, 4));
    map.set(2, 0x11);
    map.set(2, 0x22);
    expect(map.size).toBe(1);
    expect(Array.from(map.entries())).toEqual([[2, 0x22]]);
  });
});
