import { describe, expect, it } from 'vitest';
import { AddressState } from './address-state.js';

describe('AddressState', () => {
  it('should start with a zero base', () => {
    const state = new AddressState();
    expect(state.base).toBe(0);
    expect(state.resolve(0x1234)).toBe(0x1234);
  });

  it('should shift the upper half into position', () => {
    const state = new AddressState();
    state.onExtendedAddress(0x0800);
    expect(state.base).toBe(0x08000000);
    expect(state.resolve(0x0010)).toBe(0x08000010);
  });

  it('should produce unsigned addresses above 0x80000000', () => {
    const state = new AddressState();
    state.onExtendedAddress(0xffff);
    expect(state.base).toBe(0xffff0000);
    expect(state.resolve(0xfffe)).toBe(0xfffffffe);
  });

  it('should keep the last value until overwritten', () => {
    const state = new AddressState();
    state.onExtendedAddress(0x1000);
    state.onExtendedAddress(0x2000);
    expect(state.base).toBe(0x20000000);
  });
});
