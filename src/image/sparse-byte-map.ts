import { u8 } from '../utils/bit.js';
import { windowContains, type AddressWindow } from './address-window.js';

/**
 * Address to byte associations, restricted to one address window. Bytes
 * outside the window are dropped on insertion, so memory use never exceeds
 * the window size.
 */
export class SparseByteMap {
  private readonly bytes = new Map<number, number>();

  constructor(readonly window: AddressWindow) {}

  get size() {
    return this.bytes.size;
  }

  /** Returns false if the address lies outside the window and was dropped. */
  set(address: number, value: number) {
    if (!windowContains(this.window, address)) {
      return false;
    }
    this.bytes.set(address, u8(value));
    return true;
  }

  get(address: number) {
    return this.bytes.get(address);
  }

  entries() {
    return this.bytes.entries();
  }
}
