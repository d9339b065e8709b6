import { u16, u32 } from '../utils/bit.js';

/**
 * Upper address bits set by Extended Linear Address records. The value
 * sticks until the next such record.
 */
export class AddressState {
  private upper = 0;

  get base() {
    return this.upper;
  }

  onExtendedAddress(upper16: number) {
    this.upper = u32(u16(upper16) << 16);
  }

  resolve(offset: number) {
    return u32(this.upper + offset);
  }
}
