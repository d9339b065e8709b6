export function u8(n: number) {
  return n & 0xff;
}

export function u16(n: number) {
  return n & 0xffff;
}

export function u32(n: number) {
  return n >>> 0;
}

export function hex(value: number, digits: number) {
  return value.toString(16).toUpperCase().padStart(digits, '0');
}
