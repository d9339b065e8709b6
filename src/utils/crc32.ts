import { hex } from './bit.js';

/** Reflected form of the IEEE 802.3 polynomial 0x04C11DB7 */
export const CRC32_POLYNOMIAL = 0xedb88320;

/**
 * CRC-32 as used by zlib and the firmware's flash verification:
 * initial value 0xFFFFFFFF, reflected input and output, final XOR 0xFFFFFFFF.
 */
export function crc32(data: Uint8Array): number {
  let crc = 0xffffffff;

  for (let i = 0; i < data.length; i++) {
    crc ^= data[i];
    for (let j = 0; j < 8; j++) {
      if (crc & 1) {
        crc = (crc >>> 1) ^ CRC32_POLYNOMIAL;
      } else {
        crc = crc >>> 1;
      }
    }
  }

  return (crc ^ 0xffffffff) >>> 0;
}

export function formatCrc32(crc: number) {
  return `0x${hex(crc >>> 0, 8)}`;
}
