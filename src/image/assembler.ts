import { windowContains, type AddressWindow } from './address-window.js';
import type { SparseByteMap } from './sparse-byte-map.js';

/** Value of unprogrammed flash */
export const ERASE_VALUE = 0xff;

export enum AssemblyFailure {
  EmptyRange,
}

export type AssemblyResult =
  | { ok: true; image: Uint8Array }
  | { ok: false; failure: AssemblyFailure };

export function assembleImage(window: AddressWindow, map: SparseByteMap): AssemblyResult {
  const image = new Uint8Array(window.size).fill(ERASE_VALUE);
  let filled = 0;
  for (const [address, value] of map.entries()) {
    // A map may have been collected for a wider window than the one assembled
    if (windowContains(window, address)) {
      image[address - window.start] = value;
      filled++;
    }
  }
  if (!filled) {
    return { ok: false, failure: AssemblyFailure.EmptyRange };
  }
  return { ok: true, image };
}
