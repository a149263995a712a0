/**
 * COPY address cache
 *
 * Addresses are encoded relative to recently used addresses:
 * - mode 0 (SELF): the address itself
 * - mode 1 (HERE): distance back from the current position
 * - modes 2 .. 2+nearSize-1: offset from one of the last nearSize addresses
 * - remaining modes: exact match in a table hashed by address mod (sameSize*256),
 *   selected by a single raw byte
 *
 * Both caches are cleared at the start of every window.
 */

import type { ByteCursor } from '../lib/ByteCursor.ts';
import { readVarint } from '../lib/varint.ts';
import { VCD_HERE, VCD_SELF } from '../types.ts';
import { VcdiffError } from '../VcdiffError.ts';

export class AddressCache {
  readonly nearSize: number;
  readonly sameSize: number;
  private near: number[];
  private nextNearSlot: number;
  private same: number[];

  constructor(nearSize: number, sameSize: number) {
    this.nearSize = nearSize;
    this.sameSize = sameSize;
    this.near = new Array<number>(nearSize).fill(0);
    this.nextNearSlot = 0;
    this.same = new Array<number>(sameSize * 256).fill(0);
  }

  reset(): void {
    this.nextNearSlot = 0;
    this.near.fill(0);
    this.same.fill(0);
  }

  /**
   * Decode one COPY address
   *
   * @param here - Current position in the source+target address space
   * @param mode - Address mode from the code table
   * @param addresses - Cursor over the window's addresses section
   */
  decodeAddress(here: number, mode: number, addresses: ByteCursor): number {
    let address: number;

    if (mode === VCD_SELF) {
      address = readVarint(addresses);
    } else if (mode === VCD_HERE) {
      address = here - readVarint(addresses);
    } else if (mode - 2 < this.nearSize) {
      address = this.near[mode - 2] + readVarint(addresses);
    } else if (mode - 2 - this.nearSize < this.sameSize) {
      const m = mode - 2 - this.nearSize;
      address = this.same[m * 256 + addresses.readByte()];
    } else {
      throw new VcdiffError('InvalidAddress', `Invalid address mode ${mode} (near cache ${this.nearSize}, same cache ${this.sameSize})`);
    }

    if (address < 0 || address >= here) {
      throw new VcdiffError('InvalidAddress', `COPY address ${address} is outside of the ${here} byte(s) available (mode ${mode})`);
    }

    this.update(address);
    return address;
  }

  private update(address: number): void {
    if (this.nearSize > 0) {
      this.near[this.nextNearSlot] = address;
      this.nextNearSlot = (this.nextNearSlot + 1) % this.nearSize;
    }
    if (this.sameSize > 0) {
      this.same[address % (this.sameSize * 256)] = address;
    }
  }
}
