/**
 * Parley - Keystream generator
 *
 * Deterministic pseudo-random source for the pseudo one-time pad.
 * Output is SHA-1 in counter mode over the 64-bit seed:
 *
 *   block_i = SHA1(seed as 8 bytes BE || i as 8 bytes BE)
 *
 * consumed as big-endian 32-bit words. The sequence depends on the seed
 * alone, so two generators built from the same seed produce the same
 * values for the same sequence of draws. There is no peek, rewind or clone.
 */

import { createHash } from 'crypto';
import { InvalidInputError } from './errors.js';

const TWO_POW_31 = 0x8000_0000;

export class KeystreamGenerator {
  private readonly seedBytes: Buffer;
  private counter = 0n;
  private block: Buffer = Buffer.alloc(0);
  private offset = 0;

  constructor(seed: bigint) {
    this.seedBytes = Buffer.alloc(8);
    this.seedBytes.writeBigUInt64BE(BigInt.asUintN(64, seed));
  }

  /**
   * Draws the next value, uniform in [0, bound).
   *
   * @throws InvalidInputError if bound is not an integer in [1, 2^31]
   */
  next(bound: number): number {
    if (!Number.isInteger(bound) || bound < 1 || bound > TWO_POW_31) {
      throw new InvalidInputError(`bound must be an integer in [1, 2^31], got ${bound}`);
    }
    // Reject the top partial range so every residue is equally likely.
    const limit = TWO_POW_31 - (TWO_POW_31 % bound);
    for (;;) {
      const value = this.nextWord() >>> 1;
      if (value < limit) {
        return value % bound;
      }
    }
  }

  private nextWord(): number {
    if (this.offset + 4 > this.block.length) {
      this.refill();
    }
    const word = this.block.readUInt32BE(this.offset);
    this.offset += 4;
    return word;
  }

  private refill(): void {
    const counterBytes = Buffer.alloc(8);
    counterBytes.writeBigUInt64BE(this.counter);
    this.counter += 1n;
    this.block = createHash('sha1').update(this.seedBytes).update(counterBytes).digest();
    this.offset = 0;
  }
}
