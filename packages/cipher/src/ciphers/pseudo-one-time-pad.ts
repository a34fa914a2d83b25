/**
 * Pseudo one-time pad.
 *
 * Every letter is shifted by a fresh draw from a keystream seeded from the
 * key. Peers stay in step only by drawing in exactly the same order: one
 * draw per letter encrypted or decrypted, nothing skipped, nothing replayed.
 * A missed or extra draw on either side desynchronises the pair for good.
 */

import { CipherName } from '@parley/shared';
import { ALPHABET_SIZE, letterIndex, shiftChar } from '../alphabet.js';
import { ConstructionError, InvalidInputError } from '../errors.js';
import { KeystreamGenerator } from '../keystream.js';

/** Keys up to this length feed only the low half of the seed */
const LOW_HALF_CHARS = 32;

export interface PseudoOneTimePad {
  readonly kind: CipherName.PSEUDO_ONE_TIME_PAD;
  readonly keystream: KeystreamGenerator;
}

/**
 * Builds a pad from a raw 64-bit seed or from a string key.
 *
 * @throws ConstructionError if the key is null
 */
export function pseudoOneTimePad(key: bigint | string | null): PseudoOneTimePad {
  if (key === null) {
    throw new ConstructionError('null not allowed for key');
  }
  const seed = typeof key === 'bigint' ? key : deriveSeed(key);
  const cipher: PseudoOneTimePad = {
    kind: CipherName.PSEUDO_ONE_TIME_PAD,
    keystream: new KeystreamGenerator(seed),
  };
  return Object.freeze(cipher);
}

/**
 * 32-bit polynomial string hash (h = 31h + c over UTF-16 code units),
 * returned as a signed integer.
 */
export function stringHash(s: string): number {
  let h = 0;
  for (let i = 0; i < s.length; i++) {
    h = (Math.imul(31, h) + s.charCodeAt(i)) | 0;
  }
  return h;
}

export function reverseBits64(x: bigint): bigint {
  let v = BigInt.asUintN(64, x);
  let r = 0n;
  for (let i = 0; i < 64; i++) {
    r = (r << 1n) | (v & 1n);
    v >>= 1n;
  }
  return r;
}

/**
 * Seed for a string key: the hash of the first 32 characters, sign-extended
 * to 64 bits, XOR the bit-reversed hash of the remaining characters.
 */
export function deriveSeed(key: string): bigint {
  const low = stringHash(key.slice(0, LOW_HALF_CHARS));
  const high = key.length > LOW_HALF_CHARS ? stringHash(key.slice(LOW_HALF_CHARS)) : 0;
  return BigInt.asUintN(64, BigInt(low)) ^ reverseBits64(BigInt(high));
}

export function padEncrypt(cipher: PseudoOneTimePad, preptext: string): string {
  return padShift(cipher, preptext, 1);
}

export function padDecrypt(cipher: PseudoOneTimePad, ciphertext: string): string {
  return padShift(cipher, ciphertext, -1);
}

/**
 * Text with any character outside ALPHABET is rejected before the first
 * draw, so a failed call leaves the keystream where it was.
 */
function padShift(cipher: PseudoOneTimePad, text: string, direction: 1 | -1): string {
  for (const c of text) {
    if (letterIndex(c) < 0) {
      throw new InvalidInputError(`Character '${c}' not in ALPHABET`);
    }
  }
  let out = '';
  for (const c of text) {
    out += shiftChar(c, direction * cipher.keystream.next(ALPHABET_SIZE));
  }
  return out;
}
