import { CipherName } from '@parley/shared';
import { ALPHABET_SIZE, letterIndex, mod, shift } from '../alphabet.js';
import { ConstructionError } from '../errors.js';

/** Shifts every letter by the same amount. */
export interface CaesarCipher {
  readonly kind: CipherName.CAESAR_CIPHER;
  /** In [0, 26) */
  readonly shift: number;
}

/**
 * Builds a Caesar cipher from a shift amount, or from a key whose first
 * character is the letter the shift lands on ("A" = 0, "B" = 1, ...).
 * The key is not cleaned: its first character must already be an
 * uppercase letter.
 *
 * @throws ConstructionError if the key is null, empty, non-integral, or
 *         starts with anything but A-Z
 */
export function caesarCipher(key: number | string | null): CaesarCipher {
  let amount: number;
  if (typeof key === 'number') {
    if (!Number.isInteger(key)) {
      throw new ConstructionError(`Shift must be an integer, got ${key}`);
    }
    amount = mod(key, ALPHABET_SIZE);
  } else {
    if (key === null || key.length === 0) {
      throw new ConstructionError('Need a non-null, non-empty string');
    }
    amount = letterIndex(key[0]);
    if (amount < 0) {
      throw new ConstructionError("First character of 'key' argument not in ALPHABET");
    }
  }
  const cipher: CaesarCipher = { kind: CipherName.CAESAR_CIPHER, shift: amount };
  return Object.freeze(cipher);
}

export function caesarEncrypt(cipher: CaesarCipher, preptext: string): string {
  return shift(preptext, cipher.shift);
}

export function caesarDecrypt(cipher: CaesarCipher, ciphertext: string): string {
  return shift(ciphertext, -cipher.shift);
}
