import { CipherName } from '@parley/shared';
import { clean, letterIndex, shiftChar } from '../alphabet.js';
import { ConstructionError } from '../errors.js';

/** Shifts letter i by the value of key letter (i mod key length). */
export interface VignereCipher {
  readonly kind: CipherName.VIGNERE_CIPHER;
  readonly key: string;
  readonly shifts: readonly number[];
}

/**
 * @throws ConstructionError if the key is null, empty, or holds anything
 *         but uppercase letters (keys are rejected, not cleaned)
 */
export function vignereCipher(key: string | null): VignereCipher {
  if (key === null || key.length === 0) {
    throw new ConstructionError('Key is null or empty');
  }
  if (clean(key) !== key) {
    throw new ConstructionError('Key contains a non-ALPHABET character');
  }
  const shifts = Object.freeze(Array.from(key, letterIndex));
  const cipher: VignereCipher = { kind: CipherName.VIGNERE_CIPHER, key, shifts };
  return Object.freeze(cipher);
}

export function vignereEncrypt(cipher: VignereCipher, preptext: string): string {
  return vignereShift(cipher, preptext, 1);
}

export function vignereDecrypt(cipher: VignereCipher, ciphertext: string): string {
  return vignereShift(cipher, ciphertext, -1);
}

function vignereShift(cipher: VignereCipher, text: string, direction: 1 | -1): string {
  const { shifts } = cipher;
  let out = '';
  for (let i = 0; i < text.length; i++) {
    out += shiftChar(text[i], direction * shifts[i % shifts.length]);
  }
  return out;
}
