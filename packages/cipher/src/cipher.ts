/**
 * Parley - Cipher dispatch
 *
 * Every cipher is a frozen value tagged with its CipherName. The three
 * operations below switch on that tag; call them in order
 * prepare -> encrypt on the sending side and decrypt on the receiving side.
 * decrypt(encrypt(x)) === x for every x that prepare can return.
 */

import { CipherName } from '@parley/shared';
import { clean } from './alphabet.js';
import { UnknownCipherNameError } from './errors.js';
import { caesarCipher, caesarDecrypt, caesarEncrypt, type CaesarCipher } from './ciphers/caesar-cipher.js';
import { nullCipher, type NullCipher } from './ciphers/null-cipher.js';
import {
  playfairCipher,
  playfairDecrypt,
  playfairEncrypt,
  playfairPrepare,
  type PlayfairCipher,
} from './ciphers/playfair-cipher.js';
import {
  padDecrypt,
  padEncrypt,
  pseudoOneTimePad,
  type PseudoOneTimePad,
} from './ciphers/pseudo-one-time-pad.js';
import { vignereCipher, vignereDecrypt, vignereEncrypt, type VignereCipher } from './ciphers/vignere-cipher.js';

export type Cipher = NullCipher | CaesarCipher | VignereCipher | PlayfairCipher | PseudoOneTimePad;

/**
 * Parses a cipher name, ignoring case and surrounding whitespace.
 *
 * @throws UnknownCipherNameError
 */
export function parseCipherName(str: string): CipherName {
  const upper = str.trim().toUpperCase();
  const name = Object.values(CipherName).find((n) => n === upper);
  if (!name) {
    throw new UnknownCipherNameError(str);
  }
  return name;
}

/**
 * Builds a cipher of the given kind from a key.
 *
 * @throws ConstructionError if the key is not valid for that cipher
 */
export function createCipher(name: CipherName, key: string | null): Cipher {
  switch (name) {
    case CipherName.NULL_CIPHER:
      return nullCipher(key);
    case CipherName.CAESAR_CIPHER:
      return caesarCipher(key);
    case CipherName.VIGNERE_CIPHER:
      return vignereCipher(key);
    case CipherName.PLAYFAIR_CIPHER:
      return playfairCipher(key);
    case CipherName.PSEUDO_ONE_TIME_PAD:
      return pseudoOneTimePad(key);
  }
}

/** Sanitizes arbitrary text into something the cipher can encrypt. */
export function prepare(cipher: Cipher, cleartext: string): string {
  switch (cipher.kind) {
    case CipherName.NULL_CIPHER:
      return cleartext;
    case CipherName.PLAYFAIR_CIPHER:
      return playfairPrepare(cleartext);
    case CipherName.CAESAR_CIPHER:
    case CipherName.VIGNERE_CIPHER:
    case CipherName.PSEUDO_ONE_TIME_PAD:
      return clean(cleartext);
  }
}

/** @throws InvalidInputError if preptext is not prepared text */
export function encrypt(cipher: Cipher, preptext: string): string {
  switch (cipher.kind) {
    case CipherName.NULL_CIPHER:
      return preptext;
    case CipherName.CAESAR_CIPHER:
      return caesarEncrypt(cipher, preptext);
    case CipherName.VIGNERE_CIPHER:
      return vignereEncrypt(cipher, preptext);
    case CipherName.PLAYFAIR_CIPHER:
      return playfairEncrypt(cipher, preptext);
    case CipherName.PSEUDO_ONE_TIME_PAD:
      return padEncrypt(cipher, preptext);
  }
}

/** @throws InvalidInputError if ciphertext could not have come from encrypt */
export function decrypt(cipher: Cipher, ciphertext: string): string {
  switch (cipher.kind) {
    case CipherName.NULL_CIPHER:
      return ciphertext;
    case CipherName.CAESAR_CIPHER:
      return caesarDecrypt(cipher, ciphertext);
    case CipherName.VIGNERE_CIPHER:
      return vignereDecrypt(cipher, ciphertext);
    case CipherName.PLAYFAIR_CIPHER:
      return playfairDecrypt(cipher, ciphertext);
    case CipherName.PSEUDO_ONE_TIME_PAD:
      return padDecrypt(cipher, ciphertext);
  }
}
