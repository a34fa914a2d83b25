import { describe, it, expect } from 'vitest';
import { CipherName } from '@parley/shared';
import { createCipher, decrypt, encrypt, parseCipherName, prepare } from '../cipher.js';
import { ConstructionError, UnknownCipherNameError } from '../errors.js';

const samples = [
  '',
  'a',
  'Hello, World!',
  'BALLOON',
  'The quick brown fox jumps over the lazy dog',
  'xx zz jj',
  'Meet me at the usual place at 10 rather than 8 o’clock',
];

const keysByCipher: Record<CipherName, string[]> = {
  [CipherName.NULL_CIPHER]: ['KEY', ''],
  [CipherName.CAESAR_CIPHER]: ['B', 'ABCDEF', 'XYZ'],
  [CipherName.VIGNERE_CIPHER]: ['A', 'ABCD', 'ZYXWVUTSR'],
  [CipherName.PLAYFAIR_CIPHER]: ['', ' ', '  ABC', '# James T. Kirk'],
  [CipherName.PSEUDO_ONE_TIME_PAD]: ['', ' ', 'a', ' qwertyuio pasdfgh jklzx cvbnm'],
};

describe('cipher dispatch', () => {
  describe('parseCipherName', () => {
    it('should accept names in any case', () => {
      expect(parseCipherName('CAESAR_CIPHER')).toBe(CipherName.CAESAR_CIPHER);
      expect(parseCipherName('playfair_cipher')).toBe(CipherName.PLAYFAIR_CIPHER);
      expect(parseCipherName(' Pseudo_One_Time_Pad ')).toBe(CipherName.PSEUDO_ONE_TIME_PAD);
    });

    it('should reject unknown names', () => {
      expect(() => parseCipherName('ENIGMA')).toThrow(UnknownCipherNameError);
      expect(() => parseCipherName('ENIGMA')).toThrow("Unknown cipher 'ENIGMA'");
    });

    it('should count an unknown name as a construction failure', () => {
      expect(new UnknownCipherNameError('x')).toBeInstanceOf(ConstructionError);
    });
  });

  describe('createCipher', () => {
    it('should tag each cipher with its name', () => {
      for (const name of Object.values(CipherName)) {
        const cipher = createCipher(name, keysByCipher[name][0]);
        expect(cipher.kind).toBe(name);
        expect(Object.isFrozen(cipher)).toBe(true);
      }
    });

    it('should reject a null key for every cipher but the null cipher', () => {
      expect(createCipher(CipherName.NULL_CIPHER, null).kind).toBe(CipherName.NULL_CIPHER);
      for (const name of [
        CipherName.CAESAR_CIPHER,
        CipherName.VIGNERE_CIPHER,
        CipherName.PLAYFAIR_CIPHER,
        CipherName.PSEUDO_ONE_TIME_PAD,
      ]) {
        expect(() => createCipher(name, null)).toThrow(ConstructionError);
      }
    });
  });

  describe('round trip', () => {
    for (const name of Object.values(CipherName)) {
      it(`should decrypt what it encrypts with ${name}`, () => {
        for (const key of keysByCipher[name]) {
          // separate sender and receiver so keystream ciphers stay in step
          const sender = createCipher(name, key);
          const receiver = createCipher(name, key);
          for (const text of samples) {
            const prepped = prepare(sender, text);
            expect(decrypt(receiver, encrypt(sender, prepped))).toBe(prepped);
          }
        }
      });
    }
  });

  it('should keep only letters when preparing for substitution ciphers', () => {
    const text = 'Hi there, 42!';
    expect(prepare(createCipher(CipherName.CAESAR_CIPHER, 'B'), text)).toBe('HITHERE');
    expect(prepare(createCipher(CipherName.VIGNERE_CIPHER, 'B'), text)).toBe('HITHERE');
    expect(prepare(createCipher(CipherName.PSEUDO_ONE_TIME_PAD, 'B'), text)).toBe('HITHERE');
    expect(prepare(createCipher(CipherName.PLAYFAIR_CIPHER, 'B'), text)).toBe('HITHEREZ');
    expect(prepare(createCipher(CipherName.NULL_CIPHER, 'B'), text)).toBe(text);
  });
});
