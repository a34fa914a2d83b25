import { describe, it, expect } from 'vitest';
import {
  playfairCipher,
  playfairDecrypt,
  playfairEncrypt,
  playfairPrepare,
  playfairRows,
} from '../ciphers/playfair-cipher.js';
import { ConstructionError, InvalidInputError } from '../errors.js';

describe('PlayfairCipher', () => {
  describe('matrix', () => {
    it('should be the plain alphabet without J for an empty key', () => {
      const cipher = playfairCipher('');
      expect(cipher.matrix.letters).toBe('ABCDEFGHIKLMNOPQRSTUVWXYZ');
      expect(playfairRows(cipher)).toEqual(['ABCDE', 'FGHIK', 'LMNOP', 'QRSTU', 'VWXYZ']);
    });

    it('should put the deduplicated key first', () => {
      const cipher = playfairCipher('playfair example');
      expect(playfairRows(cipher)).toEqual(['PLAYF', 'IREXM', 'BCDGH', 'KNOQS', 'TUVWZ']);
    });

    it('should fold J into I', () => {
      const cipher = playfairCipher('# James T. Kirk');
      expect(cipher.matrix.letters.startsWith('IAMESTKR')).toBe(true);
      expect(cipher.matrix.letters).not.toContain('J');
      expect(new Set(cipher.matrix.letters).size).toBe(25);
    });

    it('should index every letter by row and column', () => {
      const cipher = playfairCipher('');
      expect(cipher.matrix.positions.get('A')).toEqual({ row: 0, col: 0 });
      expect(cipher.matrix.positions.get('K')).toEqual({ row: 1, col: 4 });
      expect(cipher.matrix.positions.get('Z')).toEqual({ row: 4, col: 4 });
      expect(cipher.matrix.positions.has('J')).toBe(false);
    });

    it('should reject a null key', () => {
      expect(() => playfairCipher(null)).toThrow(ConstructionError);
    });

    it('should accept keys with spaces and punctuation', () => {
      for (const key of [' ', '  ABC', '# James T. Kirk']) {
        expect(playfairCipher(key).matrix.letters).toHaveLength(25);
      }
    });
  });

  describe('prepare', () => {
    it('should split doubled letters with X', () => {
      expect(playfairPrepare('BALLOON')).toBe('BALXLOON');
    });

    it('should pad odd-length text with Z', () => {
      expect(playfairPrepare('HELLO')).toBe('HELXLO');
      expect(playfairPrepare('APPLE')).toBe('APPLEZ');
    });

    it('should only split doubles that fall inside one pair', () => {
      expect(playfairPrepare('ABBA')).toBe('ABBA');
      expect(playfairPrepare('AABB')).toBe('AXABBZ');
    });

    it('should fold J into I before pairing', () => {
      expect(playfairPrepare('jig')).toBe('IXIG');
    });

    it('should never leave an identical pair', () => {
      expect(playfairPrepare('XX')).toBe('XQXZ');
      expect(playfairPrepare('Z')).toBe('ZX');
      expect(playfairPrepare('ZZ')).toBe('ZXZX');
    });

    it('should return empty text for empty or letterless input', () => {
      expect(playfairPrepare('')).toBe('');
      expect(playfairPrepare('42!')).toBe('');
    });
  });

  describe('encrypt / decrypt', () => {
    const cipher = playfairCipher('playfair example');
    const prepped = playfairPrepare('Hide the gold in the tree stump');

    it('should prepare the classic example', () => {
      expect(prepped).toBe('HIDETHEGOLDINTHETREXESTUMP');
    });

    it('should encrypt the classic example', () => {
      expect(playfairEncrypt(cipher, prepped)).toBe('BMODZBXDNABEKUDMUIXMMOUVIF');
    });

    it('should decrypt back to the prepared text', () => {
      expect(playfairDecrypt(cipher, 'BMODZBXDNABEKUDMUIXMMOUVIF')).toBe(prepped);
    });

    it('should wrap rows and columns', () => {
      const plain = playfairCipher('');
      // same row, wraps past the last column
      expect(playfairEncrypt(plain, 'DE')).toBe('EA');
      expect(playfairDecrypt(plain, 'EA')).toBe('DE');
      // same column, wraps past the last row
      expect(playfairEncrypt(plain, 'PZ')).toBe('UE');
      expect(playfairDecrypt(plain, 'UE')).toBe('PZ');
    });

    it('should reject odd-length text', () => {
      expect(() => playfairEncrypt(cipher, 'ABC')).toThrow(InvalidInputError);
    });

    it('should reject an identical digram', () => {
      expect(() => playfairEncrypt(cipher, 'LL')).toThrow('Same-letter digram, cannot encrypt/decrypt');
      expect(() => playfairDecrypt(cipher, 'ABLL')).toThrow(InvalidInputError);
    });

    it('should reject letters missing from the matrix', () => {
      expect(() => playfairEncrypt(cipher, 'JA')).toThrow("Character 'J' not in Playfair matrix");
      expect(() => playfairEncrypt(cipher, 'a ')).toThrow(InvalidInputError);
    });
  });
});
