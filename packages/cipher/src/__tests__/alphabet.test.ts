import { describe, it, expect } from 'vitest';
import { ALPHABET, clean, group, letterIndex, mod, shift, shiftChar } from '../alphabet.js';
import { InvalidInputError } from '../errors.js';

describe('alphabet', () => {
  it('should hold the 26 uppercase letters in order', () => {
    expect(ALPHABET).toBe('ABCDEFGHIJKLMNOPQRSTUVWXYZ');
    expect(letterIndex('A')).toBe(0);
    expect(letterIndex('Z')).toBe(25);
    expect(letterIndex('a')).toBe(-1);
    expect(letterIndex('AB')).toBe(-1);
  });

  describe('clean', () => {
    it('should pass null and empty text through', () => {
      expect(clean(null)).toBeNull();
      expect(clean('')).toBe('');
    });

    it('should uppercase and drop non-letters', () => {
      expect(clean('a1! B')).toBe('AB');
      expect(clean('  Call me Ishmael.  ')).toBe('CALLMEISHMAEL');
      expect(clean('123 !?')).toBe('');
    });

    it('should not change its argument', () => {
      const text = 'hello, world';
      clean(text);
      expect(text).toBe('hello, world');
    });
  });

  describe('mod', () => {
    it('should always return a value in [0, modulus)', () => {
      expect(mod(-1, 26)).toBe(25);
      expect(mod(5, 26)).toBe(5);
      expect(mod(26, 26)).toBe(0);
      expect(mod(-27, 26)).toBe(25);
      expect(mod(7, 1)).toBe(0);
    });

    it('should reject a modulus below 1', () => {
      expect(() => mod(5, 0)).toThrow(InvalidInputError);
      expect(() => mod(5, -3)).toThrow('modulus cannot be < 1');
    });
  });

  describe('shiftChar', () => {
    it('should wrap at both ends', () => {
      expect(shiftChar('A', 1)).toBe('B');
      expect(shiftChar('Z', 1)).toBe('A');
      expect(shiftChar('A', -1)).toBe('Z');
      expect(shiftChar('M', 0)).toBe('M');
      expect(shiftChar('C', 52)).toBe('C');
    });

    it('should reject characters outside the alphabet', () => {
      expect(() => shiftChar('a', 1)).toThrow(InvalidInputError);
      expect(() => shiftChar(' ', 1)).toThrow("Character ' ' not in ALPHABET");
    });
  });

  describe('shift', () => {
    it('should shift every character', () => {
      expect(shift('HELLO', 3)).toBe('KHOOR');
      expect(shift('KHOOR', -3)).toBe('HELLO');
      expect(shift('', 5)).toBe('');
    });

    it('should pass null through', () => {
      expect(shift(null, 3)).toBeNull();
    });

    it('should reject text holding a non-letter', () => {
      expect(() => shift('HELLO WORLD', 1)).toThrow(InvalidInputError);
    });
  });

  describe('group', () => {
    it('should split into groups with a shorter last group', () => {
      expect(group('ABCDE', 2)).toBe('AB CD E');
      expect(group('ABCDEF', 3)).toBe('ABC DEF');
      expect(group('ABC', 5)).toBe('ABC');
    });

    it('should regroup text that already has spaces', () => {
      expect(group('AB C DE', 2)).toBe('AB CD E');
    });

    it('should pass null and empty text through', () => {
      expect(group(null, 3)).toBeNull();
      expect(group('', 3)).toBe('');
    });

    it('should reject a group size below 1', () => {
      expect(() => group('ABC', 0)).toThrow(InvalidInputError);
      expect(() => group(null, 0)).toThrow('groups must have 1 or more letters');
    });
  });
});
