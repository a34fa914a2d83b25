/**
 * Parley - Alphabet arithmetic
 *
 * Pure helpers shared by every cipher: the 26-letter alphabet, a modulo
 * that never goes negative, letter shifting, text cleaning and grouping.
 */

import { InvalidInputError } from './errors.js';

export const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

export const ALPHABET_SIZE = ALPHABET.length;

/**
 * Position of a character in ALPHABET, or -1 if it is not an uppercase letter
 */
export function letterIndex(c: string): number {
  return c.length === 1 ? ALPHABET.indexOf(c) : -1;
}

/**
 * Trims and uppercases text, then drops everything outside ALPHABET.
 * Null stays null.
 */
export function clean(text: string): string;
export function clean(text: string | null): string | null;
export function clean(text: string | null): string | null {
  if (text === null) {
    return null;
  }
  return text.trim().toUpperCase().replace(/[^A-Z]/g, '');
}

/**
 * Mathematical modulo: the result is in [0, modulus) even for negative n.
 *
 * @throws InvalidInputError if modulus < 1
 */
export function mod(n: number, modulus: number): number {
  if (modulus < 1) {
    throw new InvalidInputError('modulus cannot be < 1');
  }
  return ((n % modulus) + modulus) % modulus;
}

/**
 * The letter n places after c, wrapping at either end. Negative n shifts left.
 *
 * @throws InvalidInputError if c is not in ALPHABET
 */
export function shiftChar(c: string, n: number): string {
  const pos = letterIndex(c);
  if (pos < 0) {
    throw new InvalidInputError(`Character '${c}' not in ALPHABET`);
  }
  return ALPHABET[mod(pos + n, ALPHABET_SIZE)];
}

/**
 * Shifts every character of text by n places. Null stays null.
 *
 * @throws InvalidInputError if any character is not in ALPHABET
 */
export function shift(text: string, n: number): string;
export function shift(text: string | null, n: number): string | null;
export function shift(text: string | null, n: number): string | null {
  if (text === null) {
    return null;
  }
  let out = '';
  for (const c of text) {
    out += shiftChar(c, n);
  }
  return out;
}

/**
 * Regroups the non-whitespace characters of text into blocks of n separated
 * by single spaces; the last block may be shorter. Null and empty text are
 * returned as given.
 *
 * @throws InvalidInputError if n < 1
 */
export function group(text: string, n: number): string;
export function group(text: string | null, n: number): string | null;
export function group(text: string | null, n: number): string | null {
  if (n < 1) {
    throw new InvalidInputError('groups must have 1 or more letters');
  }
  if (text === null || text.length === 0) {
    return text;
  }
  const chars = text.replace(/\s+/g, '');
  const groups: string[] = [];
  for (let i = 0; i < chars.length; i += n) {
    groups.push(chars.slice(i, i + n));
  }
  return groups.join(' ');
}
