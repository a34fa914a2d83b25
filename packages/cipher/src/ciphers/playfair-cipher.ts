/**
 * Playfair digram cipher.
 *
 * The key, cleaned and with J folded into I, is written in front of the
 * alphabet; every repeated letter is dropped and the first 25 letters fill
 * a 5x5 matrix row by row. Text is processed two letters at a time:
 *
 * - same row:    each letter moves one column right (left to decrypt)
 * - same column: each letter moves one row down (up to decrypt)
 * - otherwise:   each letter takes the other's column, keeping its row
 */

import { CipherName } from '@parley/shared';
import { ALPHABET, clean, mod } from '../alphabet.js';
import { ConstructionError, InvalidInputError } from '../errors.js';

const SIZE = 5;
const FILLER = 'X';
const ALT_FILLER = 'Q';
const PAD = 'Z';
const ALT_PAD = 'X';

export interface MatrixPosition {
  readonly row: number;
  readonly col: number;
}

export interface PlayfairMatrix {
  /** The 25 matrix letters in row-major order */
  readonly letters: string;
  readonly positions: ReadonlyMap<string, MatrixPosition>;
}

export interface PlayfairCipher {
  readonly kind: CipherName.PLAYFAIR_CIPHER;
  readonly matrix: PlayfairMatrix;
}

/**
 * @throws ConstructionError if the key is null. An empty key is allowed and
 *         gives the plain alphabet.
 */
export function playfairCipher(key: string | null): PlayfairCipher {
  if (key === null) {
    throw new ConstructionError('Key cannot be null');
  }
  const cipher: PlayfairCipher = {
    kind: CipherName.PLAYFAIR_CIPHER,
    matrix: buildMatrix(key),
  };
  return Object.freeze(cipher);
}

function buildMatrix(key: string): PlayfairMatrix {
  const candidates = (clean(key) + ALPHABET).replace(/J/g, 'I');
  const seen = new Set<string>();
  let letters = '';
  for (const c of candidates) {
    if (!seen.has(c)) {
      seen.add(c);
      letters += c;
    }
  }
  letters = letters.slice(0, SIZE * SIZE);

  const positions = new Map<string, MatrixPosition>();
  for (let i = 0; i < letters.length; i++) {
    positions.set(letters[i], { row: Math.floor(i / SIZE), col: i % SIZE });
  }
  return Object.freeze({ letters, positions });
}

/**
 * The matrix as five strings of five letters.
 */
export function playfairRows(cipher: PlayfairCipher): string[] {
  const rows: string[] = [];
  for (let r = 0; r < SIZE; r++) {
    rows.push(cipher.matrix.letters.slice(r * SIZE, (r + 1) * SIZE));
  }
  return rows;
}

/**
 * Cleans text, folds J into I, splits doubled letters with a filler and
 * pads to even length. The filler is X (Q when the doubled letter is X);
 * the pad is Z (X when the text ends in Z).
 */
export function playfairPrepare(cleartext: string): string {
  const chars = Array.from(clean(cleartext).replace(/J/g, 'I'));
  let i = 0;
  while (i < chars.length - 1) {
    if (chars[i] === chars[i + 1]) {
      chars.splice(i + 1, 0, chars[i] === FILLER ? ALT_FILLER : FILLER);
    }
    i += 2;
  }
  if (chars.length % 2 === 1) {
    chars.push(chars[chars.length - 1] === PAD ? ALT_PAD : PAD);
  }
  return chars.join('');
}

export function playfairEncrypt(cipher: PlayfairCipher, preptext: string): string {
  return transform(cipher.matrix, preptext, 1);
}

export function playfairDecrypt(cipher: PlayfairCipher, ciphertext: string): string {
  return transform(cipher.matrix, ciphertext, -1);
}

function transform(matrix: PlayfairMatrix, text: string, delta: 1 | -1): string {
  if (text.length % 2 !== 0) {
    throw new InvalidInputError('Playfair text must have an even number of letters');
  }
  let out = '';
  for (let i = 0; i < text.length; i += 2) {
    const a = text[i];
    const b = text[i + 1];
    if (a === b) {
      throw new InvalidInputError('Same-letter digram, cannot encrypt/decrypt');
    }
    const p = locate(matrix, a);
    const q = locate(matrix, b);
    if (p.row === q.row) {
      out += letterAt(matrix, p.row, p.col + delta) + letterAt(matrix, q.row, q.col + delta);
    } else if (p.col === q.col) {
      out += letterAt(matrix, p.row + delta, p.col) + letterAt(matrix, q.row + delta, q.col);
    } else {
      out += letterAt(matrix, p.row, q.col) + letterAt(matrix, q.row, p.col);
    }
  }
  return out;
}

function locate(matrix: PlayfairMatrix, c: string): MatrixPosition {
  const pos = matrix.positions.get(c);
  if (!pos) {
    throw new InvalidInputError(`Character '${c}' not in Playfair matrix`);
  }
  return pos;
}

function letterAt(matrix: PlayfairMatrix, row: number, col: number): string {
  return matrix.letters[mod(row, SIZE) * SIZE + mod(col, SIZE)];
}
