import { CipherName } from '@parley/shared';

/** Passes text through untouched. */
export interface NullCipher {
  readonly kind: CipherName.NULL_CIPHER;
}

/**
 * The key is accepted so every cipher is built the same way, and ignored.
 */
export function nullCipher(_key?: string | null): NullCipher {
  const cipher: NullCipher = { kind: CipherName.NULL_CIPHER };
  return Object.freeze(cipher);
}
