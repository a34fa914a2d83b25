/**
 * Parley - Cipher Manager
 *
 * Owns one session's cipher options (enabled flag, cipher name, key) and the
 * cipher built from them. Changes are validate-then-commit: the candidate
 * cipher is built first and options and cipher are swapped together only if
 * that succeeds, so a failed update leaves every option as it was.
 *
 * A manager carries sequential keystream state and must serve exactly one
 * conversation.
 */

import { CIPHER_DEFAULTS, CipherName, OptionTarget, type OptionCommand } from '@parley/shared';
import { createCipher, decrypt, encrypt, parseCipherName, prepare, type Cipher } from './cipher.js';
import { CipherError, InvalidInputError, UnknownOptionError } from './errors.js';

export interface CipherConfig {
  enabled: boolean;
  cipherName: CipherName;
  key: string;
}

export const TRUE_SYNONYMS: readonly string[] = ['TRUE', 'YES', 'ON', '1'];
export const FALSE_SYNONYMS: readonly string[] = ['FALSE', 'NO', 'OFF', '0'];

/**
 * Parses a case-insensitive boolean synonym.
 *
 * @throws InvalidInputError if str is in neither synonym list
 */
export function parseBoolean(str: string): boolean {
  const upper = str.trim().toUpperCase();
  if (TRUE_SYNONYMS.includes(upper)) {
    return true;
  }
  if (FALSE_SYNONYMS.includes(upper)) {
    return false;
  }
  throw new InvalidInputError(`'${str}' not a boolean synonym`);
}

function isOptionTarget(target: string): target is OptionTarget {
  return Object.values(OptionTarget).some((t) => t === target);
}

export class CipherManager {
  private config: Readonly<CipherConfig>;
  private cipher: Cipher;

  /**
   * Missing options take the defaults: disabled, NULL_CIPHER, key "KEY".
   *
   * @throws ConstructionError if the cipher cannot be built with the key
   */
  constructor(config: Partial<CipherConfig> = {}) {
    const initial: CipherConfig = {
      enabled: config.enabled ?? CIPHER_DEFAULTS.ENABLED,
      cipherName: config.cipherName ?? CIPHER_DEFAULTS.NAME,
      key: config.key ?? CIPHER_DEFAULTS.KEY,
    };
    this.cipher = createCipher(initial.cipherName, initial.key);
    this.config = Object.freeze(initial);
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  getCipherName(): CipherName {
    return this.config.cipherName;
  }

  getKey(): string {
    return this.config.key;
  }

  /** Snapshot of the current options */
  getConfig(): Readonly<CipherConfig> {
    return this.config;
  }

  /**
   * Replaces any subset of the options. Supplying a cipher name or a key
   * builds a new cipher, which also restarts any keystream; changing only
   * the enabled flag keeps the current cipher.
   *
   * @throws ConstructionError if the resulting name and key do not form a
   *         valid cipher; nothing is changed in that case
   */
  setCipherOptions(options: Partial<CipherConfig>): void {
    const candidate: CipherConfig = {
      enabled: options.enabled ?? this.config.enabled,
      cipherName: options.cipherName ?? this.config.cipherName,
      key: options.key ?? this.config.key,
    };
    const rebuild = options.cipherName !== undefined || options.key !== undefined;
    const cipher = rebuild ? createCipher(candidate.cipherName, candidate.key) : this.cipher;

    this.config = Object.freeze(candidate);
    this.cipher = cipher;
  }

  /**
   * Accepts a boolean, or a synonym: TRUE/YES/ON/1 or FALSE/NO/OFF/0 in any case.
   *
   * @throws InvalidInputError for any other string; the flag is unchanged
   */
  setEnabled(value: boolean | string): void {
    const enabled = typeof value === 'boolean' ? value : parseBoolean(value);
    this.setCipherOptions({ enabled });
  }

  /**
   * @throws UnknownCipherNameError if name is not a cipher
   * @throws ConstructionError if the current key does not suit the cipher
   */
  setCipher(name: string): void {
    this.setCipherOptions({ cipherName: parseCipherName(name) });
  }

  /** @throws ConstructionError if the key does not suit the current cipher */
  setKey(key: string): void {
    this.setCipherOptions({ key });
  }

  /**
   * Queries or updates one option and describes the outcome:
   *
   *   option <TARGET> = <value>
   *   FAIL: <reason>. option <TARGET> = <value>
   *
   * A non-empty value is an update; anything else is a query. The value
   * reported is always the one in force after the call. A target that is
   * not an option gets only the failure.
   */
  process(command: OptionCommand | { target: string; value?: string | null }): string {
    const { target, value } = command;
    if (!isOptionTarget(target)) {
      return `FAIL: ${new UnknownOptionError(target).message}.`;
    }

    let reply = '';
    if (value !== undefined && value !== null && value !== '') {
      try {
        this.apply(target, value);
      } catch (err) {
        if (!(err instanceof CipherError)) {
          throw err;
        }
        reply = `FAIL: ${err.message}. `;
      }
    }
    return `${reply}option ${target} = ${this.currentValue(target)}`;
  }

  prepare(cleartext: string): string {
    return prepare(this.cipher, cleartext);
  }

  encrypt(preptext: string): string {
    return encrypt(this.cipher, preptext);
  }

  decrypt(ciphertext: string): string {
    return decrypt(this.cipher, ciphertext);
  }

  /**
   * Outgoing text: prepared and encrypted when enabled, unchanged otherwise.
   */
  seal(cleartext: string): string {
    return this.config.enabled ? this.encrypt(this.prepare(cleartext)) : cleartext;
  }

  /**
   * Incoming text: decrypted when enabled, unchanged otherwise.
   */
  open(ciphertext: string): string {
    return this.config.enabled ? this.decrypt(ciphertext) : ciphertext;
  }

  private apply(target: OptionTarget, value: string): void {
    switch (target) {
      case OptionTarget.CIPHER_KEY:
        this.setKey(value);
        return;
      case OptionTarget.CIPHER_NAME:
        this.setCipher(value);
        return;
      case OptionTarget.CIPHER_ENABLE:
        this.setEnabled(value);
        return;
    }
  }

  private currentValue(target: OptionTarget): string {
    switch (target) {
      case OptionTarget.CIPHER_KEY:
        return this.config.key;
      case OptionTarget.CIPHER_NAME:
        return this.config.cipherName;
      case OptionTarget.CIPHER_ENABLE:
        return String(this.config.enabled);
    }
  }
}
