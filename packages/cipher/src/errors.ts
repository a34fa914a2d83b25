/**
 * Parley - Cipher errors
 *
 * Every message is meant to be shown to an end user as is; the cipher
 * manager embeds them verbatim in its option replies.
 */

/** Base class for every error raised by the cipher package. */
export class CipherError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CipherError';
  }
}

/** A cipher cannot be built from the proposed name and key. */
export class ConstructionError extends CipherError {
  constructor(message: string) {
    super(message);
    this.name = 'ConstructionError';
  }
}

/** An operation received an argument it cannot work with. */
export class InvalidInputError extends CipherError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export class UnknownOptionError extends CipherError {
  constructor(public readonly option: string) {
    super(`Unknown option '${option}'`);
    this.name = 'UnknownOptionError';
  }
}

export class UnknownCipherNameError extends ConstructionError {
  constructor(public readonly cipherName: string) {
    super(`Unknown cipher '${cipherName}'`);
    this.name = 'UnknownCipherNameError';
  }
}
