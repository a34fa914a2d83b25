/**
 * Parley - Cipher Package
 * Alphabet arithmetic, the five ciphers, and the per-session cipher manager
 */

export * from './alphabet.js';
export * from './errors.js';
export * from './keystream.js';
export * from './cipher.js';
export * from './cipher-manager.js';
export * from './ciphers/null-cipher.js';
export * from './ciphers/caesar-cipher.js';
export * from './ciphers/vignere-cipher.js';
export * from './ciphers/playfair-cipher.js';
export * from './ciphers/pseudo-one-time-pad.js';
