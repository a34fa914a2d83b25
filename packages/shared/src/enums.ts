/**
 * Parley - Protocol Enums
 * Defines the message kinds, option targets and cipher names spoken on the wire
 */

/** Current protocol version for chat messages */
export const PROTOCOL_VERSION = 1;

/** Kinds of chat message exchanged between client and server */
export enum MsgType {
  /** Free text, possibly ciphertext when the session cipher is enabled */
  TEXT = 'TEXT',
  /** A named file and its contents */
  FILE = 'FILE',
  LOGIN = 'LOGIN',
  LOGOUT = 'LOGOUT',
  HELP = 'HELP',
  LIST_USERS = 'LIST_USERS',
  /** Query or update one of the session's cipher options */
  OPTION = 'OPTION',
}

/** Cipher settings a client may query or update */
export enum OptionTarget {
  CIPHER_KEY = 'CIPHER_KEY',
  CIPHER_NAME = 'CIPHER_NAME',
  CIPHER_ENABLE = 'CIPHER_ENABLE',
}

/** Ciphers a session can negotiate */
export enum CipherName {
  CAESAR_CIPHER = 'CAESAR_CIPHER',
  NULL_CIPHER = 'NULL_CIPHER',
  PLAYFAIR_CIPHER = 'PLAYFAIR_CIPHER',
  PSEUDO_ONE_TIME_PAD = 'PSEUDO_ONE_TIME_PAD',
  VIGNERE_CIPHER = 'VIGNERE_CIPHER',
}

/** WebSocket event types */
export enum WSEventType {
  MESSAGE_SEND = 'message:send',
  MESSAGE_RECEIVED = 'message:received',
}
