/**
 * Parley - Constants
 * Shared constants used by the server and its clients
 */

import { CipherName } from './enums.js';

/** API configuration */
export const API = {
  /** Default API port */
  DEFAULT_PORT: 4466,
  /** API base path */
  BASE_PATH: '/api/v1',
  /** socket.io namespace for chat traffic */
  WS_NAMESPACE: '/chat',
  /** Username the server signs its own messages with */
  DEFAULT_SERVER_NAME: 'server',
} as const;

/** Cipher settings a fresh session starts with */
export const CIPHER_DEFAULTS = {
  ENABLED: false,
  NAME: CipherName.NULL_CIPHER,
  KEY: 'KEY',
} as const;

/** Fixed texts the server replies with */
export const SERVER_TEXT = {
  GREETING: "Server listening. Type 'login <password>' to continue.",
  LOGIN_OK: "Login successful. 'logout' to exit, 'help' for help.",
  LOGIN_BAD: 'Invalid username/password.',
  ALREADY_LOGGED_IN: 'Already logged in.',
  NOT_LOGGED_IN: "Not logged in. Type 'login <password>' to continue.",
  GOOD_BYE: 'Server closing connection, good-bye.',
  HELP: [
    'Commands:',
    '  login <password>             log in (password is your username reversed)',
    '  logout                       close the connection',
    '  help                         show this text',
    '  list users                   show who is logged in',
    '  send file <path> [as <name>] send a file; the server returns it',
    '  option <option> [<value>]    query or set CIPHER_KEY, CIPHER_NAME or CIPHER_ENABLE',
    '  anything else                sent as text',
    `Ciphers: ${Object.values(CipherName).join(', ')}`,
  ].join('\n'),
} as const;

/** Message configuration */
export const MESSAGE = {
  /** Maximum text length */
  MAX_TEXT_LENGTH: 4000,
  /** Maximum file contents length in characters (1MB) */
  MAX_FILE_LENGTH: 1024 * 1024,
  /** Maximum option value length */
  MAX_OPTION_LENGTH: 256,
} as const;

/** Validation patterns */
export const VALIDATION = {
  /** Username pattern: 1-32 chars, alphanumeric and underscores */
  USERNAME: /^[a-zA-Z0-9_]{1,32}$/,
} as const;
