/**
 * Parley - Command parsing
 *
 * Turns one line of user input into the message to send:
 *
 *   send file <path> [as <name>]
 *   help
 *   list users
 *   login <password>
 *   logout
 *   option <CIPHER_KEY|CIPHER_NAME|CIPHER_ENABLE> [<value>]
 *
 * Commands are case-insensitive. Anything else, including a malformed
 * command other than SEND, is sent as text.
 */

import { CommandSyntaxError } from './errors.js';
import {
  createFileMessage,
  createHelpMessage,
  createListUsersMessage,
  createLoginMessage,
  createLogoutMessage,
  createOptionMessage,
  createTextMessage,
} from './messages.js';
import type { ChatMessage, FileMessage, OptionMessage } from './types/messages.js';
import { parseOptionTarget } from './utils.js';

export interface ParseCommandOptions {
  /** Reads a file's text for SEND FILE; throws if it cannot */
  readFile?: (path: string) => string;
}

/**
 * Builds the message for a line of user input, or null for a blank line.
 *
 * @throws CommandSyntaxError if a SEND command is malformed or its file cannot be read
 */
export function parseCommand(
  username: string,
  input: string,
  options: ParseCommandOptions = {}
): ChatMessage | null {
  const tokens = input.trim().split(/\s+/).filter((t) => t.length > 0);
  if (tokens.length === 0) {
    return null;
  }

  const command = tokens[0].toUpperCase();
  const args = tokens.slice(1);

  if (command === 'SEND') {
    return buildFileMessage(username, args, options.readFile);
  }

  try {
    switch (command) {
      case 'HELP':
        return createHelpMessage(username);
      case 'LIST':
        if (args.length > 0 && args[0].toUpperCase() === 'USERS') {
          return createListUsersMessage(username);
        }
        throw new CommandSyntaxError('Invalid LIST USERS syntax');
      case 'LOGIN':
        if (args.length > 0) {
          return createLoginMessage(username, args[0]);
        }
        throw new CommandSyntaxError('Invalid LOGIN syntax');
      case 'LOGOUT':
        return createLogoutMessage(username);
      case 'OPTION':
        return buildOptionMessage(username, args);
      default:
        return createTextMessage(username, input);
    }
  } catch (err) {
    if (err instanceof CommandSyntaxError) {
      return createTextMessage(username, input);
    }
    throw err;
  }
}

function buildFileMessage(
  username: string,
  args: string[],
  readFile: ((path: string) => string) | undefined
): FileMessage {
  const isFile = args.length > 0 && args[0].toUpperCase() === 'FILE';
  let path: string;
  let saveAs: string;
  if (isFile && args.length === 2) {
    path = args[1];
    saveAs = args[1];
  } else if (isFile && args.length === 4 && args[2].toUpperCase() === 'AS') {
    path = args[1];
    saveAs = args[3];
  } else {
    throw new CommandSyntaxError('Invalid SEND FILE syntax');
  }

  if (!readFile) {
    throw new CommandSyntaxError('File transfer is not available');
  }
  let contents: string;
  try {
    contents = readFile(path);
  } catch {
    throw new CommandSyntaxError('File not found or not readable');
  }
  return createFileMessage(username, saveAs, contents);
}

// The value is everything after the option name, so keys may contain spaces.
function buildOptionMessage(username: string, args: string[]): OptionMessage {
  if (args.length === 0) {
    throw new CommandSyntaxError('Invalid OPTION syntax');
  }
  const target = parseOptionTarget(args[0]);
  const value = args.length > 1 ? args.slice(1).join(' ') : null;
  return createOptionMessage(username, target, value);
}
