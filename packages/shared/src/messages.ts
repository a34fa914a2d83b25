/**
 * Parley - Message factories
 */

import { MsgType, OptionTarget } from './enums.js';
import type {
  ChatMessage,
  FileMessage,
  HelpMessage,
  ListUsersMessage,
  LoginMessage,
  LogoutMessage,
  OptionMessage,
  TextMessage,
} from './types/messages.js';
import { baseName, mask, truncate } from './utils.js';

function now(): string {
  return new Date().toISOString();
}

export function createTextMessage(username: string, text: string): TextMessage {
  return { msgType: MsgType.TEXT, username, timestamp: now(), text };
}

/**
 * Creates a file message. Only the base name of fileName is kept.
 */
export function createFileMessage(
  username: string,
  fileName: string,
  fileContents: string
): FileMessage {
  return {
    msgType: MsgType.FILE,
    username,
    timestamp: now(),
    fileName: baseName(fileName),
    fileContents,
  };
}

export function createLoginMessage(username: string, password: string): LoginMessage {
  return { msgType: MsgType.LOGIN, username, timestamp: now(), password };
}

export function createLogoutMessage(username: string): LogoutMessage {
  return { msgType: MsgType.LOGOUT, username, timestamp: now() };
}

export function createHelpMessage(username: string): HelpMessage {
  return { msgType: MsgType.HELP, username, timestamp: now() };
}

export function createListUsersMessage(username: string): ListUsersMessage {
  return { msgType: MsgType.LIST_USERS, username, timestamp: now() };
}

export function createOptionMessage(
  username: string,
  target: OptionTarget,
  value: string | null = null
): OptionMessage {
  return { msgType: MsgType.OPTION, username, timestamp: now(), target, value };
}

/**
 * One-line description of a message for traffic logs.
 * Passwords are masked and file contents are shortened.
 */
export function describeMessage(msg: ChatMessage): string {
  const head = `${msg.msgType} from '${msg.username}' at ${msg.timestamp}`;
  switch (msg.msgType) {
    case MsgType.TEXT:
      return `${head}: text='${msg.text}'`;
    case MsgType.FILE:
      return `${head}: fileName='${msg.fileName}', fileContents='${truncate(msg.fileContents, 40)}'`;
    case MsgType.LOGIN:
      return `${head}: password='${mask(msg.password)}'`;
    case MsgType.OPTION:
      return `${head}: target=${msg.target}, value=${msg.value == null ? 'null' : `'${msg.value}'`}`;
    case MsgType.LOGOUT:
    case MsgType.HELP:
    case MsgType.LIST_USERS:
      return head;
  }
}
