/**
 * Parley - Message Types
 * Chat messages exchanged over the socket, discriminated on msgType
 */

import { MsgType, OptionTarget } from '../enums.js';

/** Fields every message carries */
export interface BaseMessage {
  /** Message kind */
  msgType: MsgType;
  /** Who sent the message */
  username: string;
  /** ISO-8601 creation time */
  timestamp: string;
}

export interface TextMessage extends BaseMessage {
  msgType: MsgType.TEXT;
  /** Plaintext, or ciphertext when the session cipher is enabled */
  text: string;
}

export interface FileMessage extends BaseMessage {
  msgType: MsgType.FILE;
  /** Name to save the file as (base name only) */
  fileName: string;
  fileContents: string;
}

export interface LoginMessage extends BaseMessage {
  msgType: MsgType.LOGIN;
  password: string;
}

export interface LogoutMessage extends BaseMessage {
  msgType: MsgType.LOGOUT;
}

export interface HelpMessage extends BaseMessage {
  msgType: MsgType.HELP;
}

export interface ListUsersMessage extends BaseMessage {
  msgType: MsgType.LIST_USERS;
}

/**
 * A request to query or update one cipher option.
 * A missing, null or empty value is a query.
 */
export interface OptionCommand {
  target: OptionTarget;
  value?: string | null;
}

export interface OptionMessage extends BaseMessage, OptionCommand {
  msgType: MsgType.OPTION;
}

/** Any message on the wire */
export type ChatMessage =
  | TextMessage
  | FileMessage
  | LoginMessage
  | LogoutMessage
  | HelpMessage
  | ListUsersMessage
  | OptionMessage;
