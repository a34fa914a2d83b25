import { WsException } from '@nestjs/websockets';
import {
  MsgType,
  createFileMessage,
  createHelpMessage,
  createListUsersMessage,
  createLoginMessage,
  createLogoutMessage,
  createOptionMessage,
  createTextMessage,
  type ChatMessage,
} from '@parley/shared';
import { ChatMessageDto } from './dto/chat-message.dto';

function required<T>(value: T | undefined, field: string, msgType: MsgType): T {
  if (value === undefined) {
    throw new WsException(`${field} is required for ${msgType} messages`);
  }
  return value;
}

/**
 * Turns a validated DTO into the protocol message it describes.
 * The sender's timestamp is kept when present.
 */
export function toChatMessage(dto: ChatMessageDto): ChatMessage {
  const { msgType, username } = dto;
  const msg = build(dto, msgType, username);
  return dto.timestamp ? { ...msg, timestamp: dto.timestamp } : msg;
}

function build(dto: ChatMessageDto, msgType: MsgType, username: string): ChatMessage {
  switch (msgType) {
    case MsgType.TEXT:
      return createTextMessage(username, required(dto.text, 'text', msgType));
    case MsgType.FILE:
      return createFileMessage(
        username,
        required(dto.fileName, 'fileName', msgType),
        required(dto.fileContents, 'fileContents', msgType)
      );
    case MsgType.LOGIN:
      return createLoginMessage(username, required(dto.password, 'password', msgType));
    case MsgType.LOGOUT:
      return createLogoutMessage(username);
    case MsgType.HELP:
      return createHelpMessage(username);
    case MsgType.LIST_USERS:
      return createListUsersMessage(username);
    case MsgType.OPTION:
      return createOptionMessage(username, required(dto.target, 'target', msgType), dto.value ?? null);
  }
}
