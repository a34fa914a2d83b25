import { Logger, UsePipes, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ConnectedSocket,
  MessageBody,
  OnGatewayConnection,
  OnGatewayDisconnect,
  OnGatewayInit,
  SubscribeMessage,
  WebSocketGateway,
  WsException,
} from '@nestjs/websockets';
import { CipherError } from '@parley/cipher';
import {
  API,
  MsgType,
  SERVER_TEXT,
  WSEventType,
  createTextMessage,
  describeMessage,
  type ChatMessage,
  type LoginMessage,
  type TextMessage,
} from '@parley/shared';
import type { ChatClient } from './chat-client';
import { ChatMessageDto } from '../messages/dto/chat-message.dto';
import { toChatMessage } from '../messages/chat-message.mapper';
import { SessionsService, type ChatSession } from '../sessions/sessions.service';
import { UsersService } from '../users/users.service';

// CORS for the socket comes from ChatIoAdapter
@WebSocketGateway({ namespace: API.WS_NAMESPACE })
@UsePipes(
  new ValidationPipe({
    whitelist: true,
    transform: true,
    exceptionFactory: (errors) =>
      new WsException(errors.flatMap((e) => Object.values(e.constraints ?? {})).join('; ')),
  })
)
export class ChatGateway implements OnGatewayInit, OnGatewayConnection, OnGatewayDisconnect {
  private readonly logger = new Logger(ChatGateway.name);
  private readonly serverName: string;
  private readonly showTraffic: boolean;

  constructor(
    private readonly configService: ConfigService,
    private readonly sessionsService: SessionsService,
    private readonly usersService: UsersService
  ) {
    this.serverName = this.configService.get<string>('SERVER_NAME', API.DEFAULT_SERVER_NAME);
    this.showTraffic = String(this.configService.get<string>('SHOW_TRAFFIC', 'false')) === 'true';
  }

  afterInit() {
    this.logger.log(`Chat gateway listening on ${API.WS_NAMESPACE} as '${this.serverName}'`);
  }

  handleConnection(client: ChatClient) {
    this.sessionsService.open(client.id);
    this.logger.log(`Client connected: ${client.id}`);
    this.send(client, this.reply(SERVER_TEXT.GREETING));
  }

  handleDisconnect(client: ChatClient) {
    const session = this.sessionsService.close(client.id);
    if (session?.username) {
      this.usersService.removeConnection(session.username, client.id);
    }
    this.logger.log(`Client disconnected: ${client.id}`);
  }

  /**
   * Handles one chat message. The returned message is the acknowledgement;
   * a logout is answered with an event instead, since the socket closes
   * straight after.
   */
  @SubscribeMessage(WSEventType.MESSAGE_SEND)
  handleMessage(
    @ConnectedSocket() client: ChatClient,
    @MessageBody() dto: ChatMessageDto
  ): ChatMessage | undefined {
    const session = this.sessionsService.get(client.id);
    if (!session) {
      throw new WsException('No session for this connection');
    }

    const msg = toChatMessage(dto);
    this.trace('=>', msg);

    if (msg.msgType === MsgType.LOGIN) {
      return this.answer(this.login(client, session, msg));
    }
    if (!session.username) {
      return this.answer(this.reply(SERVER_TEXT.NOT_LOGGED_IN));
    }

    switch (msg.msgType) {
      case MsgType.TEXT:
        return this.answer(this.text(session, msg));
      case MsgType.FILE:
        return this.answer(msg);
      case MsgType.HELP:
        return this.answer(this.reply(SERVER_TEXT.HELP));
      case MsgType.LIST_USERS:
        return this.answer(this.reply(`Users: ${this.usersService.getOnlineUsers().join(', ')}`));
      case MsgType.OPTION: {
        const status = session.cipher.process(msg);
        this.logger.log(`${session.username}: ${status}`);
        return this.answer(this.reply(status));
      }
      case MsgType.LOGOUT:
        this.logout(client, session);
        return undefined;
    }
  }

  private login(client: ChatClient, session: ChatSession, msg: LoginMessage): TextMessage {
    if (session.username) {
      return this.reply(SERVER_TEXT.ALREADY_LOGGED_IN);
    }
    if (!this.usersService.verifyPassword(msg.username, msg.password)) {
      this.logger.warn(`Failed login for '${msg.username}' (${client.id})`);
      return this.reply(SERVER_TEXT.LOGIN_BAD);
    }

    session.username = msg.username;
    this.usersService.addConnection(msg.username, client.id);
    this.logger.log(`${msg.username} logged in (${client.id})`);
    return this.reply(SERVER_TEXT.LOGIN_OK);
  }

  private text(session: ChatSession, msg: TextMessage): TextMessage {
    try {
      return this.reply(`TEXT: '${session.cipher.open(msg.text)}'`);
    } catch (err) {
      if (!(err instanceof CipherError)) {
        throw err;
      }
      this.logger.warn(`Cannot decrypt text from ${session.username}: ${err.message}`);
      return this.reply(`FAIL: ${err.message}`);
    }
  }

  private logout(client: ChatClient, session: ChatSession): void {
    this.send(client, this.reply(SERVER_TEXT.GOOD_BYE));
    if (session.username) {
      this.usersService.removeConnection(session.username, client.id);
      this.logger.log(`${session.username} logged out (${client.id})`);
      session.username = null;
    }
    client.disconnect(true);
  }

  private reply(text: string): TextMessage {
    return createTextMessage(this.serverName, text);
  }

  private send(client: ChatClient, msg: ChatMessage): void {
    this.trace('<=', msg);
    client.emit(WSEventType.MESSAGE_RECEIVED, msg);
  }

  private answer(msg: ChatMessage): ChatMessage {
    this.trace('<=', msg);
    return msg;
  }

  private trace(direction: '=>' | '<=', msg: ChatMessage): void {
    if (this.showTraffic) {
      this.logger.debug(`${direction} ${describeMessage(msg)}`);
    }
  }
}
