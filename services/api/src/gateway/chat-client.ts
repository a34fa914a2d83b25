import type { ChatMessage } from '@parley/shared';

/** The part of a socket.io socket the chat gateway talks to */
export interface ChatClient {
  readonly id: string;
  emit(event: string, message: ChatMessage): unknown;
  disconnect(close?: boolean): unknown;
}
