import { Injectable } from '@nestjs/common';
import { CipherManager } from '@parley/cipher';

/** One connection's login state and cipher */
export interface ChatSession {
  readonly socketId: string;
  /** Set once the connection has logged in */
  username: string | null;
  /** Owned by this session alone; its keystream must not be shared */
  readonly cipher: CipherManager;
}

/**
 * Tracks a session per socket. Every session gets its own CipherManager
 * with the default options; there is no cipher state shared between
 * connections.
 */
@Injectable()
export class SessionsService {
  private readonly sessions = new Map<string, ChatSession>();

  open(socketId: string): ChatSession {
    const session: ChatSession = {
      socketId,
      username: null,
      cipher: new CipherManager(),
    };
    this.sessions.set(socketId, session);
    return session;
  }

  get(socketId: string): ChatSession | undefined {
    return this.sessions.get(socketId);
  }

  close(socketId: string): ChatSession | undefined {
    const session = this.sessions.get(socketId);
    this.sessions.delete(socketId);
    return session;
  }

  count(): number {
    return this.sessions.size;
  }
}
