import { Injectable, Logger } from '@nestjs/common';

/**
 * In-memory roster of logged-in users.
 * A user may be logged in from several connections at once.
 */
@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  // username -> Set of socket IDs
  private readonly connectedUsers: Map<string, Set<string>> = new Map();

  /**
   * Toy login gate: the password is the username spelled backwards.
   */
  verifyPassword(username: string, password: string): boolean {
    return username.length > 0 && Array.from(password).reverse().join('') === username;
  }

  addConnection(username: string, socketId: string): void {
    let sockets = this.connectedUsers.get(username);
    if (!sockets) {
      sockets = new Set();
      this.connectedUsers.set(username, sockets);
      this.logger.log(`${username} is online`);
    }
    sockets.add(socketId);
  }

  removeConnection(username: string, socketId: string): void {
    const sockets = this.connectedUsers.get(username);
    if (!sockets) return;

    sockets.delete(socketId);
    if (sockets.size === 0) {
      this.connectedUsers.delete(username);
      this.logger.log(`${username} is offline`);
    }
  }

  isOnline(username: string): boolean {
    return this.connectedUsers.has(username);
  }

  /** Logged-in usernames, sorted */
  getOnlineUsers(): string[] {
    return Array.from(this.connectedUsers.keys()).sort();
  }
}
