import { INestApplicationContext } from '@nestjs/common';
import { IoAdapter } from '@nestjs/platform-socket.io';
import type { Server } from 'socket.io';

type IoServerOptions = Parameters<IoAdapter['createIOServer']>[1];

/** socket.io adapter that applies the HTTP CORS allow list to the chat socket */
export class ChatIoAdapter extends IoAdapter {
  constructor(
    app: INestApplicationContext,
    private readonly origins: string[]
  ) {
    super(app);
  }

  createIOServer(port: number, options?: IoServerOptions): Server {
    return super.createIOServer(port, { ...options, cors: { origin: this.origins } });
  }
}
