import { INestApplicationContext } from '@nestjs/common';
import { IoAdapter } from '@nestjs/platform-socket.io';
import { Server, ServerOptions } from 'socket.io';
import { CorsPolicy, originCheck } from '../config/cors';

/**
 * socket.io adapter applying the HTTP CORS policy to live connections
 */
export class CorsIoAdapter extends IoAdapter {
  constructor(
    app: INestApplicationContext,
    private readonly policy: CorsPolicy
  ) {
    super(app);
  }

  createIOServer(port: number, options?: Partial<ServerOptions> & { namespace?: string }): Server {
    return super.createIOServer(port, {
      ...options,
      cors: { origin: originCheck(this.policy), credentials: true },
    });
  }
}
