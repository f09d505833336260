import {
  WebSocketGateway,
  WebSocketServer,
  SubscribeMessage,
  OnGatewayInit,
  OnGatewayConnection,
  OnGatewayDisconnect,
  WsResponse,
} from '@nestjs/websockets';
import { Logger } from '@nestjs/common';
import { Server, Socket } from 'socket.io';
import { API, AuthenticatedEvent, WSEventType } from '@courtside/shared';
import { SessionTokenService, SessionUser } from '../auth/session-token.service';
import { ConnectionRegistry } from '../delivery/connection-registry';
import { SocketConnection } from './socket-connection';

export interface AuthenticatedSocket extends Socket {
  userId?: string;
  username?: string;
}

/**
 * Live-connection endpoint. Authenticates the handshake and keeps the
 * connection registry in step with open sockets; pushes go through the
 * registry, never through this class.
 */
// Origins are checked by CorsIoAdapter
@WebSocketGateway({
  namespace: API.WS_NAMESPACE,
})
export class EventsGateway implements OnGatewayInit, OnGatewayConnection, OnGatewayDisconnect {
  private readonly logger = new Logger(EventsGateway.name);

  @WebSocketServer()
  server!: Server;

  constructor(
    private readonly sessionTokens: SessionTokenService,
    private readonly registry: ConnectionRegistry
  ) {}

  afterInit(_server: Server) {
    this.logger.log('WebSocket Gateway initialized');
  }

  async handleConnection(client: AuthenticatedSocket) {
    const token = extractToken(client);
    if (!token) {
      client.emit(WSEventType.AUTH_ERROR, { message: 'No token provided' });
      client.disconnect();
      return;
    }

    let user: SessionUser;
    try {
      user = await this.sessionTokens.verify(token);
    } catch {
      client.emit(WSEventType.AUTH_ERROR, { message: 'Invalid token' });
      client.disconnect();
      return;
    }

    // The socket may have closed while the token was being verified
    if (!client.connected) {
      this.logger.debug(`Client ${client.id} left before authentication finished`);
      return;
    }

    client.userId = user.id;
    client.username = user.username;
    this.registry.register(user.id, new SocketConnection(client));

    const ack: AuthenticatedEvent = { userId: user.id, username: user.username };
    client.emit(WSEventType.AUTHENTICATED, ack);
    this.logger.debug(`Client connected: ${user.username} (${client.id})`);
  }

  handleDisconnect(client: AuthenticatedSocket) {
    if (client.userId) {
      this.registry.unregister(client.userId, client.id);
    }
    this.logger.debug(`Client disconnected: ${client.id}`);
  }

  @SubscribeMessage(WSEventType.PING)
  handlePing(): WsResponse<{ timestamp: number }> {
    return { event: WSEventType.PONG, data: { timestamp: Date.now() } };
  }
}

function extractToken(client: Socket): string | undefined {
  const authToken: unknown = client.handshake.auth?.token;
  if (typeof authToken === 'string' && authToken) {
    return authToken;
  }
  return SessionTokenService.fromAuthorizationHeader(client.handshake.headers?.authorization);
}
