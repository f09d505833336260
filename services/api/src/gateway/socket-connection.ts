import { Socket } from 'socket.io';
import { ConnectionClosedError, LiveConnection } from '../delivery/live-connection';

/**
 * LiveConnection over a socket.io socket
 */
export class SocketConnection implements LiveConnection {
  constructor(private readonly socket: Socket) {}

  get id(): string {
    return this.socket.id;
  }

  send(event: string, payload: unknown): void {
    if (!this.socket.connected) {
      throw new ConnectionClosedError(this.socket.id);
    }
    this.socket.emit(event, payload);
  }
}
