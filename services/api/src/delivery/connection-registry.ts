import { Injectable, Logger } from '@nestjs/common';
import { LiveConnection } from './live-connection';

/**
 * Per-process map of user ID -> live connections.
 *
 * Every method runs synchronously; with no await between read and write, the
 * event loop serializes all mutations and snapshots.
 */
@Injectable()
export class ConnectionRegistry {
  private readonly logger = new Logger(ConnectionRegistry.name);

  private readonly connections = new Map<string, Map<string, LiveConnection>>(); // userId -> connectionId -> handle

  register(userId: string, connection: LiveConnection): void {
    let userConnections = this.connections.get(userId);
    if (!userConnections) {
      userConnections = new Map();
      this.connections.set(userId, userConnections);
    }
    userConnections.set(connection.id, connection);
    this.logger.debug(`Registered ${connection.id} for ${userId} (${userConnections.size} open)`);
  }

  /**
   * Removes one connection. Unknown users or connections are a no-op.
   * Returns true if something was removed.
   */
  unregister(userId: string, connection: LiveConnection | string): boolean {
    const connectionId = typeof connection === 'string' ? connection : connection.id;
    const userConnections = this.connections.get(userId);
    if (!userConnections) {
      return false;
    }
    const removed = userConnections.delete(connectionId);
    if (userConnections.size === 0) {
      this.connections.delete(userId);
    }
    if (removed) {
      this.logger.debug(`Unregistered ${connectionId} for ${userId}`);
    }
    return removed;
  }

  /**
   * Snapshot of the user's connections. Later registry changes do not affect it.
   */
  handlesFor(userId: string): LiveConnection[] {
    const userConnections = this.connections.get(userId);
    return userConnections ? Array.from(userConnections.values()) : [];
  }

  isOnline(userId: string): boolean {
    return this.connections.has(userId);
  }

  onlineUsers(): string[] {
    return Array.from(this.connections.keys());
  }

  connectionCount(): number {
    let total = 0;
    for (const userConnections of this.connections.values()) {
      total += userConnections.size;
    }
    return total;
  }
}
