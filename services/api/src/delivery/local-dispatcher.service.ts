import { Injectable, Logger } from '@nestjs/common';
import { LiveEvent } from '@courtside/shared';
import { ConnectionRegistry } from './connection-registry';

/**
 * Pushes events to the connections a user holds on this process.
 */
@Injectable()
export class LocalDispatcher {
  private readonly logger = new Logger(LocalDispatcher.name);

  constructor(private readonly registry: ConnectionRegistry) {}

  /**
   * Sends `event` to every local connection of `userId` and returns how many
   * accepted it. A connection whose send throws is unregistered. Never throws.
   */
  deliverToUser(userId: string, event: LiveEvent): number {
    let delivered = 0;
    for (const connection of this.registry.handlesFor(userId)) {
      try {
        connection.send(event.type, event);
        delivered++;
      } catch (error) {
        this.registry.unregister(userId, connection);
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Dropped dead connection ${connection.id} of ${userId}: ${reason}`);
      }
    }
    return delivered;
  }
}
