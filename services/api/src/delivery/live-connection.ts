/**
 * A push channel to one connected client.
 *
 * `send` must throw {@link ConnectionClosedError} (or any error) once the
 * underlying transport is gone, so the dispatcher can prune the handle.
 */
export interface LiveConnection {
  readonly id: string;
  send(event: string, payload: unknown): void;
}

export class ConnectionClosedError extends Error {
  constructor(connectionId: string) {
    super(`Connection ${connectionId} is closed`);
    this.name = 'ConnectionClosedError';
  }
}
