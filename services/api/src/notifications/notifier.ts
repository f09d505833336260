/** Injection token for the outbound {@link Notifier} */
export const NOTIFIER = 'NOTIFIER';

export interface OutboundMessage {
  to: string;
  subject: string;
  text: string;
  html?: string;
}

/**
 * Sends one-off notifications to a user's verified contact address.
 */
export interface Notifier {
  /** False when credentials are missing; callers must not send then */
  isConfigured(): boolean;
  /** Resolves once the provider accepted the message, rejects otherwise */
  send(message: OutboundMessage): Promise<void>;
}
