import { NewMessageEvent } from '@courtside/shared';

/** Application event emitted after a message is stored */
export const MESSAGE_CREATED = 'message.created';

export interface MessageCreatedPayload {
  recipientId: string;
  event: NewMessageEvent;
}
