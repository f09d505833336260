import { LiveEvent, WSEventType } from '@courtside/shared';

/** Wire form of an event on the shared broadcast channel */
export interface FanoutEnvelope {
  origin: string;
  targetUserId: string;
  event: LiveEvent;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLiveEvent(value: unknown): value is LiveEvent {
  if (!isRecord(value) || value.type !== WSEventType.MESSAGE_NEW) {
    return false;
  }
  return (
    typeof value.threadId === 'string' &&
    typeof value.messageId === 'string' &&
    typeof value.senderId === 'string' &&
    typeof value.senderDisplayName === 'string' &&
    typeof value.body === 'string' &&
    typeof value.createdAt === 'string'
  );
}

export function isFanoutEnvelope(value: unknown): value is FanoutEnvelope {
  return (
    isRecord(value) &&
    typeof value.origin === 'string' &&
    typeof value.targetUserId === 'string' &&
    value.targetUserId.length > 0 &&
    isLiveEvent(value.event)
  );
}
