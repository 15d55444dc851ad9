import { randomUUID } from 'node:crypto';
import { BROADCAST_DESTINATION, type Message, type MessageInit } from './types.js';

export function createMessage<P>(init: MessageInit<P>): Message<P> {
  const messageId = randomUUID();
  return {
    tag: init.tag,
    source: init.source,
    destination: init.destination ?? BROADCAST_DESTINATION,
    sessionId: init.sessionId ?? randomUUID(),
    messageId,
    payload: init.payload,
  };
}

export function isMessage(value: unknown): value is Message {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const obj = value as Record<string, unknown>;
  return (
    typeof obj.tag === 'string' &&
    typeof obj.source === 'string' &&
    typeof obj.destination === 'string' &&
    typeof obj.sessionId === 'string' &&
    typeof obj.messageId === 'string' &&
    'payload' in obj
  );
}
