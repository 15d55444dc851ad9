import { isMessage } from './message.js';
import { canonicalize } from './serialize.js';
import type { Message, MessageCodec } from './types.js';

/** JSON drops `undefined` members, so a missing payload stands for `undefined`. */
function restorePayload(value: unknown): unknown {
  if (typeof value === 'object' && value !== null && !Array.isArray(value) && !('payload' in value)) {
    return { ...value, payload: undefined };
  }
  return value;
}

/**
 * Default codec: canonical JSON. Payloads must be JSON values (or `undefined`) for a message to
 * come out of `decode` equal to what went into `encode`.
 */
export const jsonCodec: MessageCodec = {
  encode(message: Message): Uint8Array {
    return canonicalize(message);
  },

  decode(bytes: Uint8Array): Message {
    const parsed = restorePayload(JSON.parse(new TextDecoder().decode(bytes)));
    if (!isMessage(parsed)) {
      throw new Error('Frame does not hold a message');
    }
    return parsed;
  },
};
