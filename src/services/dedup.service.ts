import { logger } from '../utils/logger';
import { toError } from '../utils/errors';

const DEDUP_TTL = 86400; // 24 hours
const KEY_PREFIX = 'wa:msg:';

/** The slice of the redis client the dedup cache needs. */
export interface DedupStore {
  set(key: string, value: string, options: { NX: true; EX: number }): Promise<unknown>;
}

/**
 * Fast-path duplicate filter in front of the durable check on the candidate
 * row. A cache failure never blocks a message.
 */
export class DedupService {
  constructor(private store: DedupStore) {}

  /** True when this call is the first to see the message id. */
  async claim(messageId: string): Promise<boolean> {
    try {
      const result = await this.store.set(`${KEY_PREFIX}${messageId}`, '1', { NX: true, EX: DEDUP_TTL });
      return result !== null;
    } catch (error) {
      logger.warn('Dedup cache unavailable, falling back to database check', {
        messageId,
        error: toError(error).message,
      });
      return true;
    }
  }
}
