import type { SentDrip } from '../entities/sent-drip.js';

export interface SentDripRepository {
  /** Ids of every user who already received the drip. */
  findRecipientIds(dripId: string): Promise<string[]>;
  save(sentDrip: SentDrip): Promise<void>;
}
