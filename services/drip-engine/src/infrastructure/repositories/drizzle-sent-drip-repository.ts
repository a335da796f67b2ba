import type { SentDrip, SentDripRepository } from '@dripline/drip-domain';
import { sentDrips } from '@dripline/drip-domain/drizzle';
import { eq } from 'drizzle-orm';
import type { NeonHttpDatabase } from 'drizzle-orm/neon-http';

export class DrizzleSentDripRepository implements SentDripRepository {
  constructor(private readonly db: NeonHttpDatabase) {}

  async findRecipientIds(dripId: string): Promise<string[]> {
    const rows = await this.db
      .select({ userId: sentDrips.userId })
      .from(sentDrips)
      .where(eq(sentDrips.dripId, dripId));
    return rows.map((row) => row.userId);
  }

  // A user receives a drip at most once; repeats are ignored.
  async save(sentDrip: SentDrip): Promise<void> {
    await this.db
      .insert(sentDrips)
      .values(sentDrip.toProps())
      .onConflictDoNothing({ target: [sentDrips.dripId, sentDrips.userId] });
  }
}
