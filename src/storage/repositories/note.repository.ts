/**
 * Note Repository Implementation
 *
 * One free-form note per opening: mnemonics, plans, traps to remember.
 */

import { eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { openingNotes } from '../schema';

export class NoteRepository {
  constructor(private readonly db: AppDatabase) {}

  /**
   * @returns The note text, or null when the opening has none
   */
  async get(openingId: string): Promise<string | null> {
    const result = await this.db
      .select({ notes: openingNotes.notes })
      .from(openingNotes)
      .where(eq(openingNotes.openingId, openingId))
      .limit(1);
    return result.length === 0 ? null : result[0].notes;
  }

  /**
   * Replaces the opening's note.
   */
  async set(openingId: string, notes: string, now: Date = new Date()): Promise<void> {
    await this.db
      .insert(openingNotes)
      .values({ openingId, notes, updatedAt: now })
      .onConflictDoUpdate({
        target: openingNotes.openingId,
        set: { notes, updatedAt: now },
      });
  }
}
