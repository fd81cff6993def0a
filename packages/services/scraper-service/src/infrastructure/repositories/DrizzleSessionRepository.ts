import { and, eq } from 'drizzle-orm';
import { songListSessions, type SongListSessionRow } from '../../schema/scraper-schema';
import type { DatabaseConnection } from '../database/DatabaseConnectionFactory';
import type { ISessionRepository } from '../../application/ports';
import type { SongListSession } from '../../domains/sessions/SongListSession';

function toSession(row: SongListSessionRow): SongListSession {
  return {
    userId: row.userId,
    sessionType: row.sessionType,
    state: row.state,
    draft: row.draft,
    queue: row.queue,
    isActive: row.isActive,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export class DrizzleSessionRepository implements ISessionRepository {
  constructor(private readonly db: DatabaseConnection) {}

  async find(userId: string, sessionType: string): Promise<SongListSession | null> {
    const rows = await this.db
      .select()
      .from(songListSessions)
      .where(and(eq(songListSessions.userId, userId), eq(songListSessions.sessionType, sessionType)))
      .limit(1);
    return rows[0] ? toSession(rows[0]) : null;
  }

  /**
   * Reactivates an inactive row, or inserts a new one. Both statements are
   * conditional, so concurrent starts cannot both succeed.
   */
  async activate(session: SongListSession): Promise<SongListSession | null> {
    const [reactivated] = await this.db
      .update(songListSessions)
      .set({
        state: session.state,
        draft: session.draft,
        queue: session.queue,
        isActive: true,
        updatedAt: session.updatedAt,
      })
      .where(
        and(
          eq(songListSessions.userId, session.userId),
          eq(songListSessions.sessionType, session.sessionType),
          eq(songListSessions.isActive, false)
        )
      )
      .returning();
    if (reactivated) {
      return toSession(reactivated);
    }

    const [inserted] = await this.db
      .insert(songListSessions)
      .values({ ...session, isActive: true })
      .onConflictDoNothing({ target: [songListSessions.userId, songListSessions.sessionType] })
      .returning();
    return inserted ? toSession(inserted) : null;
  }

  async save(session: SongListSession): Promise<SongListSession> {
    const [saved] = await this.db
      .insert(songListSessions)
      .values(session)
      .onConflictDoUpdate({
        target: [songListSessions.userId, songListSessions.sessionType],
        set: {
          state: session.state,
          draft: session.draft,
          queue: session.queue,
          isActive: session.isActive,
          updatedAt: session.updatedAt,
        },
      })
      .returning();
    return toSession(saved);
  }
}
