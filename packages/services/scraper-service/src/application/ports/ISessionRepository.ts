import type { SongListSession } from '../../domains/sessions/SongListSession';

export interface ISessionRepository {
  find(userId: string, sessionType: string): Promise<SongListSession | null>;
  /**
   * Stores `session` as the new active session only if no active session
   * exists for its user and type. Returns null when one already does.
   */
  activate(session: SongListSession): Promise<SongListSession | null>;
  save(session: SongListSession): Promise<SongListSession>;
}
