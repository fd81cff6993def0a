import { inArray } from 'drizzle-orm';
import { cleanupLog } from '../../schema/scraper-schema';
import type { DatabaseConnection } from '../database/DatabaseConnectionFactory';
import type { CleanupRecord, ICleanupLogRepository, NewCleanupRecord } from '../../application/ports';

const LOOKUP_CHUNK = 500;

export class DrizzleCleanupLogRepository implements ICleanupLogRepository {
  constructor(private readonly db: DatabaseConnection) {}

  async findLoggedPaths(paths: string[]): Promise<Set<string>> {
    const logged = new Set<string>();
    for (let i = 0; i < paths.length; i += LOOKUP_CHUNK) {
      const chunk = paths.slice(i, i + LOOKUP_CHUNK);
      const rows = await this.db
        .select({ blobPath: cleanupLog.blobPath })
        .from(cleanupLog)
        .where(inArray(cleanupLog.blobPath, chunk));
      for (const row of rows) logged.add(row.blobPath);
    }
    return logged;
  }

  async append(record: NewCleanupRecord): Promise<CleanupRecord | null> {
    const [inserted] = await this.db
      .insert(cleanupLog)
      .values(record)
      .onConflictDoNothing({ target: cleanupLog.blobPath })
      .returning();
    return inserted ?? null;
  }
}
