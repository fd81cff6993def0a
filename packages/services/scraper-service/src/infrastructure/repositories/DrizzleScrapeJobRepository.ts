import { and, asc, desc, eq, inArray, sql } from 'drizzle-orm';
import { jobProgress, scrapedSongs, scrapeJobs, type JobProgressRow } from '../../schema/scraper-schema';
import type { DatabaseConnection } from '../database/DatabaseConnectionFactory';
import type { CreatedJob, IScrapeJobRepository } from '../../application/ports';
import type { JobCounterDelta, JobStatus, JobTransitionPatch, NewScrapeJob, ScrapeJob } from '../../domains/jobs/ScrapeJob';
import type { ArtifactKind, ArtifactResult, NewScrapedSong, ScrapedSong } from '../../domains/jobs/ScrapedSong';
import type { PhaseProgress } from '../../domains/jobs/PhaseProgress';
import { getLogger } from '../../config/logger';

const logger = getLogger('scraper-service:job-repository');

function toProgress(row: JobProgressRow): PhaseProgress {
  return {
    jobId: row.jobId,
    phase: row.phase,
    current: row.current,
    total: row.total,
    succeeded: row.succeeded,
    failed: row.failed,
    status: row.status,
    percentage: row.percentage,
    currentItem: row.currentItem,
    errorDetail: row.errorDetail,
    updatedAt: row.updatedAt,
  };
}

function artifactColumns(kind: ArtifactKind, result: ArtifactResult) {
  if (kind === 'lyrics') {
    return result.stored
      ? { hasLyrics: true, lyricsPath: result.path, lyricsError: null }
      : { hasLyrics: false, lyricsPath: null, lyricsError: result.error };
  }
  return result.stored
    ? {
        hasAudio: true,
        audioPath: result.path,
        audioFilename: result.filename,
        audioSizeBytes: result.sizeBytes,
        audioError: null,
      }
    : { hasAudio: false, audioPath: null, audioFilename: null, audioSizeBytes: null, audioError: result.error };
}

export class DrizzleScrapeJobRepository implements IScrapeJobRepository {
  constructor(private readonly db: DatabaseConnection) {}

  async createJob(job: NewScrapeJob, songs: NewScrapedSong[]): Promise<CreatedJob> {
    return this.db.transaction(async tx => {
      const [created] = await tx
        .insert(scrapeJobs)
        .values({ jobId: job.jobId, userId: job.userId, totalSongs: job.totalSongs, status: 'queued' })
        .returning();

      const inserted = songs.length > 0 ? await tx.insert(scrapedSongs).values(songs).returning() : [];
      inserted.sort((a, b) => a.position - b.position);

      logger.debug('Job persisted', { jobId: created.jobId, songs: inserted.length });
      return { job: created, songs: inserted };
    });
  }

  async findJob(jobId: string): Promise<ScrapeJob | null> {
    const rows = await this.db.select().from(scrapeJobs).where(eq(scrapeJobs.jobId, jobId)).limit(1);
    return rows[0] ?? null;
  }

  async findJobsByUser(userId: string): Promise<ScrapeJob[]> {
    return this.db
      .select()
      .from(scrapeJobs)
      .where(eq(scrapeJobs.userId, userId))
      .orderBy(desc(scrapeJobs.createdAt), desc(scrapeJobs.jobId));
  }

  async transitionStatus(
    jobId: string,
    from: JobStatus[],
    to: JobStatus,
    patch: JobTransitionPatch = {}
  ): Promise<ScrapeJob | null> {
    if (from.length === 0) return null;
    const [updated] = await this.db
      .update(scrapeJobs)
      .set({ ...patch, status: to, updatedAt: new Date() })
      .where(and(eq(scrapeJobs.jobId, jobId), inArray(scrapeJobs.status, from)))
      .returning();
    return updated ?? null;
  }

  async incrementCounters(jobId: string, delta: JobCounterDelta): Promise<void> {
    await this.db
      .update(scrapeJobs)
      .set({
        completedSongs: sql`${scrapeJobs.completedSongs} + ${delta.completed ?? 0}`,
        failedSongs: sql`${scrapeJobs.failedSongs} + ${delta.failed ?? 0}`,
        lyricsCompleted: sql`${scrapeJobs.lyricsCompleted} + ${delta.lyrics ?? 0}`,
        audioCompleted: sql`${scrapeJobs.audioCompleted} + ${delta.audio ?? 0}`,
        updatedAt: new Date(),
      })
      .where(eq(scrapeJobs.jobId, jobId));
  }

  async findSongs(jobId: string): Promise<ScrapedSong[]> {
    return this.db.select().from(scrapedSongs).where(eq(scrapedSongs.jobId, jobId)).orderBy(asc(scrapedSongs.position));
  }

  async recordArtifactResult(songId: string, kind: ArtifactKind, result: ArtifactResult): Promise<void> {
    await this.db.update(scrapedSongs).set(artifactColumns(kind, result)).where(eq(scrapedSongs.id, songId));
  }

  async clearArtifactReference(path: string): Promise<number> {
    const lyrics = await this.db
      .update(scrapedSongs)
      .set({ lyricsPath: null })
      .where(eq(scrapedSongs.lyricsPath, path))
      .returning({ id: scrapedSongs.id });
    const audio = await this.db
      .update(scrapedSongs)
      .set({ audioPath: null })
      .where(eq(scrapedSongs.audioPath, path))
      .returning({ id: scrapedSongs.id });
    return lyrics.length + audio.length;
  }

  async upsertProgress(progress: PhaseProgress): Promise<void> {
    const { jobId, phase, ...fields } = progress;
    await this.db
      .insert(jobProgress)
      .values(progress)
      .onConflictDoUpdate({ target: [jobProgress.jobId, jobProgress.phase], set: fields });
    logger.debug('Progress stored', { jobId, phase, percentage: progress.percentage, status: progress.status });
  }

  async findProgress(jobId: string): Promise<PhaseProgress[]> {
    const rows = await this.db.select().from(jobProgress).where(eq(jobProgress.jobId, jobId));
    return rows.map(toProgress);
  }
}
