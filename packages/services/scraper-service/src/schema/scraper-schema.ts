/**
 * Scraper Service Database Schema
 * Drizzle ORM schema for scrape jobs, their songs and progress, song-list
 * sessions and the cleanup audit log
 */

import {
  pgTable,
  text,
  timestamp,
  boolean,
  integer,
  bigint,
  doublePrecision,
  jsonb,
  uuid,
  index,
  unique,
} from 'drizzle-orm/pg-core';
import type { JobStatus } from '../domains/jobs/ScrapeJob';
import type { PhaseStatus, ScrapePhase } from '../domains/jobs/PhaseProgress';
import type { QueuedSong, SessionState, SongDraft } from '../domains/sessions/SongListSession';
import type { ArtifactType } from '../domains/artifacts/artifact-paths';
import type { CleanupReason } from '../application/ports/ICleanupLogRepository';

/**
 * Scrape Jobs Table
 * One row per submitted song list; counters are only ever incremented
 */
export const scrapeJobs = pgTable(
  'scr_jobs',
  {
    jobId: text('job_id').primaryKey(),
    userId: text('user_id').notNull(),
    status: text('status').$type<JobStatus>().notNull().default('queued'),

    totalSongs: integer('total_songs').notNull(),
    completedSongs: integer('completed_songs').notNull().default(0),
    failedSongs: integer('failed_songs').notNull().default(0),
    lyricsCompleted: integer('lyrics_completed').notNull().default(0),
    audioCompleted: integer('audio_completed').notNull().default(0),

    bundlePath: text('bundle_path'),
    bundleUri: text('bundle_uri'),
    errorMessage: text('error_message'),

    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
    completedAt: timestamp('completed_at'),
  },
  table => [index('idx_scr_jobs_user_created').on(table.userId, table.createdAt)]
);

/**
 * Scraped Songs Table
 */
export const scrapedSongs = pgTable(
  'scr_songs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    jobId: text('job_id')
      .notNull()
      .references(() => scrapeJobs.jobId, { onDelete: 'cascade' }),
    position: integer('position').notNull(),
    title: text('title').notNull(),
    artist: text('artist').notNull(),
    sourceUrl: text('source_url').notNull(),
    eventName: text('event_name'),

    hasLyrics: boolean('has_lyrics').notNull().default(false),
    hasAudio: boolean('has_audio').notNull().default(false),
    lyricsPath: text('lyrics_path'),
    lyricsError: text('lyrics_error'),
    audioPath: text('audio_path'),
    audioFilename: text('audio_filename'),
    audioSizeBytes: bigint('audio_size_bytes', { mode: 'number' }),
    audioError: text('audio_error'),

    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  table => [
    unique('uq_scr_songs_job_url').on(table.jobId, table.sourceUrl),
    index('idx_scr_songs_lyrics_path').on(table.lyricsPath),
    index('idx_scr_songs_audio_path').on(table.audioPath),
  ]
);

/**
 * Job Progress Table
 * One row per job and phase
 */
export const jobProgress = pgTable(
  'scr_job_progress',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    jobId: text('job_id')
      .notNull()
      .references(() => scrapeJobs.jobId, { onDelete: 'cascade' }),
    phase: text('phase').$type<ScrapePhase>().notNull(),
    current: integer('current').notNull().default(0),
    total: integer('total').notNull().default(0),
    succeeded: integer('succeeded').notNull().default(0),
    failed: integer('failed').notNull().default(0),
    status: text('status').$type<PhaseStatus>().notNull().default('running'),
    percentage: doublePrecision('percentage').notNull().default(0),
    currentItem: text('current_item'),
    errorDetail: text('error_detail'),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  table => [unique('uq_scr_job_progress_phase').on(table.jobId, table.phase)]
);

/**
 * Song List Sessions Table
 */
export const songListSessions = pgTable(
  'scr_sessions',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: text('user_id').notNull(),
    sessionType: text('session_type').notNull(),
    state: text('state').$type<SessionState>().notNull().default('idle'),
    draft: jsonb('draft').$type<SongDraft>().notNull().default({}),
    queue: jsonb('queue').$type<QueuedSong[]>().notNull().default([]),
    isActive: boolean('is_active').notNull().default(false),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  table => [unique('uq_scr_sessions_user_type').on(table.userId, table.sessionType)]
);

/**
 * Cleanup Log Table
 * Append-only record of every blob the sweeper deleted
 */
export const cleanupLog = pgTable(
  'scr_cleanup_log',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    blobPath: text('blob_path').notNull().unique(),
    artifactType: text('artifact_type').$type<ArtifactType | 'unknown'>().notNull(),
    sizeBytes: bigint('size_bytes', { mode: 'number' }).notNull().default(0),
    jobId: text('job_id'),
    reason: text('reason').$type<CleanupReason>().notNull(),
    deletedAt: timestamp('deleted_at').defaultNow().notNull(),
  },
  table => [index('idx_scr_cleanup_log_job').on(table.jobId)]
);

export type ScrapeJobRow = typeof scrapeJobs.$inferSelect;
export type ScrapedSongRow = typeof scrapedSongs.$inferSelect;
export type JobProgressRow = typeof jobProgress.$inferSelect;
export type SongListSessionRow = typeof songListSessions.$inferSelect;
export type CleanupLogRow = typeof cleanupLog.$inferSelect;
