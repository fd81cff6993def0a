export type { ISongFetcher, SongSource, AudioPayload } from './ISongFetcher';
export type { IBlobStore, BlobEntry } from './IBlobStore';
export type { IScrapeJobRepository, CreatedJob } from './IScrapeJobRepository';
export type { ISessionRepository } from './ISessionRepository';
export type { ICleanupLogRepository, CleanupRecord, NewCleanupRecord, CleanupReason } from './ICleanupLogRepository';
export type { IJobEventPublisher, JobEventMap, JobEventName, JobEventListener } from './IJobEventPublisher';
