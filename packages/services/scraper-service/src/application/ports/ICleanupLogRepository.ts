import type { ArtifactType } from '../../domains/artifacts/artifact-paths';

export type CleanupReason = 'auto_delete' | 'manual' | 'job_cleanup';

export interface CleanupRecord {
  id: string;
  blobPath: string;
  artifactType: ArtifactType | 'unknown';
  sizeBytes: number;
  jobId: string | null;
  reason: CleanupReason;
  deletedAt: Date;
}

export type NewCleanupRecord = Omit<CleanupRecord, 'id'>;

export interface ICleanupLogRepository {
  /** Subset of `paths` that already has a record. */
  findLoggedPaths(paths: string[]): Promise<Set<string>>;
  /** Append-only. Returns null when the path was already logged. */
  append(record: NewCleanupRecord): Promise<CleanupRecord | null>;
}
