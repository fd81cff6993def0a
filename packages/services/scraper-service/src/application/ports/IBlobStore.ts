export interface BlobEntry {
  path: string;
  sizeBytes: number;
  createdAt: Date;
}

export interface IBlobStore {
  /** Stores `data` at `path`, replacing any existing blob, and returns its URI. */
  put(path: string, data: Buffer, contentType?: string): Promise<string>;
  /** Rejects with NotFoundError when the blob does not exist. */
  get(path: string): Promise<Buffer>;
  /** Deleting a missing blob is not an error. */
  delete(path: string): Promise<void>;
  list(prefix?: string): Promise<BlobEntry[]>;
  exists(path: string): Promise<boolean>;
  uriFor(path: string): string;
}
