export interface SongSource {
  title: string;
  artist: string;
  sourceUrl: string;
}

export interface AudioPayload {
  data: Buffer;
  extension: string;
  contentType: string;
  sourceUrl: string;
}

/**
 * Fetches the artifacts of one song. Retries, backoff and timeouts are the
 * implementation's concern; a rejection is one failed artifact.
 */
export interface ISongFetcher {
  fetchLyrics(source: SongSource): Promise<string>;
  fetchAudio(source: SongSource): Promise<AudioPayload>;
}
