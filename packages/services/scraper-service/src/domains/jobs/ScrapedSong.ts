export type ArtifactKind = 'lyrics' | 'audio';

export interface SongSubmission {
  title: string;
  artist: string;
  url: string;
  event?: string | null;
}

export interface ScrapedSong {
  id: string;
  jobId: string;
  position: number;
  title: string;
  artist: string;
  sourceUrl: string;
  eventName: string | null;
  hasLyrics: boolean;
  hasAudio: boolean;
  lyricsPath: string | null;
  lyricsError: string | null;
  audioPath: string | null;
  audioFilename: string | null;
  audioSizeBytes: number | null;
  audioError: string | null;
  createdAt: Date;
}

export type NewScrapedSong = Pick<ScrapedSong, 'jobId' | 'position' | 'title' | 'artist' | 'sourceUrl' | 'eventName'>;

export type ArtifactResult =
  | { stored: true; path: string; filename: string; sizeBytes: number }
  | { stored: false; error: string };
