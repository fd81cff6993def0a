import JSZip from 'jszip';
import { errorMessage } from '@songharvest/platform-core';
import { getLogger } from '../../config/logger';
import type { ScrapedSong } from '../../domains/jobs/ScrapedSong';
import { buildArtifactPath, bundleFilename } from '../../domains/artifacts/artifact-paths';
import { ArchivingFailure } from '../errors';
import type { IBlobStore } from '../ports';

const logger = getLogger('scraper-service:bundle-archiver');

export interface BundleManifestEntry {
  position: number;
  title: string;
  artist: string;
  url: string;
  event: string | null;
  lyricsFile: string | null;
  audioFile: string | null;
}

export interface BundleResult {
  path: string;
  uri: string;
  sizeBytes: number;
  songCount: number;
}

export function songsWithArtifacts(songs: ScrapedSong[]): ScrapedSong[] {
  return songs.filter(song => (song.hasLyrics && song.lyricsPath) || (song.hasAudio && song.audioPath));
}

function basename(path: string): string {
  return path.slice(path.lastIndexOf('/') + 1);
}

/**
 * Packs the stored lyrics and audio of a job into one ZIP blob at
 * `{jobId}/bundle/{jobId}.zip`.
 */
export class BundleArchiver {
  constructor(private readonly blobStore: IBlobStore) {}

  async archive(jobId: string, songs: ScrapedSong[], onSongAdded: (song: ScrapedSong) => void): Promise<BundleResult> {
    const included = songsWithArtifacts(songs);
    if (included.length === 0) {
      throw new ArchivingFailure(`Job ${jobId} has no artifacts to archive`);
    }

    const zip = new JSZip();
    const manifest: BundleManifestEntry[] = [];

    for (const song of included) {
      const entry: BundleManifestEntry = {
        position: song.position,
        title: song.title,
        artist: song.artist,
        url: song.sourceUrl,
        event: song.eventName,
        lyricsFile: null,
        audioFile: null,
      };

      if (song.hasLyrics && song.lyricsPath) {
        entry.lyricsFile = `lyrics/${basename(song.lyricsPath)}`;
        zip.file(entry.lyricsFile, await this.read(song.lyricsPath));
      }
      if (song.hasAudio && song.audioPath) {
        entry.audioFile = `audio/${song.audioFilename ?? basename(song.audioPath)}`;
        zip.file(entry.audioFile, await this.read(song.audioPath));
      }

      manifest.push(entry);
      onSongAdded(song);
    }

    zip.file('manifest.json', JSON.stringify({ jobId, songs: manifest }, null, 2));

    let data: Buffer;
    try {
      data = await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE', compressionOptions: { level: 6 } });
    } catch (error) {
      throw new ArchivingFailure(`Could not build bundle for ${jobId}: ${errorMessage(error)}`, asError(error));
    }

    const path = buildArtifactPath(jobId, 'bundle', bundleFilename(jobId));
    let uri: string;
    try {
      uri = await this.blobStore.put(path, data, 'application/zip');
    } catch (error) {
      throw new ArchivingFailure(`Could not store bundle for ${jobId}: ${errorMessage(error)}`, asError(error));
    }

    logger.info('Bundle stored', { jobId, path, sizeBytes: data.length, songs: included.length });
    return { path, uri, sizeBytes: data.length, songCount: included.length };
  }

  private async read(path: string): Promise<Buffer> {
    try {
      return await this.blobStore.get(path);
    } catch (error) {
      throw new ArchivingFailure(`Could not read ${path}: ${errorMessage(error)}`, asError(error));
    }
  }
}

function asError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}
