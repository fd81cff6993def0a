import { ValidationError } from '../../application/errors';

export const ARTIFACT_TYPES = ['lyrics', 'audio', 'bundle'] as const;
export type ArtifactType = (typeof ARTIFACT_TYPES)[number];

export const AUDIO_EXTENSIONS = ['.mp3', '.wav', '.m4a', '.aac', '.ogg'] as const;
export const DEFAULT_AUDIO_EXTENSION = '.mp3';

const MAX_FILENAME_LENGTH = 200;
const LYRICS_RULE = '='.repeat(60);

export function sanitizeFilename(name: string): string {
  const collapsed = name
    .replace(/[\\/*?:"<>|]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
  // cut by code point so a surrogate pair is never split
  const cleaned = Array.from(collapsed).slice(0, MAX_FILENAME_LENGTH).join('').trim();
  return cleaned || 'untitled';
}

function isArtifactType(value: string): value is ArtifactType {
  return ARTIFACT_TYPES.some(type => type === value);
}

/**
 * Rejects empty, absolute and parent-relative paths.
 */
export function assertSafeBlobPath(path: string): void {
  if (!path || path.startsWith('/') || path.startsWith('\\') || /^[a-zA-Z]:/.test(path)) {
    throw new ValidationError(`Invalid blob path: ${path}`);
  }
  if (path.split(/[\\/]/).some(segment => segment === '..')) {
    throw new ValidationError(`Invalid blob path: ${path}`);
  }
}

export function buildArtifactPath(jobId: string, type: ArtifactType, filename: string): string {
  const path = `${jobId}/${type}/${filename}`;
  assertSafeBlobPath(path);
  return path;
}

export interface ParsedArtifactPath {
  jobId: string;
  type: ArtifactType;
  filename: string;
}

export function parseArtifactPath(path: string): ParsedArtifactPath | null {
  const segments = path.split('/');
  if (segments.length < 3) return null;
  const [jobId, type, ...rest] = segments;
  if (!jobId || !isArtifactType(type)) return null;
  return { jobId, type, filename: rest.join('/') };
}

function positionPrefix(position: number): string {
  return String(position).padStart(3, '0');
}

export function lyricsFilename(position: number, title: string): string {
  return `${positionPrefix(position)}_${sanitizeFilename(title)}.txt`;
}

export function audioFilename(position: number, title: string, extension: string): string {
  return `${positionPrefix(position)}_${sanitizeFilename(title)}${extension}`;
}

export function bundleFilename(jobId: string): string {
  return `${sanitizeFilename(jobId)}.zip`;
}

/**
 * Extension of the audio file behind `url`, falling back to .mp3 when the
 * path does not end in a known audio extension.
 */
export function audioExtensionFromUrl(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname.toLowerCase();
  } catch {
    return DEFAULT_AUDIO_EXTENSION;
  }
  return AUDIO_EXTENSIONS.find(ext => pathname.endsWith(ext)) ?? DEFAULT_AUDIO_EXTENSION;
}

export interface LyricsDocumentInput {
  title: string;
  artist: string;
  sourceUrl: string;
  eventName: string | null;
}

export function formatLyricsDocument(song: LyricsDocumentInput, lyrics: string): string {
  const header = [`Title: ${song.title}`, `Artist: ${song.artist}`, `Source: ${song.sourceUrl}`];
  if (song.eventName) {
    header.push(`Event: ${song.eventName}`);
  }
  return `${header.join('\n')}\n\n${LYRICS_RULE}\n\n${lyrics}`;
}
