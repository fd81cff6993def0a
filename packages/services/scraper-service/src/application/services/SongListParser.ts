/**
 * SongListParser
 *
 * Turns a pasted song list into submissions:
 *
 *   GREAT KING OF ALL BY MICHAELA
 *   https://example.org/great-king-of-all-praise-night-25/
 *
 * Event labels are derived from the URL slug through the table in
 * config/event-patterns.json.
 */

import { z } from 'zod';
import eventPatternData from '../../config/event-patterns.json';
import type { SongSubmission } from '../../domains/jobs/ScrapedSong';

const EventPatternTableSchema = z.object({
  events: z.array(z.object({ pattern: z.string().min(1), template: z.string().min(1) })),
  contexts: z.array(z.object({ pattern: z.string().min(1), label: z.string().min(1) })),
});

export type EventPatternTable = z.infer<typeof EventPatternTableSchema>;

const LOWERCASE_TITLE_WORDS = new Set([
  'a', 'an', 'the', 'and', 'but', 'or', 'for', 'nor', 'on', 'at', 'to', 'from', 'by', 'of', 'in', 'with',
]);

const ARTIST_ABBREVIATIONS = new Set(['DJ', 'MC', 'DSA', 'DCNS', 'PST', 'REV']);

function capitalize(word: string): string {
  // Eli-J, Don't
  return word.toLowerCase().replace(/(^|[^a-z'])([a-z])/g, (_match, before: string, letter: string) => before + letter.toUpperCase());
}

function collapseWhitespace(value: string): string {
  return value.trim().replace(/\s+/g, ' ');
}

export function formatTitle(title: string): string {
  return collapseWhitespace(title)
    .split(' ')
    .map((word, index) => (index > 0 && LOWERCASE_TITLE_WORDS.has(word.toLowerCase()) ? word.toLowerCase() : capitalize(word)))
    .join(' ');
}

export function normalizeArtistName(artist: string): string {
  return collapseWhitespace(artist)
    .split(' ')
    .map(word => (ARTIST_ABBREVIATIONS.has(word.toUpperCase()) ? word.toUpperCase() : capitalize(word)))
    .join(' ');
}

/** Splits `TITLE BY ARTIST` or `TITLE - ARTIST`. */
export function parseTitleLine(line: string): { title: string; artist: string } | null {
  const byMatch = /^(.+?)\s+BY\s+(.+)$/i.exec(line);
  if (byMatch) {
    return { title: byMatch[1].trim(), artist: byMatch[2].trim() };
  }
  const dashMatch = /^(.+?)\s*-\s*(.+)$/.exec(line);
  if (dashMatch) {
    return { title: dashMatch[1].trim(), artist: dashMatch[2].trim() };
  }
  return null;
}

interface CompiledTable {
  events: Array<{ regex: RegExp; template: string }>;
  contexts: Array<{ regex: RegExp; label: string }>;
}

export class SongListParser {
  private readonly table: CompiledTable;

  constructor(table: EventPatternTable = EventPatternTableSchema.parse(eventPatternData)) {
    this.table = {
      events: table.events.map(e => ({ regex: new RegExp(e.pattern), template: e.template })),
      contexts: table.contexts.map(c => ({ regex: new RegExp(c.pattern), label: c.label })),
    };
  }

  extractEvent(url: string): string | null {
    const slug = url.toLowerCase();
    const parts: string[] = [];

    for (const { regex, template } of this.table.events) {
      const match = regex.exec(slug);
      if (match) {
        const groups = match.slice(1);
        parts.push(template.replace(/\{(\d+)\}/g, (_m, index: string) => groups[Number(index)] ?? ''));
        break;
      }
    }

    for (const { regex, label } of this.table.contexts) {
      if (regex.test(slug)) {
        parts.push(label);
        break;
      }
    }

    return parts.length > 0 ? parts.join(' ') : null;
  }

  parse(text: string): SongSubmission[] {
    const lines = text
      .split(/\r?\n/)
      .map(line => line.trim())
      .filter(Boolean);
    const songs: SongSubmission[] = [];

    let i = 0;
    while (i < lines.length) {
      const line = lines[i];
      if (line.startsWith('http')) {
        i++;
        continue;
      }

      const parsed = parseTitleLine(line);
      const next = lines[i + 1];
      if (!parsed || next === undefined || !next.startsWith('http')) {
        i++;
        continue;
      }

      const event = this.extractEvent(next);
      songs.push({
        title: formatTitle(parsed.title),
        artist: normalizeArtistName(parsed.artist),
        url: next,
        ...(event ? { event } : {}),
      });
      i += 2;
    }

    return songs;
  }
}
