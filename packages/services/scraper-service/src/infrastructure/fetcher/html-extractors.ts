import * as cheerio from 'cheerio';

const SKIPPED_PARAGRAPH = /^(Download|Listen|Share)\b/;
const AUDIO_LINK = /\.(mp3|wav|m4a)(\?.*)?$/i;

/**
 * Lyrics paragraphs of a song page, separated by blank lines. Returns null
 * when the page has none.
 */
export function extractLyrics(html: string): string | null {
  const $ = cheerio.load(html);
  const paragraphs: string[] = [];

  $('div.entry-content p').each((_, element) => {
    const paragraph = $(element);
    paragraph.find('br').replaceWith('\n');
    const text = paragraph
      .text()
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.length > 0)
      .join('\n');

    if (text && !SKIPPED_PARAGRAPH.test(text)) {
      paragraphs.push(text);
    }
  });

  return paragraphs.length > 0 ? paragraphs.join('\n\n') : null;
}

function resolveUrl(candidate: string | undefined, pageUrl: string): string | null {
  const trimmed = candidate?.trim();
  if (!trimmed) return null;
  try {
    return new URL(trimmed, pageUrl).toString();
  } catch {
    return null;
  }
}

/**
 * Absolute URL of the audio file linked from a song page.
 */
export function extractAudioUrl(html: string, pageUrl: string): string | null {
  const $ = cheerio.load(html);
  const lookups: Array<() => string | undefined> = [
    () => $('figure audio[src]').first().attr('src'),
    () => $('audio[src]').first().attr('src'),
    () => $('audio source[src]').first().attr('src'),
    () =>
      $('a[href]')
        .filter((_, element) => AUDIO_LINK.test($(element).attr('href') ?? ''))
        .first()
        .attr('href'),
  ];

  for (const lookup of lookups) {
    const url = resolveUrl(lookup(), pageUrl);
    if (url) return url;
  }
  return null;
}
