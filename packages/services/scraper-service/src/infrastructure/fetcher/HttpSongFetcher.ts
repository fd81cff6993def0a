/**
 * HTTP Song Fetcher
 * Fetches song pages with axios and extracts lyrics and the audio link
 * with cheerio. Transient failures are retried with exponential backoff.
 */

import axios, { type AxiosInstance } from 'axios';
import { errorMessage } from '@songharvest/platform-core';
import { FetchFailure } from '../../application/errors';
import type { AudioPayload, ISongFetcher, SongSource } from '../../application/ports';
import { audioExtensionFromUrl } from '../../domains/artifacts/artifact-paths';
import type { ScraperConfig } from '../../config/service-config';
import { getLogger } from '../../config/logger';
import { extractAudioUrl, extractLyrics } from './html-extractors';

const logger = getLogger('scraper-service:http-fetcher');

export type FetcherSettings = ScraperConfig['fetcher'];

export interface HttpSongFetcherOptions {
  client?: AxiosInstance;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_AUDIO_CONTENT_TYPE = 'audio/mpeg';

function isRetryable(error: unknown): boolean {
  if (error instanceof FetchFailure) return false;
  if (axios.isAxiosError(error) && error.response) {
    const status = error.response.status;
    return status >= 500 || status === 429;
  }
  return true;
}

function headerValue(value: unknown): string | undefined {
  return typeof value === 'string' ? value : typeof value === 'number' ? String(value) : undefined;
}

export class HttpSongFetcher implements ISongFetcher {
  private readonly client: AxiosInstance;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly settings: FetcherSettings,
    options: HttpSongFetcherOptions = {}
  ) {
    this.client =
      options.client ??
      axios.create({
        maxRedirects: 5,
        headers: { 'User-Agent': settings.userAgent },
      });
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
  }

  async fetchLyrics(source: SongSource): Promise<string> {
    const html = await this.fetchPage(source.sourceUrl);
    const lyrics = extractLyrics(html);
    if (!lyrics) {
      throw new FetchFailure(`No lyrics found on ${source.sourceUrl}`, source.sourceUrl);
    }
    return lyrics;
  }

  async fetchAudio(source: SongSource): Promise<AudioPayload> {
    const html = await this.fetchPage(source.sourceUrl);
    const audioUrl = extractAudioUrl(html, source.sourceUrl);
    if (!audioUrl) {
      throw new FetchFailure(`No audio link found on ${source.sourceUrl}`, source.sourceUrl);
    }
    return this.withRetries('audio download', audioUrl, () => this.download(audioUrl));
  }

  private fetchPage(url: string): Promise<string> {
    return this.withRetries('page fetch', url, async () => {
      const response = await this.client.get<string>(url, {
        responseType: 'text',
        timeout: this.settings.requestTimeoutMs,
      });
      return String(response.data);
    });
  }

  private async download(url: string): Promise<AudioPayload> {
    const limit = this.settings.maxAudioBytes;
    const response = await this.client.get<ArrayBuffer>(url, {
      responseType: 'arraybuffer',
      timeout: this.settings.downloadTimeoutMs,
      maxContentLength: limit,
    });

    const declared = Number(headerValue(response.headers['content-length']) ?? NaN);
    if (Number.isFinite(declared) && declared > limit) {
      throw new FetchFailure(`Audio file too large (${declared} bytes, limit ${limit})`, url);
    }

    const data = Buffer.from(response.data);
    if (data.length > limit) {
      throw new FetchFailure(`Audio file too large (${data.length} bytes, limit ${limit})`, url);
    }
    if (data.length === 0) {
      throw new FetchFailure('Audio file is empty', url);
    }

    const contentType = headerValue(response.headers['content-type']) ?? DEFAULT_AUDIO_CONTENT_TYPE;
    return { data, extension: audioExtensionFromUrl(url), contentType, sourceUrl: url };
  }

  private async withRetries<T>(label: string, url: string, operation: () => Promise<T>): Promise<T> {
    const attempts = this.settings.maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        if (attempt >= attempts || !isRetryable(error)) {
          if (error instanceof FetchFailure) throw error;
          throw new FetchFailure(
            `${label} failed for ${url}: ${errorMessage(error)}`,
            url,
            error instanceof Error ? error : undefined
          );
        }
        const delay = this.settings.backoffMs * 2 ** (attempt - 1);
        logger.debug(`Retrying ${label}`, { url, attempt, delayMs: delay, error: errorMessage(error) });
        await this.sleep(delay);
      }
    }
  }
}
