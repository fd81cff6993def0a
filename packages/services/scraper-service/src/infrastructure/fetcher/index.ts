export { HttpSongFetcher, type FetcherSettings } from './HttpSongFetcher';
export { extractLyrics, extractAudioUrl } from './html-extractors';
