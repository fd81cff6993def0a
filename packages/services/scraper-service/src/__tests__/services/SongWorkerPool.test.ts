import { describe, it, expect, beforeEach, vi } from 'vitest';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: vi.fn(),
}));

vi.mock('@songharvest/platform-core', async importOriginal => ({
  ...(await importOriginal<typeof import('@songharvest/platform-core')>()),
  getLogger: () => mockLogger,
  createLogger: () => mockLogger,
}));

import { SongWorkerPool, type JobRunHooks, type JobRunSummary } from '../../application/services/SongWorkerPool';
import { ProgressTracker } from '../../application/services/ProgressTracker';
import {
  InMemoryBlobStore,
  InMemoryScrapeJobRepository,
  RecordingEventPublisher,
  ScriptedFetcher,
  createClock,
  type ScriptedSong,
} from '../helpers/fakes';

function recordingHooks() {
  const started: string[] = [];
  const settled: JobRunSummary[] = [];
  const hooks: JobRunHooks = {
    onStarted: async jobId => {
      started.push(jobId);
    },
    onSettled: async summary => {
      settled.push(summary);
    },
  };
  return { started, settled, hooks };
}

function seeded(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1103515245 + 12345) % 2147483648;
    return state / 2147483648;
  };
}

describe('SongWorkerPool', () => {
  let repo: InMemoryScrapeJobRepository;
  let blobs: InMemoryBlobStore;
  let tracker: ProgressTracker;
  let events: RecordingEventPublisher;

  beforeEach(() => {
    vi.clearAllMocks();
    const clock = createClock();
    repo = new InMemoryScrapeJobRepository(clock);
    blobs = new InMemoryBlobStore(clock);
    tracker = new ProgressTracker(clock);
    events = new RecordingEventPublisher();
  });

  function makePool(fetcher: ScriptedFetcher, concurrency = 3): SongWorkerPool {
    return new SongWorkerPool({ fetcher, blobStore: blobs, repository: repo, tracker, events, concurrency });
  }

  async function createJob(jobId: string, count: number) {
    const songs = Array.from({ length: count }, (_, index) => ({
      jobId,
      position: index + 1,
      title: `Song ${index + 1}`,
      artist: 'Choir',
      sourceUrl: `https://example.org/${jobId}/song-${index + 1}/`,
      eventName: null,
    }));
    return repo.createJob({ jobId, userId: 'u1', totalSongs: count }, songs);
  }

  it('stores lyrics and audio for every song and completes both phases', async () => {
    const pool = makePool(new ScriptedFetcher());
    const { job, songs } = await createJob('job-1', 3);
    const { started, settled, hooks } = recordingHooks();

    pool.dispatch(job, songs, hooks);
    await pool.whenSettled('job-1');

    expect(started).toEqual(['job-1']);
    expect(settled).toEqual([
      { jobId: 'job-1', userId: 'u1', cancelled: false, processed: 3, skipped: 0, failures: [] },
    ]);

    const stored = await repo.findJob('job-1');
    expect(stored).toMatchObject({ completedSongs: 3, failedSongs: 0, lyricsCompleted: 3, audioCompleted: 3 });

    expect(await blobs.list('job-1/lyrics/')).toHaveLength(3);
    const lyrics = await blobs.get('job-1/lyrics/001_Song 1.txt');
    expect(lyrics.toString('utf8')).toBe(
      ['Title: Song 1', 'Artist: Choir', 'Source: https://example.org/job-1/song-1/', '', '='.repeat(60), '', 'Lyrics of Song 1'].join(
        '\n'
      )
    );
    expect((await blobs.get('job-1/audio/002_Song 2.mp3')).toString()).toBe('audio of Song 2');

    const [first] = await repo.findSongs('job-1');
    expect(first).toMatchObject({
      hasLyrics: true,
      hasAudio: true,
      lyricsPath: 'job-1/lyrics/001_Song 1.txt',
      audioPath: 'job-1/audio/001_Song 1.mp3',
      audioFilename: '001_Song 1.mp3',
      audioSizeBytes: Buffer.byteLength('audio of Song 1'),
    });

    const progress = await repo.findProgress('job-1');
    expect(progress.map(p => [p.phase, p.status, p.current, p.total, p.percentage])).toEqual([
      ['lyrics', 'completed', 3, 3, 100],
      ['audio', 'completed', 3, 3, 100],
    ]);
  });

  it('counts a song as failed only when both artifacts fail', async () => {
    const script: Record<string, ScriptedSong> = {
      'https://example.org/job-2/song-2/': { audio: new Error('gone') },
      'https://example.org/job-2/song-3/': { lyrics: new Error('nope'), audio: new Error('gone') },
    };
    const pool = makePool(new ScriptedFetcher(script));
    const { job, songs } = await createJob('job-2', 3);
    const { settled, hooks } = recordingHooks();

    pool.dispatch(job, songs, hooks);
    await pool.whenSettled('job-2');

    expect(await repo.findJob('job-2')).toMatchObject({
      totalSongs: 3,
      completedSongs: 2,
      failedSongs: 1,
      lyricsCompleted: 2,
      audioCompleted: 1,
    });
    expect(settled[0]?.failures).toEqual([{ songId: songs[2]?.id, title: 'Song 3', reason: 'lyrics: nope; audio: gone' }]);

    const third = (await repo.findSongs('job-2'))[2];
    expect(third).toMatchObject({ hasLyrics: false, hasAudio: false, lyricsError: 'nope', audioError: 'gone' });

    const audio = await repo.findProgress('job-2').then(rows => rows.find(p => p.phase === 'audio'));
    expect(audio).toMatchObject({ status: 'completed', current: 3, succeeded: 1, failed: 2 });
  });

  it('treats a failed blob write as a failed artifact', async () => {
    blobs.failPutsMatching = /\/audio\//;
    const pool = makePool(new ScriptedFetcher());
    const { job, songs } = await createJob('job-3', 1);
    const { hooks } = recordingHooks();

    pool.dispatch(job, songs, hooks);
    await pool.whenSettled('job-3');

    expect(await repo.findJob('job-3')).toMatchObject({ completedSongs: 1, failedSongs: 0, audioCompleted: 0 });
    const [song] = await repo.findSongs('job-3');
    expect(song?.audioError).toBe('disk full while writing job-3/audio/001_Song 1.mp3');
    const audio = (await repo.findProgress('job-3')).find(p => p.phase === 'audio');
    expect(audio).toMatchObject({ status: 'failed', errorDetail: 'No audio could be fetched' });
  });

  it('never runs more songs at once than its concurrency, across jobs', async () => {
    const random = seeded(7);
    const fetcher = new ScriptedFetcher({}, () => Math.floor(random() * 4));
    const pool = makePool(fetcher, 2);
    const sizes = Array.from({ length: 6 }, () => 1 + Math.floor(random() * 6));
    const jobIds: string[] = [];

    for (const [index, size] of sizes.entries()) {
      const { job, songs } = await createJob(`job-r${index}`, size);
      pool.dispatch(job, songs, recordingHooks().hooks);
      jobIds.push(job.jobId);
    }
    await Promise.all(jobIds.map(id => pool.whenSettled(id)));

    expect(fetcher.maxActive).toBeGreaterThan(0);
    expect(fetcher.maxActive).toBeLessThanOrEqual(2);
    expect(repo.counterViolations).toEqual([]);
    const totals = await Promise.all(jobIds.map(id => repo.findJob(id)));
    expect(totals.map(job => job?.completedSongs)).toEqual(sizes);
  });

  it('settles a job cancelled before any song started without fetching', async () => {
    const fetcher = new ScriptedFetcher();
    const pool = makePool(fetcher);
    const { job, songs } = await createJob('job-4', 5);
    const { started, settled, hooks } = recordingHooks();

    pool.dispatch(job, songs, hooks);
    expect(pool.requestCancel('job-4')).toEqual({ accepted: true, alreadyRequested: false, settling: false, inFlight: 0 });
    await pool.whenSettled('job-4');

    expect(fetcher.calls).toEqual([]);
    expect(started).toEqual([]);
    expect(settled).toEqual([
      { jobId: 'job-4', userId: 'u1', cancelled: true, processed: 0, skipped: 5, failures: [] },
    ]);
    expect(await repo.findJob('job-4')).toMatchObject({ completedSongs: 0, failedSongs: 0 });
    const lyrics = (await repo.findProgress('job-4')).find(p => p.phase === 'lyrics');
    expect(lyrics).toMatchObject({
      status: 'failed',
      current: 0,
      errorDetail: 'Cancelled before every song was processed',
    });
  });

  it('lets in-flight songs finish after cancellation and skips the rest', async () => {
    const fetcher = new ScriptedFetcher();
    fetcher.hold();
    const pool = makePool(fetcher, 1);
    const { job, songs } = await createJob('job-5', 3);
    const { settled, hooks } = recordingHooks();

    pool.dispatch(job, songs, hooks);
    await vi.waitFor(() => expect(fetcher.calls).toHaveLength(1));

    expect(pool.requestCancel('job-5')).toEqual({ accepted: true, alreadyRequested: false, settling: false, inFlight: 1 });
    expect(pool.requestCancel('job-5')).toEqual({ accepted: false, alreadyRequested: true, settling: false, inFlight: 1 });
    expect(pool.isCancelRequested('job-5')).toBe(true);

    fetcher.release();
    await pool.whenSettled('job-5');

    expect(fetcher.calls).toEqual([
      { kind: 'lyrics', url: 'https://example.org/job-5/song-1/' },
      { kind: 'audio', url: 'https://example.org/job-5/song-1/' },
    ]);
    expect(settled[0]).toMatchObject({ cancelled: true, processed: 1, skipped: 2 });
    expect(await repo.findJob('job-5')).toMatchObject({ completedSongs: 1, failedSongs: 0 });
  });

  it('keeps processing when the start hook throws', async () => {
    const pool = makePool(new ScriptedFetcher());
    const { job, songs } = await createJob('job-6', 2);
    const { settled, hooks } = recordingHooks();

    pool.dispatch(job, songs, {
      ...hooks,
      onStarted: async () => {
        throw new Error('database unavailable');
      },
    });
    await pool.whenSettled('job-6');

    expect(settled[0]).toMatchObject({ cancelled: false, processed: 2 });
    expect(mockLogger.error).toHaveBeenCalledWith(
      'Job run hook onStarted failed',
      expect.objectContaining({ jobId: 'job-6' })
    );
  });

  it('cancels every run on shutdown', async () => {
    const fetcher = new ScriptedFetcher();
    fetcher.hold();
    const pool = makePool(fetcher, 1);
    const { job, songs } = await createJob('job-7', 2);
    const { settled, hooks } = recordingHooks();

    pool.dispatch(job, songs, hooks);
    await vi.waitFor(() => expect(fetcher.calls).toHaveLength(1));

    const drained = pool.shutdown();
    fetcher.release();
    await drained;

    expect(settled[0]).toMatchObject({ cancelled: true, processed: 1, skipped: 1 });
    expect(pool.isRunning('job-7')).toBe(false);
  });

  it('keeps the run until the settle hook returns', async () => {
    const pool = makePool(new ScriptedFetcher());
    const { job, songs } = await createJob('job-9', 1);
    let finishHook: () => void = () => undefined;
    const hookGate = new Promise<void>(resolve => {
      finishHook = resolve;
    });
    const order: string[] = [];

    pool.dispatch(job, songs, {
      onStarted: async () => undefined,
      onSettled: async () => {
        order.push('hook entered');
        await hookGate;
        order.push('hook returned');
      },
    });
    await vi.waitFor(() => expect(order).toEqual(['hook entered']));

    expect(pool.isRunning('job-9')).toBe(false);
    expect(pool.requestCancel('job-9')).toEqual({ accepted: false, alreadyRequested: false, settling: true, inFlight: 0 });

    const waiting = pool.whenSettled('job-9').then(() => order.push('settled'));
    const drained = pool.shutdown().then(() => order.push('drained'));
    finishHook();
    await Promise.all([waiting, drained]);

    expect(order).toEqual(['hook entered', 'hook returned', 'settled', 'drained']);
    expect(pool.requestCancel('job-9')).toEqual({ accepted: false, alreadyRequested: false, settling: false, inFlight: 0 });
  });

  it('publishes progress snapshots as songs finish', async () => {
    const pool = makePool(new ScriptedFetcher());
    const { job, songs } = await createJob('job-8', 1);

    pool.dispatch(job, songs, recordingHooks().hooks);
    await pool.whenSettled('job-8');

    expect(events.names()).toEqual(['job.progress', 'job.progress', 'job.progress', 'job.progress', 'job.progress', 'job.progress']);
  });
});
