import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';

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

import { SongListSessionService, type JobSubmitter } from '../../application/services/SongListSessionService';
import { ConflictError, NotFoundError, ValidationError } from '../../application/errors';
import { InMemorySessionRepository, createClock } from '../helpers/fakes';

describe('SongListSessionService', () => {
  let repository: InMemorySessionRepository;
  let submit: Mock<JobSubmitter['submit']>;
  let service: SongListSessionService;

  beforeEach(() => {
    vi.clearAllMocks();
    repository = new InMemorySessionRepository();
    submit = vi.fn<JobSubmitter['submit']>().mockResolvedValue({ jobId: 'job-1', totalSongs: 1 });
    service = new SongListSessionService({
      repository,
      jobs: { submit },
      detectEvent: url => (url.includes('/easter/') ? 'Easter' : null),
      clock: createClock(),
    });
  });

  async function queueOneSong(userId = 'u1'): Promise<void> {
    await service.start(userId);
    await service.submitField(userId, 'Amazing Grace');
    await service.submitField(userId, 'John Newton');
    await service.submitField(userId, 'https://example.org/amazing-grace/');
    await service.confirm(userId);
  }

  it('walks a song through the fields into the queue', async () => {
    expect(await service.start('u1')).toMatchObject({ state: 'awaiting_title', isActive: true, queue: [] });
    expect((await service.submitField('u1', ' Amazing Grace ')).state).toBe('awaiting_artist');
    expect((await service.submitField('u1', 'John Newton')).state).toBe('awaiting_url');

    const withUrl = await service.submitField('u1', 'https://example.org/easter/amazing-grace/');
    expect(withUrl).toMatchObject({
      state: 'awaiting_confirmation',
      draft: {
        title: 'Amazing Grace',
        artist: 'John Newton',
        url: 'https://example.org/easter/amazing-grace/',
        event: 'Easter',
      },
    });

    expect((await service.requestEvent('u1')).state).toBe('awaiting_event');
    expect((await service.submitField('u1', 'Good Friday')).draft.event).toBe('Good Friday');

    const confirmed = await service.confirm('u1');
    expect(confirmed.state).toBe('awaiting_title');
    expect(await service.queue('u1')).toEqual([
      {
        title: 'Amazing Grace',
        artist: 'John Newton',
        url: 'https://example.org/easter/amazing-grace/',
        event: 'Good Friday',
      },
    ]);
  });

  it('allows one active session per user and type', async () => {
    await service.start('u1');
    await expect(service.start('u1')).rejects.toBeInstanceOf(ConflictError);
    await expect(service.start('u1', 'playlist')).resolves.toMatchObject({ sessionType: 'playlist' });
    await expect(service.start('u2')).resolves.toMatchObject({ userId: 'u2' });
  });

  it('keeps the queue across a cancel and a restart', async () => {
    await queueOneSong();
    await service.submitField('u1', 'Half typed');

    expect(await service.cancel('u1')).toMatchObject({ state: 'idle', isActive: false, draft: {} });
    await expect(service.cancel('u1')).rejects.toBeInstanceOf(ConflictError);

    const restarted = await service.start('u1');
    expect(restarted.state).toBe('awaiting_title');
    expect(restarted.queue).toHaveLength(1);
  });

  it('submits the queue as one job and empties it', async () => {
    await queueOneSong();

    expect(await service.submitQueue('u1')).toEqual({ jobId: 'job-1', totalSongs: 1 });
    expect(submit).toHaveBeenCalledWith('u1', [
      { title: 'Amazing Grace', artist: 'John Newton', url: 'https://example.org/amazing-grace/', event: null },
    ]);
    expect(await repository.find('u1', 'addsong')).toMatchObject({ state: 'idle', isActive: false, queue: [] });
  });

  it('keeps the queue when the job is rejected', async () => {
    await queueOneSong();
    submit.mockRejectedValueOnce(new ValidationError('A job may contain at most 0 songs, got 1'));

    await expect(service.submitQueue('u1')).rejects.toThrow('A job may contain at most 0 songs, got 1');
    expect(await service.queue('u1')).toHaveLength(1);
  });

  it('rejects an empty queue', async () => {
    await service.start('u1');
    await expect(service.submitQueue('u1')).rejects.toThrow('The song queue is empty');
    expect(submit).not.toHaveBeenCalled();
  });

  it('clears the queue and ends the session', async () => {
    await queueOneSong();
    expect(await service.clear('u1')).toMatchObject({ queue: [], state: 'idle', isActive: false });
  });

  it('rejects invalid input without changing the session', async () => {
    await service.start('u1');
    await service.submitField('u1', 'Title');
    await service.submitField('u1', 'Artist');

    await expect(service.submitField('u1', 'not a url')).rejects.toThrow('Not a valid http(s) URL: not a url');
    expect((await repository.find('u1', 'addsong'))?.state).toBe('awaiting_url');
  });

  it('reports a missing session', async () => {
    await expect(service.submitField('u9', 'x')).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.confirm('u9')).rejects.toThrow('Session not found: u9/addsong');
    await expect(service.cancel('u9')).rejects.toBeInstanceOf(ConflictError);
    expect(await service.queue('u9')).toEqual([]);
  });
});
