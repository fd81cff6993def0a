import { describe, it, expect } from 'vitest';
import { loadScraperConfig } from '../../config/service-config';
import { ValidationError } from '../../application/errors';

describe('loadScraperConfig', () => {
  it('applies defaults', () => {
    const config = loadScraperConfig({});
    expect(config.jobs).toEqual({ maxConcurrentWorkers: 3, maxBatchSize: 100 });
    expect(config.storage.artifactTtlSeconds).toBe(3600);
    expect(config.storage.sweepIntervalSeconds).toBe(3600);
    expect(config.storage.publicBaseUrl).toBe('http://localhost:3000/files');
    expect(config.fetcher.maxRetries).toBe(2);
    expect(config.database.url).toBeUndefined();
  });

  it('reads overrides and strips trailing slashes from the public url', () => {
    const config = loadScraperConfig({
      MAX_CONCURRENT_WORKERS: '5',
      ARTIFACT_TTL_SECONDS: '60',
      SWEEP_INTERVAL_SECONDS: '15',
      BLOB_PUBLIC_BASE_URL: 'https://files.example.org/blobs//',
      PORT: '8080',
    });
    expect(config.jobs.maxConcurrentWorkers).toBe(5);
    expect(config.storage.artifactTtlSeconds).toBe(60);
    expect(config.storage.sweepIntervalSeconds).toBe(15);
    expect(config.storage.publicBaseUrl).toBe('https://files.example.org/blobs');
    expect(config.server.port).toBe(8080);
  });

  it('rejects a sweep interval cron cannot keep exactly', () => {
    expect(() => loadScraperConfig({ SWEEP_INTERVAL_SECONDS: '90' })).toThrow(
      'Invalid configuration: SWEEP_INTERVAL_SECONDS'
    );
    expect(() => loadScraperConfig({ ARTIFACT_TTL_SECONDS: '5000' })).toThrow(
      'Invalid configuration: SWEEP_INTERVAL_SECONDS'
    );
    expect(loadScraperConfig({ ARTIFACT_TTL_SECONDS: '5000', SWEEP_INTERVAL_SECONDS: '600' }).storage).toMatchObject({
      artifactTtlSeconds: 5000,
      sweepIntervalSeconds: 600,
    });
    expect(loadScraperConfig({ SWEEP_INTERVAL_SECONDS: '86400' }).storage.sweepIntervalSeconds).toBe(86400);
  });

  it('rejects invalid values naming the keys', () => {
    expect(() => loadScraperConfig({ MAX_CONCURRENT_WORKERS: '0', PORT: 'abc' })).toThrow(ValidationError);
    expect(() => loadScraperConfig({ MAX_CONCURRENT_WORKERS: '0', PORT: 'abc' })).toThrow(
      'Invalid configuration: PORT, MAX_CONCURRENT_WORKERS'
    );
  });
});
