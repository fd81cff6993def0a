/**
 * Storage Sweep Scheduler
 * Runs the storage lifecycle sweeper on a fixed interval
 */

import { BaseScheduler, intervalToCron, type SchedulerExecutionResult } from '@songharvest/platform-core';
import { SERVICE_NAME } from '../../config/service-config';
import type { StorageLifecycleSweeper } from '../services/StorageLifecycleSweeper';

export class StorageSweepScheduler extends BaseScheduler {
  get name(): string {
    return 'storage-sweep';
  }

  get serviceName(): string {
    return SERVICE_NAME;
  }

  constructor(
    private readonly sweeper: StorageLifecycleSweeper,
    intervalSeconds: number
  ) {
    super({
      cronExpression: intervalToCron(intervalSeconds * 1000),
      enabled: true,
      maxRetries: 0,
      timeoutMs: 600000,
    });
    this.initLogger();
  }

  protected async execute(): Promise<SchedulerExecutionResult> {
    const result = await this.sweeper.sweep();
    return {
      // per-blob failures are retried on the next run
      success: true,
      message: `Deleted ${result.deleted} of ${result.expired} expired blobs`,
      data: {
        scanned: result.scanned,
        expired: result.expired,
        deleted: result.deleted,
        skipped: result.skipped,
        failed: result.failed,
      },
      durationMs: 0,
      noOp: result.deleted === 0 && result.failed === 0,
    };
  }
}
