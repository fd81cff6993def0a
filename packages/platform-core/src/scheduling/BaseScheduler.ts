/**
 * BaseScheduler - Abstract base class for recurring background tasks
 * Shared start/stop/status/health logic on top of node-cron
 */

import * as cron from 'node-cron';
import { getLogger, type Logger } from '../logging/index.js';
import { serializeError } from '../logging/error-serializer.js';
import { errorMessage } from '../error-handling/errors.js';
import type { SchedulerStatus, SchedulerInfo, SchedulerExecutionResult, SchedulerConfig } from './types.js';

type ResolvedSchedulerConfig = Required<SchedulerConfig>;

export abstract class BaseScheduler {
  protected task: cron.ScheduledTask | null = null;
  protected logger: Logger;
  protected status: SchedulerStatus = 'stopped';

  protected lastRunAt: Date | null = null;
  protected lastRunDurationMs: number | null = null;
  protected lastRunSuccess: boolean | null = null;
  protected runCount = 0;
  protected errorCount = 0;

  protected config: ResolvedSchedulerConfig;
  private startedAt = 0;
  private running: Promise<SchedulerExecutionResult> | null = null;

  constructor(config: SchedulerConfig) {
    this.config = {
      enabled: true,
      runOnStart: false,
      maxRetries: 0,
      retryDelayMs: 1000,
      timeoutMs: 300000,
      initialDelayMs: 0,
      ...config,
    };
    this.logger = getLogger('scheduler');
  }

  protected initLogger(): void {
    this.logger = getLogger(`scheduler-${this.name}`);
  }

  abstract get name(): string;

  abstract get serviceName(): string;

  protected abstract execute(): Promise<SchedulerExecutionResult>;

  get cronExpression(): string {
    return this.config.cronExpression;
  }

  start(): void {
    if (this.task || this.status === 'running') {
      this.logger.warn(`[${this.name}] Already running, skipping start`);
      return;
    }

    if (!this.config.enabled) {
      this.logger.info(`[${this.name}] Disabled, not starting`);
      return;
    }

    if (!cron.validate(this.config.cronExpression)) {
      this.logger.error(`[${this.name}] Invalid cron expression: ${this.config.cronExpression}`);
      return;
    }

    this.startedAt = Date.now();

    this.task = cron.schedule(
      this.config.cronExpression,
      () => {
        const elapsedMs = Date.now() - this.startedAt;
        if (this.config.initialDelayMs && elapsedMs < this.config.initialDelayMs) {
          this.logger.debug(`[${this.name}] Skipping execution during initial delay period`, {
            elapsedMs,
            initialDelayMs: this.config.initialDelayMs,
          });
          return;
        }
        void this.runWithErrorHandling();
      },
      { scheduled: false }
    );

    this.task.start();
    this.status = 'running';

    this.logger.debug(`[${this.name}] Scheduler started`, {
      cronExpression: this.config.cronExpression,
    });

    if (this.config.runOnStart) {
      this.triggerNow().catch(err => {
        this.logger.error(`[${this.name}] Initial run failed`, { error: serializeError(err) });
      });
    }
  }

  stop(): void {
    if (!this.task) {
      this.logger.debug(`[${this.name}] Already stopped`);
      return;
    }

    this.task.stop();
    this.task = null;
    this.status = 'stopped';
    this.logger.info(`[${this.name}] Scheduler stopped`);
  }

  async triggerNow(): Promise<SchedulerExecutionResult> {
    this.logger.info(`[${this.name}] Manual trigger requested`);
    return this.runWithErrorHandling();
  }

  /**
   * Overlapping ticks join the run already in progress.
   */
  private runWithErrorHandling(): Promise<SchedulerExecutionResult> {
    if (this.running) {
      this.logger.debug(`[${this.name}] Previous run still in progress, skipping tick`);
      return this.running;
    }
    this.running = this.runWithRetries().finally(() => {
      this.running = null;
    });
    return this.running;
  }

  private async runWithRetries(): Promise<SchedulerExecutionResult> {
    const startTime = Date.now();
    this.lastRunAt = new Date();
    this.runCount++;

    const maxAttempts = this.config.maxRetries + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const result = await this.executeWithTimeout();
        this.lastRunDurationMs = Date.now() - startTime;
        this.lastRunSuccess = result.success;

        if (result.success) {
          this.logger.debug(`[${this.name}] Execution completed`, {
            durationMs: this.lastRunDurationMs,
            runCount: this.runCount,
          });
          return { ...result, durationMs: this.lastRunDurationMs };
        }

        this.logger.warn(`[${this.name}] Execution failed`, { message: result.message, attempt, maxAttempts });
        if (attempt === maxAttempts) {
          this.errorCount++;
          return { ...result, durationMs: this.lastRunDurationMs };
        }
      } catch (error) {
        this.lastRunDurationMs = Date.now() - startTime;
        this.lastRunSuccess = false;

        this.logger.error(`[${this.name}] Execution error`, {
          error: serializeError(error),
          attempt,
          maxAttempts,
          durationMs: this.lastRunDurationMs,
        });

        if (attempt === maxAttempts) {
          this.errorCount++;
          return { success: false, message: errorMessage(error), durationMs: this.lastRunDurationMs };
        }
      }
      await this.sleep(this.config.retryDelayMs);
    }

    return { success: false, message: 'Max retries exceeded', durationMs: Date.now() - startTime };
  }

  private async executeWithTimeout(): Promise<SchedulerExecutionResult> {
    const timeoutMs = this.config.timeoutMs;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`Execution timed out after ${timeoutMs}ms`)), timeoutMs);
    });

    try {
      return await Promise.race([this.execute(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  getStatus(): SchedulerStatus {
    return this.status;
  }

  getInfo(): SchedulerInfo {
    return {
      name: this.name,
      cronExpression: this.config.cronExpression,
      status: this.status,
      lastRunAt: this.lastRunAt,
      lastRunDurationMs: this.lastRunDurationMs,
      lastRunSuccess: this.lastRunSuccess,
      runCount: this.runCount,
      errorCount: this.errorCount,
      serviceName: this.serviceName,
    };
  }

  isHealthy(): boolean {
    if (this.status !== 'running') return true;
    if (this.runCount === 0) return true;
    return this.errorCount / this.runCount < 0.5;
  }
}
