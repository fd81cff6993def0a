import { describe, it, expect, vi } from 'vitest';

vi.mock('../logging/logger.js', () => {
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  return { getLogger: () => logger, createLogger: () => logger };
});

import { BaseScheduler } from '../scheduling/BaseScheduler.js';
import { SchedulerRegistry } from '../scheduling/SchedulerRegistry.js';
import { intervalToCron, isExactCronInterval } from '../scheduling/cron.js';
import type { SchedulerConfig, SchedulerExecutionResult } from '../scheduling/types.js';

type Step = () => Promise<SchedulerExecutionResult>;

class ScriptedScheduler extends BaseScheduler {
  calls = 0;

  constructor(
    private readonly schedulerName: string,
    private readonly steps: Step[],
    config: Omit<SchedulerConfig, 'cronExpression'> = {}
  ) {
    super({ cronExpression: '*/5 * * * *', retryDelayMs: 0, ...config });
    this.initLogger();
  }

  get name(): string {
    return this.schedulerName;
  }

  get serviceName(): string {
    return 'test-service';
  }

  protected async execute(): Promise<SchedulerExecutionResult> {
    const step = this.steps[Math.min(this.calls, this.steps.length - 1)];
    this.calls++;
    if (!step) throw new Error('no step scripted');
    return step();
  }
}

const ok: Step = async () => ({ success: true, message: 'done', durationMs: 0 });
const boom: Step = async () => {
  throw new Error('sweep crashed');
};

describe('intervalToCron', () => {
  it.each([
    [15_000, '*/15 * * * * *'],
    [300_000, '*/5 * * * *'],
    [3_600_000, '0 */1 * * *'],
    [6 * 3_600_000, '0 */6 * * *'],
    [48 * 3_600_000, '0 0 * * *'],
    [0, '*/1 * * * * *'],
  ])('maps %d ms to %s', (ms, expected) => {
    expect(intervalToCron(ms)).toBe(expected);
  });

  it.each([
    [15_000, true],
    [300_000, true],
    [7_200_000, true],
    [86_400_000, true],
    [90_000, false],
    [420_000, false],
    [5 * 3_600_000, false],
    [48 * 3_600_000, false],
    [1_500, false],
    [0, false],
  ])('reports whether %d ms is kept exactly: %s', (ms, expected) => {
    expect(isExactCronInterval(ms)).toBe(expected);
  });
});

describe('BaseScheduler', () => {
  it('reports a successful manual run', async () => {
    const scheduler = new ScriptedScheduler('sweep', [ok]);

    const result = await scheduler.triggerNow();

    expect(result).toMatchObject({ success: true, message: 'done' });
    expect(scheduler.getInfo()).toMatchObject({ name: 'sweep', runCount: 1, errorCount: 0, lastRunSuccess: true });
  });

  it('retries a throwing run before giving up', async () => {
    const retried = new ScriptedScheduler('retry', [boom, ok], { maxRetries: 1 });
    expect(await retried.triggerNow()).toMatchObject({ success: true });
    expect(retried.calls).toBe(2);

    const failing = new ScriptedScheduler('fail', [boom], { maxRetries: 1 });
    expect(await failing.triggerNow()).toMatchObject({ success: false, message: 'sweep crashed' });
    expect(failing.calls).toBe(2);
    expect(failing.getInfo()).toMatchObject({ errorCount: 1, lastRunSuccess: false });
  });

  it('times out a run that never finishes', async () => {
    const hanging = new ScriptedScheduler('hang', [() => new Promise<SchedulerExecutionResult>(() => undefined)], {
      timeoutMs: 20,
    });

    expect(await hanging.triggerNow()).toMatchObject({ success: false, message: 'Execution timed out after 20ms' });
  });

  it('joins an overlapping trigger to the run in progress', async () => {
    let finish: () => void = () => undefined;
    const slow = new ScriptedScheduler('slow', [
      () =>
        new Promise<SchedulerExecutionResult>(resolve => {
          finish = () => resolve({ success: true, durationMs: 0 });
        }),
    ]);

    const first = slow.triggerNow();
    const second = slow.triggerNow();
    finish();

    expect(await first).toEqual(await second);
    expect(slow.calls).toBe(1);
  });
});

describe('SchedulerRegistry', () => {
  it('registers once per service and name and reports health', async () => {
    const sweep = new ScriptedScheduler('sweep', [boom]);
    SchedulerRegistry.register(sweep);
    SchedulerRegistry.register(new ScriptedScheduler('sweep', [ok]));

    expect(SchedulerRegistry.getAll()).toEqual([sweep]);

    await sweep.triggerNow();
    const report = SchedulerRegistry.getHealthReport();
    expect(report).toMatchObject({ healthy: true, totalSchedulers: 1, runningCount: 0, errorRate: 1 });
  });
});
