import { describe, expect, it, vi } from 'vitest';
import { RunQueueService } from '../src/services/run-queue.service';
import type { RunSummary } from '../src/types';

interface FakeJob {
  id: string;
  data: { trigger: string };
  attemptsMade: number;
}

const bull = vi.hoisted(() => {
  const queueOptions: unknown[] = [];
  const processors: Array<(job: FakeJob) => Promise<unknown>> = [];
  const add = vi.fn(async () => ({ id: 'job-1' }));
  return { queueOptions, processors, add };
});

vi.mock('bullmq', () => ({
  Queue: class {
    constructor(_name: string, options: unknown) {
      bull.queueOptions.push(options);
    }
    add = bull.add;
    getWaitingCount = async () => 2;
    getActiveCount = async () => 1;
    getCompletedCount = async () => 5;
    getFailedCount = async () => 0;
    close = vi.fn(async () => undefined);
  },
  QueueEvents: class {
    on = vi.fn();
    close = vi.fn(async () => undefined);
  },
  Worker: class {
    constructor(_name: string, processor: (job: FakeJob) => Promise<unknown>) {
      bull.processors.push(processor);
    }
    on = vi.fn();
    close = vi.fn(async () => undefined);
  },
}));

const SUMMARY: RunSummary = {
  startedAt: new Date('2024-05-01T06:00:00Z'),
  finishedAt: new Date('2024-05-01T06:30:00Z'),
  targets: [],
  freshRecords: 0,
  datasetSize: 0,
  stats: { inserted: 0, updated: 0, relisted: 0, unlisted: 0, dropped: 0 },
};

function createQueue() {
  const runner = { run: vi.fn(async () => SUMMARY) };
  const queue = new RunQueueService(runner, {
    redis: { host: 'localhost', port: 6379 },
    queue: { name: 'crawl-runs' },
    run: { maxAttempts: 10, retryDelayMs: 20000, runOnStart: true },
  });
  return { runner, queue };
}

describe('RunQueueService', () => {
  it('retries whole runs with a fixed backoff', () => {
    createQueue();

    expect(bull.queueOptions.at(-1)).toMatchObject({
      defaultJobOptions: { attempts: 10, backoff: { type: 'fixed', delay: 20000 } },
    });
  });

  it('runs a crawl for each job', async () => {
    const { runner, queue } = createQueue();
    await queue.start();

    const processJob = bull.processors.at(-1);
    const result = await processJob?.({ id: 'job-1', data: { trigger: 'manual' }, attemptsMade: 0 });

    expect(runner.run).toHaveBeenCalledTimes(1);
    expect(result).toBe(SUMMARY);
  });

  it('enqueues and schedules runs', async () => {
    const { queue } = createQueue();

    await expect(queue.enqueueRun('startup')).resolves.toBe('job-1');
    await queue.schedule('0 3 * * *');

    expect(bull.add).toHaveBeenCalledWith('crawl-run', { trigger: 'startup' });
    expect(bull.add).toHaveBeenCalledWith(
      'crawl-run',
      { trigger: 'schedule' },
      { repeat: { pattern: '0 3 * * *' }, jobId: 'scheduled-crawl' }
    );
  });

  it('reports queue counts', async () => {
    const { queue } = createQueue();

    await expect(queue.getQueueStats()).resolves.toEqual({ waiting: 2, active: 1, completed: 5, failed: 0 });
  });
});
