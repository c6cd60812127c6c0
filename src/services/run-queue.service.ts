import { Queue, QueueEvents, Worker, type ConnectionOptions, type Job } from 'bullmq';
import type { AppConfig } from '../config';
import type { RunSummary } from '../types';
import { createLogger } from '../utils/logger';
import type { CrawlRunnerService } from './crawl-runner.service';

const logger = createLogger('run-queue');

const RUN_JOB = 'crawl-run';

export interface RunJobData {
  trigger: 'startup' | 'schedule' | 'manual';
}

/**
 * RunQueueService
 * Runs crawls as BullMQ jobs. A failed run is retried as a whole with a
 * fixed backoff, a bounded number of times.
 */
export class RunQueueService {
  private queue: Queue<RunJobData, RunSummary>;
  private queueEvents: QueueEvents;
  private worker: Worker<RunJobData, RunSummary> | null = null;
  private readonly connection: ConnectionOptions;

  constructor(
    private readonly runner: Pick<CrawlRunnerService, 'run'>,
    private readonly config: Pick<AppConfig, 'redis' | 'queue' | 'run'>
  ) {
    this.connection = {
      host: config.redis.host,
      port: config.redis.port,
    };

    this.queue = new Queue<RunJobData, RunSummary>(config.queue.name, {
      connection: this.connection,
      defaultJobOptions: {
        attempts: config.run.maxAttempts,
        backoff: { type: 'fixed', delay: config.run.retryDelayMs },
        removeOnComplete: 50,
        removeOnFail: 50,
      },
    });

    this.queueEvents = new QueueEvents(config.queue.name, {
      connection: this.connection,
    });
  }

  async start(): Promise<void> {
    // One run at a time: the dataset is read and written once per run
    this.worker = new Worker<RunJobData, RunSummary>(
      this.config.queue.name,
      (job) => this.process(job),
      { connection: this.connection, concurrency: 1 }
    );

    this.worker.on('failed', (job, error) => {
      const attempts = job ? `${job.attemptsMade}/${this.config.run.maxAttempts}` : '?';
      logger.error(`Run ${job?.id ?? 'unknown'} failed (attempt ${attempts}): ${error.message}`);
    });

    this.worker.on('error', (error) => {
      logger.error('Worker error:', error);
    });

    this.queueEvents.on('completed', ({ jobId }) => {
      logger.info(`Run ${jobId} completed`);
    });

    this.queueEvents.on('error', (error) => {
      logger.error('Queue events error:', error);
    });

    logger.info(`Run worker started on queue ${this.config.queue.name}`);
  }

  private async process(job: Job<RunJobData, RunSummary>): Promise<RunSummary> {
    logger.info(`Run ${job.id} (${job.data.trigger}) attempt ${job.attemptsMade + 1}/${this.config.run.maxAttempts}`);
    return this.runner.run();
  }

  async enqueueRun(trigger: RunJobData['trigger'] = 'manual'): Promise<string | undefined> {
    const job = await this.queue.add(RUN_JOB, { trigger });
    logger.info(`Enqueued run ${job.id} (${trigger})`);
    return job.id;
  }

  /**
   * Repeat runs on a cron pattern
   */
  async schedule(pattern: string): Promise<void> {
    await this.queue.add(RUN_JOB, { trigger: 'schedule' }, { repeat: { pattern }, jobId: 'scheduled-crawl' });
    logger.info(`Scheduled runs with pattern "${pattern}"`);
  }

  async getQueueStats(): Promise<{ waiting: number; active: number; completed: number; failed: number }> {
    const [waiting, active, completed, failed] = await Promise.all([
      this.queue.getWaitingCount(),
      this.queue.getActiveCount(),
      this.queue.getCompletedCount(),
      this.queue.getFailedCount(),
    ]);
    return { waiting, active, completed, failed };
  }

  async close(): Promise<void> {
    await this.worker?.close();
    await this.queueEvents.close();
    await this.queue.close();
    logger.info('Run queue closed');
  }
}
