import cron from 'node-cron';
import type { FastifyBaseLogger } from 'fastify';
import * as jobsRepo from '../storage/jobsRepo.js';

export type JobHandler = (payload: unknown, job: jobsRepo.JobRow) => Promise<void>;

export interface JobWorkerConfig {
  cronExpression: string;
  maxAttempts: number;
  backoffMs: number;
  batchSize?: number;
}

export interface DrainResult {
  processed: number;
  failed: number;
  dead: number;
}

/**
 * Drains the jobs outbox. A failed job is retried with exponential backoff
 * until it has been tried `maxAttempts` times, then it is marked dead.
 */
export class JobWorker {
  private task: ReturnType<typeof cron.schedule> | null = null;
  private isProcessing = false;

  constructor(
    private handlers: Partial<Record<string, JobHandler>>,
    private config: JobWorkerConfig,
    private log: FastifyBaseLogger,
    private now: () => Date = () => new Date()
  ) {}

  start(): void {
    if (this.task) {
      return;
    }

    this.task = cron.schedule(this.config.cronExpression, async () => {
      // Previous run still going
      if (this.isProcessing) {
        this.log.info('[jobs] Previous run still in progress, skipping');
        return;
      }

      this.isProcessing = true;
      try {
        await this.drain();
      } catch (error) {
        this.log.error({ err: error }, '[jobs] Worker run failed');
      } finally {
        this.isProcessing = false;
      }
    });

    this.log.info({ cron: this.config.cronExpression }, '[jobs] Job worker started');
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      this.log.info('[jobs] Job worker stopped');
    }
  }

  async drain(): Promise<DrainResult> {
    const now = this.now();
    const jobs = jobsRepo.getDueJobs(now.toISOString(), this.config.batchSize ?? 50);
    const result: DrainResult = { processed: 0, failed: 0, dead: 0 };

    for (const job of jobs) {
      const handler = this.handlers[job.job_type];
      if (!handler) {
        this.log.error({ jobId: job.job_id, jobType: job.job_type }, '[jobs] No handler for job type');
        jobsRepo.markJobFailed({ jobId: job.job_id, error: `No handler for job type ${job.job_type}`, retryAt: null });
        result.dead += 1;
        continue;
      }

      try {
        const payload: unknown = JSON.parse(job.payload);
        await handler(payload, job);
        jobsRepo.markJobDone(job.job_id);
        result.processed += 1;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        const attempts = job.attempts + 1;

        if (attempts >= this.config.maxAttempts) {
          this.log.error({ err: error, jobId: job.job_id, jobType: job.job_type, attempts }, '[jobs] Job failed for the last time');
          jobsRepo.markJobFailed({ jobId: job.job_id, error: message, retryAt: null });
          result.dead += 1;
          continue;
        }

        const delay = this.config.backoffMs * 2 ** (attempts - 1);
        const retryAt = new Date(now.getTime() + delay).toISOString();
        this.log.warn({ err: error, jobId: job.job_id, jobType: job.job_type, attempts, retryAt }, '[jobs] Job failed, will retry');
        jobsRepo.markJobFailed({ jobId: job.job_id, error: message, retryAt });
        result.failed += 1;
      }
    }

    if (jobs.length > 0) {
      this.log.info({ ...result, total: jobs.length }, '[jobs] Processed due jobs');
    }
    return result;
  }
}
