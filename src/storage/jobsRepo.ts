import { getDatabase } from './db.js';

export type JobStatus = 'pending' | 'done' | 'dead';

export interface JobRow {
  job_id: number;
  job_type: string;
  payload: string;
  dedupe_key: string | null;
  status: JobStatus;
  attempts: number;
  run_at: string;
  last_error: string | null;
  created_at: string;
  updated_at: string;
}

/**
 * Queues a job. With a dedupe key, enqueuing the same key twice is a no-op
 * and returns false.
 */
export function enqueueJob(params: {
  jobType: string;
  payload: unknown;
  dedupeKey?: string;
  runAt?: string;
}): boolean {
  const db = getDatabase();
  const now = new Date().toISOString();

  const result = db.prepare(`
    INSERT OR IGNORE INTO jobs (
      job_type, payload, dedupe_key, status, attempts, run_at, last_error, created_at, updated_at
    ) VALUES (?, ?, ?, 'pending', 0, ?, NULL, ?, ?)
  `).run(params.jobType, JSON.stringify(params.payload), params.dedupeKey ?? null, params.runAt ?? now, now, now);

  return result.changes > 0;
}

export function getDueJobs(now: string, limit: number): JobRow[] {
  const db = getDatabase();
  return db.prepare(`
    SELECT * FROM jobs
    WHERE status = 'pending' AND run_at <= ?
    ORDER BY run_at ASC, job_id ASC
    LIMIT ?
  `).all(now, limit) as JobRow[];
}

export function markJobDone(jobId: number): void {
  const db = getDatabase();
  const now = new Date().toISOString();
  db.prepare(`
    UPDATE jobs SET status = 'done', attempts = attempts + 1, last_error = NULL, updated_at = ?
    WHERE job_id = ?
  `).run(now, jobId);
}

export function markJobFailed(params: { jobId: number; error: string; retryAt: string | null }): void {
  const db = getDatabase();
  const now = new Date().toISOString();

  if (params.retryAt === null) {
    db.prepare(`
      UPDATE jobs SET status = 'dead', attempts = attempts + 1, last_error = ?, updated_at = ?
      WHERE job_id = ?
    `).run(params.error, now, params.jobId);
    return;
  }

  db.prepare(`
    UPDATE jobs SET attempts = attempts + 1, last_error = ?, run_at = ?, updated_at = ?
    WHERE job_id = ?
  `).run(params.error, params.retryAt, now, params.jobId);
}

export function listJobs(filters: { jobType?: string; status?: JobStatus } = {}): JobRow[] {
  const db = getDatabase();
  const conditions: string[] = [];
  const values: string[] = [];

  if (filters.jobType !== undefined) {
    conditions.push('job_type = ?');
    values.push(filters.jobType);
  }
  if (filters.status !== undefined) {
    conditions.push('status = ?');
    values.push(filters.status);
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  return db.prepare(`SELECT * FROM jobs ${where} ORDER BY job_id ASC`).all(...values) as JobRow[];
}
