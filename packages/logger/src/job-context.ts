/**
 * @fileoverview Job context via AsyncLocalStorage
 * Every periodic pass (scoring, retention, universe refresh) runs inside a
 * job context so its log lines share a job_id.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface JobContext {
  /** Unique id of one run of a job */
  job_id: string;

  /** Job name, e.g. 'retention-sweep' */
  job: string;

  [key: string]: unknown;
}

const jobContextStorage = new AsyncLocalStorage<JobContext>();

export function generateJobId(): string {
  return randomUUID();
}

/**
 * The active job context, or undefined outside of withJobContext().
 */
export function getJobContext(): JobContext | undefined {
  return jobContextStorage.getStore();
}

export function getJobId(): string | undefined {
  return jobContextStorage.getStore()?.job_id;
}

/**
 * Runs fn inside a fresh job context. The id propagates through every
 * await in fn, so loggers pick it up without it being passed around.
 *
 * @example
 * ```typescript
 * await withJobContext('scoring-pass', async () => {
 *   logger.info('Pass started'); // carries job=scoring-pass, job_id=<uuid>
 *   await engine.runPass(keys);
 * });
 * ```
 */
export async function withJobContext<T>(
  job: string,
  fn: () => Promise<T> | T,
  fields?: Record<string, unknown>
): Promise<T> {
  const context: JobContext = {
    ...fields,
    job,
    job_id: generateJobId(),
  };
  return jobContextStorage.run(context, fn);
}
