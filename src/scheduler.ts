import path from 'node:path';
import pLimit from 'p-limit';
import { describeError } from './errors.js';
import { retryPolicy, withRetry, type RetryPolicy } from './retry.js';
import { fileExists, writeFileAtomic } from './storage.js';
import { transformUrl } from './transform.js';
import { sanitizeFilename, urlBasename } from './utils.js';
import { silentLogger, type Logger } from './logger.js';
import type { Transport } from './http.js';
import type {
  DownloadOutcome,
  DownloadResult,
  DownloadTask,
  ImageReference,
  ProgressCallback,
  TransformConfig
} from './types.js';

export type SchedulerOptions = {
  transport: Transport;
  outputDir: string;
  transform: TransformConfig;
  concurrency: number; // 1 = sequential
  policy?: RetryPolicy;
  skipExisting?: boolean;
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
  logger?: Logger;
};

/**
 * File names from each reference's last path segment. Clashes (compared
 * case-insensitively) get -1, -2, ... in discovery order.
 */
export function planFileNames(references: readonly ImageReference[]): string[] {
  const used = new Set<string>();
  return references.map((ref) => {
    const name = sanitizeFilename(urlBasename(ref.url));
    const ext = path.extname(name);
    const stem = name.slice(0, name.length - ext.length);
    let candidate = name;
    for (let n = 1; used.has(candidate.toLowerCase()); n++) {
      candidate = `${stem}-${n}${ext}`;
    }
    used.add(candidate.toLowerCase());
    return candidate;
  });
}

// References that clean up to the same URL (a link and its thumbnail) become one task.
export function createTasks(references: readonly ImageReference[], outputDir: string, transform: TransformConfig): DownloadTask[] {
  const seen = new Set<string>();
  const unique: Array<{ reference: ImageReference; sourceUrl: string }> = [];
  for (const reference of references) {
    const sourceUrl = transformUrl(reference.url, transform);
    if (seen.has(sourceUrl)) continue;
    seen.add(sourceUrl);
    unique.push({ reference, sourceUrl });
  }
  const names = planFileNames(unique.map((u) => u.reference));
  return unique.map(({ reference, sourceUrl }, i): DownloadTask => ({
    reference,
    sourceUrl,
    targetPath: path.join(outputDir, names[i]),
    attempts: 0,
    status: 'pending'
  }));
}

/**
 * Downloads every reference with at most `concurrency` requests in flight.
 * Each task retries on its own; a failed task never stops its siblings.
 * Once `signal` aborts, tasks not yet started resolve as `cancelled`, running
 * ones finish their current attempt and are not retried. Results come back in discovery order.
 */
export async function runDownloads(references: readonly ImageReference[], opts: SchedulerOptions): Promise<DownloadResult[]> {
  const { transport, signal } = opts;
  const policy = opts.policy ?? retryPolicy();
  const log = opts.logger ?? silentLogger;
  const tasks = createTasks(references, opts.outputDir, opts.transform);
  const limit = pLimit(Math.max(1, Math.floor(opts.concurrency)));
  const total = tasks.length;
  let completed = 0;

  const settle = (task: DownloadTask, outcome: DownloadOutcome, error?: unknown): DownloadResult => {
    if (outcome !== 'cancelled') {
      completed++;
      opts.onProgress?.(completed, total);
    }
    return Object.freeze({
      task: Object.freeze({ ...task }),
      outcome,
      ...(error === undefined ? {} : { error: describeError(error) })
    });
  };

  const runTask = async (task: DownloadTask): Promise<DownloadResult> => {
    if (signal?.aborted) return settle(task, 'cancelled');

    if (opts.skipExisting && (await fileExists(task.targetPath))) {
      task.status = 'succeeded';
      log.info(`[download] exists: ${task.targetPath}`);
      return settle(task, 'skipped');
    }

    let outcome: DownloadOutcome = 'succeeded';
    try {
      const body = await withRetry(
        (attempt) => {
          task.attempts = attempt;
          task.status = 'in-flight';
          return transport.getBuffer(task.sourceUrl);
        },
        policy,
        {
          signal,
          onRetry: (err, attempt, delayMs) => {
            task.status = 'retrying';
            log.warn(`[download] retry ${attempt}/${policy.maxAttempts} in ${delayMs}ms: ${task.sourceUrl} (${describeError(err)})`);
          }
        }
      );
      await writeFileAtomic(task.targetPath, body);
      task.status = 'succeeded';
      log.info(`[download] ok: ${task.targetPath}`);
    } catch (err) {
      outcome = 'failed';
      task.status = 'failed';
      task.error = err;
      log.error(`[download] fail: ${task.sourceUrl} after ${task.attempts} attempt(s): ${describeError(err)}`);
    }
    return settle(task, outcome, task.error);
  };

  return Promise.all(tasks.map((task) => limit(() => runTask(task))));
}
