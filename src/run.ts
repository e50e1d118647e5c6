import { describeError } from './errors.js';
import { extractImageLinks } from './extract.js';
import { HttpClient, type Transport } from './http.js';
import { fetchListingPage, listingPageUrl } from './listing.js';
import { silentLogger, type Logger } from './logger.js';
import { retryPolicy, type RetryPolicy } from './retry.js';
import { runDownloads } from './scheduler.js';
import { ensureDir, writeJson } from './storage.js';
import { transformConfig, workerCount, type RunConfig } from './config.js';
import type { DownloadResult, ImageReference, OrderId, ProgressCallback, RunStatus, RunSummary } from './types.js';

export type RunDeps = {
  transport?: Transport;
  logger?: Logger;
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
  pagePolicy?: RetryPolicy;
  downloadPolicy?: RetryPolicy;
};

export const EXIT_CODES: Record<RunStatus, number> = {
  success: 0,
  fatal: 1,
  partial: 2
};

/** Listing page -> links -> downloads for one order. Never rejects for page or task failures. */
export async function runOrder(config: RunConfig, deps: RunDeps = {}): Promise<RunSummary> {
  const log = deps.logger ?? silentLogger;
  const transport = deps.transport ?? new HttpClient({ userAgent: config.userAgent, timeoutMs: config.timeoutMs });
  const pageUrl = listingPageUrl(config.baseUrl, config.orderId);

  log.info(`[run] order ${config.orderId}, extensions: ${config.extensions.join(' ')}, out: ${config.outputDir}`);

  let references: ImageReference[];
  try {
    const page = await fetchListingPage(config.orderId, config.baseUrl, {
      transport,
      policy: deps.pagePolicy ?? retryPolicy({ maxAttempts: 3 }),
      logger: log
    });
    references = extractImageLinks(page.html, page.url, config.extensions, {
      pathFilter: config.pathFilter || undefined
    });
    await ensureDir(config.outputDir);
  } catch (err) {
    log.error(`[run] fatal: ${describeError(err)}`);
    return finish(config, log, summarize(config.orderId, pageUrl, [], err));
  }

  log.info(`[extract] found ${references.length} unique image URL(s)`);
  if (references.length === 0) {
    log.warn('[extract] no images found; check that the page is accessible and lists image links');
  }

  const results = await runDownloads(references, {
    transport,
    outputDir: config.outputDir,
    transform: transformConfig(config),
    concurrency: workerCount(config),
    policy: deps.downloadPolicy ?? retryPolicy({ maxAttempts: config.maxAttempts }),
    skipExisting: config.skipExisting,
    signal: deps.signal,
    onProgress: deps.onProgress,
    logger: log
  });

  return finish(config, log, summarize(config.orderId, pageUrl, results));
}

export function summarize(orderId: OrderId, pageUrl: string, results: DownloadResult[], fatal?: unknown): RunSummary {
  const count = (outcome: DownloadResult['outcome']) => results.filter((r) => r.outcome === outcome).length;
  const failed = count('failed');
  const cancelled = count('cancelled');
  let status: RunStatus = 'success';
  if (fatal !== undefined) status = 'fatal';
  else if (failed + cancelled > 0) status = 'partial';

  return {
    orderId,
    pageUrl,
    status,
    total: results.length,
    succeeded: count('succeeded'),
    skipped: count('skipped'),
    failed,
    cancelled,
    results,
    ...(fatal === undefined ? {} : { error: describeError(fatal) })
  };
}

export function exitCodeFor(summary: RunSummary): number {
  return EXIT_CODES[summary.status];
}

// Plain JSON shape of a summary; task errors are already rendered to strings.
export function summaryReport(summary: RunSummary) {
  const { results, ...counts } = summary;
  return {
    ...counts,
    results: results.map((r) => ({
      url: r.task.reference.url,
      sourceUrl: r.task.sourceUrl,
      targetPath: r.task.targetPath,
      attempts: r.task.attempts,
      outcome: r.outcome,
      ...(r.error ? { error: r.error } : {})
    }))
  };
}

async function finish(config: RunConfig, log: Logger, summary: RunSummary): Promise<RunSummary> {
  if (summary.status !== 'fatal') {
    log.info(
      `[run] ${summary.status}: ${summary.succeeded} downloaded, ${summary.skipped} skipped, ` +
        `${summary.failed} failed, ${summary.cancelled} cancelled, ${summary.total} total`
    );
    for (const r of summary.results) {
      if (r.outcome === 'failed') log.error(`[run] failed: ${r.task.sourceUrl}: ${r.error}`);
    }
  }
  if (config.summaryFile) {
    try {
      await writeJson(config.summaryFile, summaryReport(summary));
      log.info(`[run] summary saved: ${config.summaryFile}`);
    } catch (err) {
      log.error(`[run] could not save summary: ${describeError(err)}`);
    }
  }
  return summary;
}
