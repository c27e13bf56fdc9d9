/**
 * Quire — Fetch Orchestrator
 *
 * Runs every source's fetch concurrently, each raced against its own
 * timer, and merges the outcomes:
 * 1. Start one fetch per source (optionally capped by maxConcurrency)
 * 2. Convert each settled fetch, or timeout, into a FetchOutcome
 * 3. After all outcomes are in, fold them into RunStats and concatenate
 *    the items, both in completion order
 *
 * A timeout stops the wait and aborts the signal handed to the source.
 * Sources that ignore the signal may finish their I/O in the background;
 * that result is discarded. Closing connections is the transport's job.
 */

import pLimit from 'p-limit';
import type { FetchOutcome, Item, RunStats, Source } from '../types';
import { TimeoutError, describeError } from '../lib/errors';
import { logger } from '../lib/logger';
import { RunStatsAggregator } from './stats';

// ============================================================
// TYPES
// ============================================================

export interface FetchOptions {
  /** Per-source bound in ms (default: 10s, capped at MAX_TIMEOUT_MS) */
  timeoutMs?: number;
  /** Maximum fetches in flight (default: unbounded) */
  maxConcurrency?: number;
}

export interface FetchAllResult {
  items: Item[];
  stats: Readonly<RunStats>;
}

export const DEFAULT_TIMEOUT_MS = 10_000;

/** Largest delay setTimeout honours; longer ones fire after 1ms */
export const MAX_TIMEOUT_MS = 2_147_483_647;

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Fill in defaults. Out-of-range values never reach the timer or the
 * limiter: an unusable timeout falls back to the default and a long one
 * is capped at MAX_TIMEOUT_MS; an unusable concurrency cap means
 * unbounded.
 */
function resolveOptions(options: FetchOptions): Required<FetchOptions> {
  const { timeoutMs = DEFAULT_TIMEOUT_MS, maxConcurrency } = options;

  const usableTimeout = timeoutMs > 0;
  if (!usableTimeout) {
    logger.warn('Ignoring invalid timeout', { timeoutMs, fallback: DEFAULT_TIMEOUT_MS });
  }
  const usableCap =
    maxConcurrency === undefined ||
    maxConcurrency === Number.POSITIVE_INFINITY ||
    isPositiveInteger(maxConcurrency);
  if (!usableCap) {
    logger.warn('Ignoring invalid concurrency cap', { maxConcurrency });
  }

  return {
    timeoutMs: usableTimeout ? Math.min(timeoutMs, MAX_TIMEOUT_MS) : DEFAULT_TIMEOUT_MS,
    maxConcurrency:
      usableCap && maxConcurrency !== undefined ? maxConcurrency : Number.POSITIVE_INFINITY,
  };
}

// ============================================================
// SINGLE SOURCE
// ============================================================

/**
 * Fetch one source under the timeout.
 *
 * @throws TimeoutError when the bound elapses first, otherwise whatever
 * the source's fetch rejected with
 */
export async function fetchOne(source: Source, options: FetchOptions = {}): Promise<Item[]> {
  const { timeoutMs } = resolveOptions(options);
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(source.name, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([source.fetch(controller.signal), timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

async function settle(source: Source, options: FetchOptions): Promise<FetchOutcome> {
  try {
    const items = await fetchOne(source, options);
    return { success: true, sourceName: source.name, items };
  } catch (error) {
    return { success: false, sourceName: source.name, error: describeError(error) };
  }
}

// ============================================================
// ALL SOURCES
// ============================================================

/**
 * Fetch every source and merge the results. Never rejects: per-source
 * failures are reported in stats.errors.
 */
export async function fetchAll(
  sources: readonly Source[],
  options: FetchOptions = {}
): Promise<FetchAllResult> {
  const config = resolveOptions(options);
  const total = sources.length;
  const aggregator = new RunStatsAggregator(total);

  if (total === 0) {
    return { items: [], stats: aggregator.finish() };
  }

  const startTime = Date.now();
  const limit = pLimit(config.maxConcurrency);
  const completed: FetchOutcome[] = [];

  logger.info(`Fetching content from ${total} sources...`, {
    timeoutMs: config.timeoutMs,
    maxConcurrency: Number.isFinite(config.maxConcurrency) ? config.maxConcurrency : 'unbounded',
  });

  await Promise.all(
    sources.map((source, index) =>
      limit(async () => {
        logger.info(`  [${index + 1}/${total}] Fetching ${source.name}`);
        const outcome = await settle(source, config);

        if (!outcome.success) {
          logger.warn('Source fetch failed', { source: outcome.sourceName, error: outcome.error });
        }

        completed.push(outcome);
      })
    )
  );

  // Single writer: nothing is merged until every fetch has settled
  const items: Item[] = [];
  for (const outcome of completed) {
    aggregator.record(outcome);
    if (outcome.success) {
      items.push(...outcome.items);
    }
  }

  const stats = aggregator.finish();

  logger.debug('Fetch cycle finished', {
    succeeded: stats.succeeded,
    failed: stats.failed,
    totalItems: stats.totalItems,
    durationMs: Date.now() - startTime,
  });

  return { items, stats };
}
