/**
 * Batch Runner
 * Bounded worker pool over a record stream. Each worker processes records
 * independently and folds results into a shared aggregator.
 */
import type { RecordResult, SourceRecord } from '../types/index.js';
import { ReportAggregator } from '../report/reportAggregator.js';
import { auditInfo } from '../audit/auditLogger.js';
import type { PiiScanner } from './scanner.js';

export interface BatchOptions {
  processId: string;
  concurrency?: number;
  highVolumeThreshold?: number;
  /** Stops intake of new records; the outcome is then marked incomplete. */
  signal?: AbortSignal;
  onRecord?: (result: RecordResult) => void | Promise<void>;
  /** Fold into an existing aggregator instead of a fresh one. */
  aggregator?: ReportAggregator;
}

export interface BatchOutcome {
  aggregator: ReportAggregator;
  processed: number;
  incomplete: boolean;
}

async function* toAsync<T>(items: Iterable<T> | AsyncIterable<T>): AsyncGenerator<T> {
  yield* items;
}

/**
 * Process every record from `records`. The batch performs no timing; the
 * caller measures elapsed time and passes it to `aggregator.finalize`.
 */
export async function processBatch(
  records: Iterable<SourceRecord> | AsyncIterable<SourceRecord>,
  scanner: PiiScanner,
  options: BatchOptions,
): Promise<BatchOutcome> {
  const aggregator = options.aggregator
    ?? new ReportAggregator(options.processId, { highVolumeThreshold: options.highVolumeThreshold });
  const concurrency = Math.max(1, options.concurrency ?? 1);
  // Concurrent next() calls on an async generator are queued, so workers
  // never receive the same record twice.
  const source = toAsync(records);
  let processed = 0;
  // Once any worker fails, the others stop taking records.
  const failures: unknown[] = [];

  async function worker(): Promise<void> {
    try {
      while (!options.signal?.aborted && failures.length === 0) {
        const next = await source.next();
        if (next.done) return;
        const result = await scanner.processRecord(next.value);
        aggregator.add(result);
        processed++;
        await options.onRecord?.(result);
      }
    } catch (err) {
      failures.push(err);
    }
  }

  await Promise.all(Array.from({ length: concurrency }, () => worker()));

  if (failures.length > 0) {
    await source.return(undefined);
    throw failures[0];
  }

  const incomplete = options.signal?.aborted ?? false;
  if (incomplete) {
    await source.return(undefined);
  }

  auditInfo('batch_processed', {
    processId: options.processId,
    details: { processed, incomplete, concurrency },
  });

  return { aggregator, processed, incomplete };
}
