import { EngineConfig } from '../config';
import { Clock } from '../domain-types';
import { Application } from '../domain/application/application-types';
import { describeError } from '../errors';
import { LifecycleStore, StoreTransaction } from '../store/lifecycle-store';

export interface SweepContext {
  store: LifecycleStore;
  config: Pick<EngineConfig, 'lifecycle' | 'quiet'>;
  clock: Clock;
}

export interface SweepResult {
  candidates: number;
  processed: number;
  skipped: number;
  failed: number;
}

export interface SweepReport<R> extends SweepResult {
  // Handler results of the items whose transaction committed
  outcomes: R[];
}

/**
 * Handler for one locked candidate. Returning null means the predicate no
 * longer holds under the lock and nothing was written.
 */
export type SweepHandler<R> = (tx: StoreTransaction, application: Application, now: Date) => Promise<R | null>;

export function sweepLog(context: SweepContext, message: string, details: object): void {
  if (!context.config.quiet) {
    console.log(message, details);
  }
}

/**
 * Processes each candidate in its own transaction, re-reading it FOR UPDATE
 * first. One item's failure is logged and never stops the sweep.
 */
export async function runSweep<R>(
  name: string,
  context: SweepContext,
  candidates: readonly Application[],
  handle: SweepHandler<R>
): Promise<SweepReport<R>> {
  const report: SweepReport<R> = {
    candidates: candidates.length,
    processed: 0,
    skipped: 0,
    failed: 0,
    outcomes: [],
  };

  for (const candidate of candidates) {
    try {
      const outcome = await context.store.transaction(async tx => {
        const locked = await tx.getApplication(candidate.id, { forUpdate: true });
        if (!locked) {
          return null;
        }
        return handle(tx, locked, context.clock());
      });
      if (outcome === null) {
        report.skipped += 1;
      } else {
        report.processed += 1;
        report.outcomes.push(outcome);
      }
    } catch (error) {
      report.failed += 1;
      console.error(`[${name}] Failed to process application`, {
        applicationId: candidate.id,
        error: describeError(error),
      });
    }
  }

  sweepLog(context, `[${name}] Sweep finished`, {
    candidates: report.candidates,
    processed: report.processed,
    skipped: report.skipped,
    failed: report.failed,
  });
  return report;
}

export function toSweepResult<R>(report: SweepReport<R>): SweepResult {
  const { candidates, processed, skipped, failed } = report;
  return { candidates, processed, skipped, failed };
}
