import { addUtcDays } from '../domain-types';
import { isLapseDue } from '../domain/application/policy-logic';
import { LifecycleService } from '../application/lifecycle-service';
import { runSweep, SweepContext, SweepResult, toSweepResult } from './sweep-runner';

/**
 * Applications idle in a borrower-owned status for too long become LAPSED.
 */
export async function lapseApplications(context: SweepContext, lifecycle: LifecycleService): Promise<SweepResult> {
  const now = context.clock();
  const policy = context.config.lifecycle;
  const candidates = await context.store.transaction(tx =>
    tx.findLapseCandidates({ now, enteredBefore: addUtcDays(now, -policy.daysToChangeToLapsed) })
  );

  const report = await runSweep('Lapse Applications', context, candidates, async (tx, application, at) => {
    if (!isLapseDue(application, policy, at)) {
      return null;
    }
    return lifecycle.transitionWithin(tx, application, { type: 'LAPSE' }, { kind: 'SYSTEM' });
  });
  return toSweepResult(report);
}
