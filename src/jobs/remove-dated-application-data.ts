import { addUtcDays } from '../domain-types';
import { isArchivable } from '../domain/application/policy-logic';
import { runSweep, SweepContext, SweepResult, toSweepResult } from './sweep-runner';

/**
 * Erases personal data of applications that reached a terminal status longer
 * ago than the retention period. The borrower's own data is erased only when
 * none of their applications remains unarchived.
 */
export async function removeDatedApplicationData(context: SweepContext): Promise<SweepResult> {
  const now = context.clock();
  const policy = context.config.lifecycle;
  const candidates = await context.store.transaction(tx =>
    tx.findArchivableCandidates({ now, terminatedBefore: addUtcDays(now, -policy.daysToEraseBorrowerData) })
  );

  const report = await runSweep('Remove Dated Data', context, candidates, async (tx, application, at) => {
    if (!isArchivable(application, policy, at)) {
      return null;
    }

    await tx.updateAward(application.awardId, { previous: true });
    const archived = await tx.updateApplication(application.id, {
      primaryEmail: '',
      archivedAt: at,
      updatedAt: at,
    });
    const documentsDeleted = await tx.deleteDocuments(application.id);

    const borrowerErased = !(await tx.hasOtherUnarchivedApplications(application.borrowerId, application.id));
    if (borrowerErased) {
      await tx.updateBorrower(application.borrowerId, {
        legalName: '',
        legalIdentifier: '',
        email: '',
        address: '',
        sourceData: {},
        updatedAt: at,
      });
    }

    await tx.insertAction({
      applicationId: application.id,
      type: 'APPLICATION_ARCHIVED',
      userId: null,
      data: { documentsDeleted, borrowerErased },
      createdAt: at,
    });
    return archived;
  });
  return toSweepResult(report);
}
