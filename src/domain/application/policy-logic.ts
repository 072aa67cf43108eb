import { LifecyclePolicy } from '../../config';
import { addUtcDays } from '../../domain-types';
import { Application, ApplicationStatus, Borrower, MessageType } from './application-types';

/**
 * Time-driven policy predicates. Sweeps select candidates with the store's
 * range queries, then re-check the predicate inside each item's transaction.
 */

export const LAPSABLE_STATUSES: readonly ApplicationStatus[] = ['PENDING', 'ACCEPTED', 'INFORMATION_REQUESTED'];

export const ARCHIVABLE_STATUSES: readonly ApplicationStatus[] = ['DECLINED', 'REJECTED', 'COMPLETED', 'LAPSED'];

export const LENDER_WAITING_STATUSES: readonly ApplicationStatus[] = ['STARTED', 'CONTRACT_UPLOADED'];

export const INTRODUCTION_REMINDER: MessageType = 'BORROWER_PENDING_APPLICATION_REMINDER';
export const SUBMISSION_REMINDER: MessageType = 'BORROWER_PENDING_SUBMIT_REMINDER';

function expiresWithinReminderWindow(application: Application, policy: LifecyclePolicy, now: Date): boolean {
  const expiry = application.expiredAt.getTime();
  return expiry > now.getTime() && expiry <= addUtcDays(now, policy.reminderDaysBeforeExpiration).getTime();
}

export function isIntroductionReminderDue(
  application: Application,
  borrower: Borrower,
  alreadyReminded: boolean,
  policy: LifecyclePolicy,
  now: Date
): boolean {
  return (
    application.status === 'PENDING' &&
    borrower.status === 'ACTIVE' &&
    !alreadyReminded &&
    expiresWithinReminderWindow(application, policy, now)
  );
}

export function isSubmissionReminderDue(
  application: Application,
  alreadyReminded: boolean,
  policy: LifecyclePolicy,
  now: Date
): boolean {
  return application.status === 'ACCEPTED' && !alreadyReminded && expiresWithinReminderWindow(application, policy, now);
}

/**
 * Timestamp at which the application entered its current lapsable status.
 */
export function lapseReferenceTimestamp(application: Application): Date | null {
  switch (application.status) {
    case 'PENDING':
      return application.createdAt;
    case 'ACCEPTED':
      return application.acceptedAt;
    case 'INFORMATION_REQUESTED':
      return application.informationRequestedAt;
    default:
      return null;
  }
}

export function isLapseDue(application: Application, policy: LifecyclePolicy, now: Date): boolean {
  const reference = lapseReferenceTimestamp(application);
  if (!reference) {
    return false;
  }
  return addUtcDays(reference, policy.daysToChangeToLapsed).getTime() < now.getTime();
}

/**
 * Terminal timestamp from which the retention period is counted.
 */
export function archiveReferenceTimestamp(application: Application): Date | null {
  switch (application.status) {
    case 'DECLINED':
      return application.declinedAt;
    case 'REJECTED':
      return application.rejectedAt;
    case 'COMPLETED':
      return application.completedAt;
    case 'LAPSED':
      return application.lapsedAt;
    default:
      return null;
  }
}

export function isArchivable(application: Application, policy: LifecyclePolicy, now: Date): boolean {
  if (application.archivedAt) {
    return false;
  }
  const reference = archiveReferenceTimestamp(application);
  if (!reference) {
    return false;
  }
  return addUtcDays(reference, policy.daysToEraseBorrowerData).getTime() < now.getTime();
}

export type OverdueClassification = 'ON_TRACK' | 'WARNING' | 'OVERDUE';

/**
 * WARNING counts toward the lender's aggregated notice; OVERDUE additionally
 * marks the application and alerts the administrator.
 */
export function classifyOverdue(daysWaiting: number, slaDays: number, warnFraction: number): OverdueClassification {
  if (daysWaiting > slaDays) {
    return 'OVERDUE';
  }
  if (daysWaiting > slaDays * warnFraction) {
    return 'WARNING';
  }
  return 'ON_TRACK';
}
