import { addUtcDays } from '../domain-types';
import {
  INTRODUCTION_REMINDER,
  isIntroductionReminderDue,
  isSubmissionReminderDue,
  SUBMISSION_REMINDER,
} from '../domain/application/policy-logic';
import { NotificationDispatcher } from '../application/notification-dispatcher';
import { runSweep, SweepContext, SweepResult, toSweepResult } from './sweep-runner';

export interface ReminderSweepResult {
  introduction: SweepResult;
  submission: SweepResult;
}

/**
 * PENDING applications close to expiry get one reminder to accept the
 * invitation.
 */
export async function sendIntroductionReminders(
  context: SweepContext,
  dispatcher: NotificationDispatcher
): Promise<SweepResult> {
  const now = context.clock();
  const policy = context.config.lifecycle;
  const candidates = await context.store.transaction(tx =>
    tx.findIntroductionReminderCandidates({ now, expiresBefore: addUtcDays(now, policy.reminderDaysBeforeExpiration) })
  );

  const report = await runSweep('Introduction Reminders', context, candidates, async (tx, application, at) => {
    const borrower = await tx.getBorrower(application.borrowerId);
    if (!borrower) {
      return null;
    }
    const alreadyReminded = await tx.hasMessage(application.id, INTRODUCTION_REMINDER);
    if (!isIntroductionReminderDue(application, borrower, alreadyReminded, policy, at)) {
      return null;
    }
    return dispatcher.dispatch(tx, {
      application,
      messageType: INTRODUCTION_REMINDER,
      recipient: 'BORROWER',
      borrower,
      lender: null,
    });
  });
  return toSweepResult(report);
}

/**
 * ACCEPTED applications close to expiry get one reminder to submit.
 */
export async function sendSubmissionReminders(
  context: SweepContext,
  dispatcher: NotificationDispatcher
): Promise<SweepResult> {
  const now = context.clock();
  const policy = context.config.lifecycle;
  const candidates = await context.store.transaction(tx =>
    tx.findSubmissionReminderCandidates({ now, expiresBefore: addUtcDays(now, policy.reminderDaysBeforeExpiration) })
  );

  const report = await runSweep('Submission Reminders', context, candidates, async (tx, application, at) => {
    const alreadyReminded = await tx.hasMessage(application.id, SUBMISSION_REMINDER);
    if (!isSubmissionReminderDue(application, alreadyReminded, policy, at)) {
      return null;
    }
    return dispatcher.dispatch(tx, {
      application,
      messageType: SUBMISSION_REMINDER,
      recipient: 'BORROWER',
    });
  });
  return toSweepResult(report);
}

export async function sendReminders(
  context: SweepContext,
  dispatcher: NotificationDispatcher
): Promise<ReminderSweepResult> {
  const introduction = await sendIntroductionReminders(context, dispatcher);
  const submission = await sendSubmissionReminders(context, dispatcher);
  return { introduction, submission };
}
