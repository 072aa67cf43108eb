import { describeError } from '../errors';
import { Application, Lender } from '../domain/application/application-types';
import { classifyOverdue, LENDER_WAITING_STATUSES } from '../domain/application/policy-logic';
import { LifecycleService } from '../application/lifecycle-service';
import { NotificationDispatcher } from '../application/notification-dispatcher';
import { runSweep, sweepLog, SweepContext, SweepResult, toSweepResult } from './sweep-runner';

interface CountedApplication {
  application: Application;
  lender: Lender;
  daysWaiting: number;
}

export interface SlaSweepResult extends SweepResult {
  lenderNotices: number;
}

/**
 * Flags applications waiting on their lender beyond the SLA.
 *
 * Past the warning threshold an application counts toward its lender's
 * aggregated notice. Past the SLA itself it is also marked overdue once and
 * the administrator is told.
 */
export async function flagOverdueApplications(
  context: SweepContext,
  lifecycle: LifecycleService,
  dispatcher: NotificationDispatcher
): Promise<SlaSweepResult> {
  const warnFraction = context.config.lifecycle.progressToRemindStartedApplications;
  const candidates = await context.store.transaction(tx => tx.findApplicationsWithStatus(LENDER_WAITING_STATUSES));

  const report = await runSweep<CountedApplication>('SLA Overdue', context, candidates, async (tx, application, now) => {
    if (!LENDER_WAITING_STATUSES.includes(application.status) || !application.lenderId) {
      return null;
    }
    const lender = await tx.getLender(application.lenderId);
    if (!lender) {
      return null;
    }

    const daysWaiting = await lifecycle.daysWaiting(tx, application, now);
    const classification = classifyOverdue(daysWaiting, lender.slaDays, warnFraction);
    if (classification === 'ON_TRACK') {
      return null;
    }

    if (classification === 'OVERDUE' && !application.overduedAt) {
      const marked = await tx.updateApplication(application.id, { overduedAt: now, updatedAt: now });
      await tx.insertAction({
        applicationId: application.id,
        type: 'APPLICATION_OVERDUE',
        userId: null,
        data: { daysWaiting, slaDays: lender.slaDays },
        createdAt: now,
      });
      await dispatcher.dispatch(tx, {
        application: marked,
        messageType: 'OVERDUE_APPLICATION_ADMIN',
        recipient: 'ADMIN',
        lender,
        extraVariables: { DAYS_WAITING: String(daysWaiting) },
      });
      return { application: marked, lender, daysWaiting };
    }

    return { application, lender, daysWaiting };
  });

  const lenderNotices = await notifyLenders(context, dispatcher, report.outcomes);
  return { ...toSweepResult(report), lenderNotices };
}

async function notifyLenders(
  context: SweepContext,
  dispatcher: NotificationDispatcher,
  counted: readonly CountedApplication[]
): Promise<number> {
  const byLender = new Map<string, { lender: Lender; last: Application; count: number }>();
  for (const item of counted) {
    const entry = byLender.get(item.lender.id);
    if (entry) {
      entry.count += 1;
      entry.last = item.application;
    } else {
      byLender.set(item.lender.id, { lender: item.lender, last: item.application, count: 1 });
    }
  }

  let sent = 0;
  for (const { lender, last, count } of byLender.values()) {
    try {
      await context.store.transaction(tx =>
        dispatcher.dispatch(tx, {
          application: last,
          messageType: 'OVERDUE_APPLICATION_LENDER',
          recipient: 'LENDER',
          lender,
          extraVariables: { OVERDUE_COUNT: String(count) },
        })
      );
      sent += 1;
    } catch (error) {
      console.error('[SLA Overdue] Failed to notify lender', { lenderId: lender.id, error: describeError(error) });
    }
  }

  sweepLog(context, '[SLA Overdue] Lender notices sent', { lenders: byLender.size, sent });
  return sent;
}
