import { wholeDaysBetween } from '../../domain-types';

/**
 * Days an application has been waiting on its lender.
 *
 * The lender's clock starts at lenderStartedAt, stops at each information
 * request and restarts at the matching borrower completion (oldest request
 * pairs with oldest completion). A clock still running at the end is closed
 * at `now`. Each interval contributes its whole UTC days, rounded down.
 *
 * Surplus requests after the last completion leave the clock stopped;
 * completions without a preceding request are ignored.
 */
export function daysWaitingForLender(
  lenderStartedAt: Date | null,
  informationRequests: readonly Date[],
  requestCompletions: readonly Date[],
  now: Date
): number {
  if (!lenderStartedAt) {
    return 0;
  }

  const requests = sortChronologically(informationRequests);
  const completions = sortChronologically(requestCompletions);

  let total = 0;
  let clockStartedAt = lenderStartedAt;
  let nextRequest = 0;
  let nextCompletion = 0;

  for (;;) {
    if (nextRequest >= requests.length) {
      total += wholeDaysBetween(clockStartedAt, now);
      return total;
    }

    total += wholeDaysBetween(clockStartedAt, requests[nextRequest]);
    nextRequest += 1;

    if (nextCompletion >= completions.length) {
      // Ball is in the borrower's court
      return total;
    }

    clockStartedAt = completions[nextCompletion];
    nextCompletion += 1;
  }
}

function sortChronologically(dates: readonly Date[]): Date[] {
  return [...dates].sort((a, b) => a.getTime() - b.getTime());
}
