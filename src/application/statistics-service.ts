import { Clock, JsonObject } from '../domain-types';
import { APPLICATION_STATUSES, ApplicationStatus } from '../domain/application/application-types';
import { LifecycleStore, StoreTransaction } from '../store/lifecycle-store';

export interface StatisticsRefresher {
  recompute(): Promise<StatisticsSnapshot>;
}

export interface StatisticsSnapshot {
  day: Date;
  lenders: number;
}

function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

function applicationKpis(counts: Partial<Record<ApplicationStatus, number>>): JsonObject {
  const byStatus: Record<string, number> = {};
  let total = 0;
  for (const status of APPLICATION_STATUSES) {
    const count = counts[status] ?? 0;
    byStatus[status] = count;
    total += count;
  }
  return { total, byStatus };
}

/**
 * Recomputes today's KPI rows. Safe to run repeatedly: each row is an
 * upsert keyed by (day, type, lender).
 */
export class StatisticsService implements StatisticsRefresher {
  constructor(
    private store: LifecycleStore,
    private clock: Clock
  ) {}

  async recompute(): Promise<StatisticsSnapshot> {
    const day = startOfUtcDay(this.clock());
    return this.store.transaction(async tx => {
      await tx.upsertStatistic({
        type: 'APPLICATION_KPIS',
        lenderId: null,
        data: applicationKpis(await tx.countApplicationsByStatus()),
        day,
      });
      await tx.upsertStatistic({
        type: 'BORROWER_OPT_IN_STATISTICS',
        lenderId: null,
        data: await this.optInStatistics(tx),
        day,
      });

      const lenders = await tx.listLenders();
      for (const lender of lenders) {
        await tx.upsertStatistic({
          type: 'APPLICATION_KPIS',
          lenderId: lender.id,
          data: applicationKpis(await tx.countApplicationsByStatus(lender.id)),
          day,
        });
      }
      return { day, lenders: lenders.length };
    });
  }

  private async optInStatistics(tx: StoreTransaction): Promise<JsonObject> {
    const counts = await tx.countBorrowersByStatus();
    const optedIn = counts.ACTIVE ?? 0;
    const optedOut = counts.DECLINED_ALL_OPPORTUNITIES ?? 0;
    const total = optedIn + optedOut;
    return {
      optedIn,
      optedOut,
      optOutPercentage: total === 0 ? 0 : Math.round((optedOut / total) * 10000) / 100,
    };
  }
}
