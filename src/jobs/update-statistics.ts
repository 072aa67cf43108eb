import { StatisticsRefresher, StatisticsSnapshot } from '../application/statistics-service';
import { sweepLog, SweepContext } from './sweep-runner';

export async function updateStatistics(
  context: SweepContext,
  statistics: StatisticsRefresher
): Promise<StatisticsSnapshot> {
  const snapshot = await statistics.recompute();
  sweepLog(context, '[Statistics] Updated', { day: snapshot.day.toISOString(), lenders: snapshot.lenders });
  return snapshot;
}
