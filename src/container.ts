import { Pool } from 'pg';
import { EngineConfig } from './config';
import { Clock, systemClock } from './domain-types';
import { createIdentityService, IdentityService } from './domain/identity/identity-logic';
import { ApplicationFactory } from './application/application-factory';
import { LifecycleService } from './application/lifecycle-service';
import { NotificationDispatcher } from './application/notification-dispatcher';
import { StatisticsService } from './application/statistics-service';
import { AwardIngestor } from './ingestion/award-ingestor';
import { AwardSource } from './ingestion/award-source';
import { SocrataAwardSource } from './ingestion/socrata-award-source';
import { ConsoleNotificationSender, NotificationSender, RelayNotificationSender } from './notifications/notification-sender';
import { CredentialStore, LifecycleStore } from './store/lifecycle-store';
import { PgLifecycleStore } from './store/pg-lifecycle-store';
import { JobScheduler, ScheduledJob } from './jobs/job-scheduler';
import { lapseApplications } from './jobs/lapse-applications';
import { removeDatedApplicationData } from './jobs/remove-dated-application-data';
import { sendReminders } from './jobs/send-reminders';
import { flagOverdueApplications } from './jobs/sla-overdue-applications';
import { SweepContext } from './jobs/sweep-runner';
import { updateStatistics } from './jobs/update-statistics';

export interface Engine {
  config: EngineConfig;
  clock: Clock;
  store: LifecycleStore;
  credentials: CredentialStore;
  identity: IdentityService;
  dispatcher: NotificationDispatcher;
  factory: ApplicationFactory;
  statistics: StatisticsService;
  lifecycle: LifecycleService;
  ingestor: AwardIngestor;
  close(): Promise<void>;
}

export interface EngineOverrides {
  clock?: Clock;
  store?: LifecycleStore & CredentialStore;
  source?: AwardSource;
  sender?: NotificationSender;
}

function createSender(config: EngineConfig): NotificationSender {
  const { relayUrl, timeoutMs } = config.notifications;
  return relayUrl ? new RelayNotificationSender(relayUrl, timeoutMs) : new ConsoleNotificationSender();
}

/**
 * Composition root. Production wiring uses pg, the open-data source and the
 * configured sender; tests pass in-process replacements.
 */
export function createEngine(config: EngineConfig, overrides: EngineOverrides = {}): Engine {
  const clock = overrides.clock ?? systemClock;
  let pool: Pool | null = null;
  let store: LifecycleStore & CredentialStore;
  if (overrides.store) {
    store = overrides.store;
  } else {
    pool = new Pool({ connectionString: config.databaseUrl });
    store = new PgLifecycleStore(pool);
  }

  const identity = createIdentityService(config.hashSecret);
  const dispatcher = new NotificationDispatcher(
    overrides.sender ?? createSender(config),
    {
      timeoutMs: config.notifications.timeoutMs,
      frontendUrl: config.frontendUrl,
      adminEmailGroup: config.adminEmailGroup,
    },
    clock
  );
  const factory = new ApplicationFactory(identity, config, clock);
  const statistics = new StatisticsService(store, clock);
  const ingestor = new AwardIngestor({
    store,
    source: overrides.source ?? new SocrataAwardSource(config.awardSource),
    identity,
    factory,
    dispatcher,
    config,
    clock,
  });
  const lifecycle = new LifecycleService({
    store,
    factory,
    dispatcher,
    statistics,
    config,
    clock,
    onAccepted: borrower => ingestor.fetchPreviousAwards(borrower),
  });

  return {
    config,
    clock,
    store,
    credentials: store,
    identity,
    dispatcher,
    factory,
    statistics,
    lifecycle,
    ingestor,
    async close() {
      if (pool) {
        await pool.end();
      }
    },
  };
}

export const JOB_NAMES = [
  'fetch-awards',
  'send-reminders',
  'lapse-applications',
  'sla-overdue-applications',
  'remove-dated-application-data',
  'update-statistics',
] as const;

export type JobName = typeof JOB_NAMES[number];

export function isJobName(value: string): value is JobName {
  return JOB_NAMES.some(name => name === value);
}

export function sweepContext(engine: Engine): SweepContext {
  return { store: engine.store, config: engine.config, clock: engine.clock };
}

export function createJobs(engine: Engine): Record<JobName, () => Promise<unknown>> {
  const context = sweepContext(engine);
  return {
    'fetch-awards': () => engine.ingestor.fetchAwards(),
    'send-reminders': () => sendReminders(context, engine.dispatcher),
    'lapse-applications': () => lapseApplications(context, engine.lifecycle),
    'sla-overdue-applications': () => flagOverdueApplications(context, engine.lifecycle, engine.dispatcher),
    'remove-dated-application-data': () => removeDatedApplicationData(context),
    'update-statistics': () => updateStatistics(context, engine.statistics),
  };
}

export function createScheduler(engine: Engine): JobScheduler {
  const jobs = createJobs(engine);
  const scheduled: ScheduledJob[] = JOB_NAMES.map(name => ({ name, run: jobs[name] }));
  return new JobScheduler(scheduled, engine.config.scheduler.intervalMs);
}
